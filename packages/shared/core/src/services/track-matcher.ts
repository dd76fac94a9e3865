/**
 * Track matching service
 * Scores how well a resolver's candidate matches the track a query asked for
 */

export interface MatchTarget {
  artist: string;
  track: string;
  duration?: number;
}

/** Minimum score for a candidate to count as the track asked for */
export const MATCH_THRESHOLD = 0.7;

/**
 * Normalize string for comparison
 */
export function normalizeText(str: string): string {
  return str
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
    .replace(/[^a-z0-9\s]/g, '')     // Remove special chars
    .replace(/\s+/g, ' ')            // Normalize whitespace
    .trim();
}

export class TrackMatcher {
  /**
   * Score a candidate against a structured artist/track target
   */
  score(target: MatchTarget, candidate: MatchTarget): number {
    // Title similarity (50% weight)
    const titleScore = this.stringSimilarity(
      normalizeText(target.track),
      normalizeText(candidate.track)
    ) * 0.5;

    // Artist similarity (35% weight)
    const artistScore = this.stringSimilarity(
      normalizeText(target.artist),
      normalizeText(candidate.artist)
    ) * 0.35;

    // Duration similarity (15% weight) - allow 5 second variance
    let durationScore = 0.15;
    if (target.duration !== undefined && candidate.duration !== undefined) {
      const diff = Math.abs(target.duration - candidate.duration);
      durationScore = diff <= 5 ? 0.15 : Math.max(0, 0.15 - (diff / 100));
    }

    return titleScore + artistScore + durationScore;
  }

  /**
   * Score a candidate against free text, which may name the track alone
   * or the artist followed by the track
   */
  scoreFullText(text: string, candidate: MatchTarget): number {
    const needle = normalizeText(text);
    const byTrack = this.stringSimilarity(needle, normalizeText(candidate.track));
    const byBoth = this.stringSimilarity(
      needle,
      normalizeText(`${candidate.artist} ${candidate.track}`)
    );
    return Math.max(byTrack, byBoth);
  }

  /**
   * Calculate string similarity using Levenshtein distance
   */
  private stringSimilarity(s1: string, s2: string): number {
    if (s1 === s2) return 1;
    if (!s1 || !s2) return 0;

    const longer = s1.length > s2.length ? s1 : s2;
    const shorter = s1.length > s2.length ? s2 : s1;

    const distance = this.levenshteinDistance(longer, shorter);
    return (longer.length - distance) / longer.length;
  }

  private levenshteinDistance(s1: string, s2: string): number {
    let previous = Array.from({ length: s2.length + 1 }, (_, j) => j);

    for (let i = 1; i <= s1.length; i++) {
      const current = [i];
      for (let j = 1; j <= s2.length; j++) {
        const substitution = (previous[j - 1] ?? 0) + (s1[i - 1] === s2[j - 1] ? 0 : 1);
        const insertion = (current[j - 1] ?? 0) + 1;
        const deletion = (previous[j] ?? 0) + 1;
        current.push(Math.min(substitution, insertion, deletion));
      }
      previous = current;
    }

    return previous[s2.length] ?? 0;
  }
}
