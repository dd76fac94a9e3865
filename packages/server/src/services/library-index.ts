/**
 * SQLite-backed library index
 *
 * Holds the locally known tracks. The pipeline does not dispatch until
 * loadIndex() has rebuilt the search keys and `indexReady` has fired.
 */

import Database from 'better-sqlite3';
import { EventEmitter } from 'events';
import { nanoid } from 'nanoid';
import * as fs from 'fs';
import * as path from 'path';
import { normalizeText } from '@tonearm/core';
import { log } from './log-service';

export interface LibraryTrack {
  id: string;
  artist: string;
  track: string;
  album?: string;
  /** Duration in seconds */
  duration?: number;
  url?: string;
}

interface TrackRow {
  id: string;
  artist: string;
  track: string;
  album: string | null;
  duration: number | null;
  url: string | null;
}

const SEARCH_LIMIT = 20;

export class LibraryIndex extends EventEmitter {
  readonly db: Database.Database;
  private ready = false;

  constructor(dbPath: string) {
    super();

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tracks (
        id TEXT PRIMARY KEY,
        artist TEXT NOT NULL,
        track TEXT NOT NULL,
        album TEXT,
        duration INTEGER,
        url TEXT
      )
    `);

    // Normalized search keys, rebuilt by loadIndex()
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS track_keys (
        track_id TEXT PRIMARY KEY REFERENCES tracks(id) ON DELETE CASCADE,
        artist_key TEXT NOT NULL,
        track_key TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_track_keys_lookup ON track_keys(artist_key, track_key);
    `);
  }

  get isReady(): boolean {
    return this.ready;
  }

  /**
   * Insert or replace tracks. Tracks added after loadIndex() are keyed immediately.
   */
  addTracks(tracks: Array<Omit<LibraryTrack, 'id'> & { id?: string }>): string[] {
    const insert = this.db.prepare<[string, string, string, string | null, number | null, string | null]>(`
      INSERT OR REPLACE INTO tracks (id, artist, track, album, duration, url)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const ids = this.db.transaction(() => tracks.map(track => {
      const id = track.id ?? nanoid();
      insert.run(id, track.artist, track.track, track.album ?? null, track.duration ?? null, track.url ?? null);
      if (this.ready) {
        this.writeKeys(id, track.artist, track.track);
      }
      return id;
    }))();

    return ids;
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM tracks').get();
    return row?.total ?? 0;
  }

  /**
   * Rebuild the search keys, then announce readiness on the next tick
   */
  loadIndex(): void {
    const rows = this.db.prepare<[], TrackRow>('SELECT * FROM tracks').all();

    this.db.transaction(() => {
      this.db.exec('DELETE FROM track_keys');
      for (const row of rows) {
        this.writeKeys(row.id, row.artist, row.track);
      }
    })();

    this.ready = true;
    log.info('LibraryIndex', 'Index loaded', { tracks: rows.length });
    setImmediate(() => this.emit('indexReady'));
  }

  /**
   * Exact normalized match first, substring match otherwise
   */
  search(artist: string, track: string): LibraryTrack[] {
    if (!this.ready) return [];

    const artistKey = normalizeText(artist);
    const trackKey = normalizeText(track);

    const exact = this.db.prepare<[string, string, number], TrackRow>(`
      SELECT t.* FROM tracks t
      JOIN track_keys k ON k.track_id = t.id
      WHERE k.artist_key = ? AND k.track_key = ?
      LIMIT ?
    `).all(artistKey, trackKey, SEARCH_LIMIT);

    if (exact.length > 0) {
      return exact.map(toLibraryTrack);
    }

    return this.db.prepare<[string, string, number], TrackRow>(`
      SELECT t.* FROM tracks t
      JOIN track_keys k ON k.track_id = t.id
      WHERE k.artist_key LIKE '%' || ? || '%' AND k.track_key LIKE '%' || ? || '%'
      LIMIT ?
    `).all(artistKey, trackKey, SEARCH_LIMIT).map(toLibraryTrack);
  }

  /**
   * Substring match of free text against "artist track"
   */
  searchFullText(text: string): LibraryTrack[] {
    if (!this.ready) return [];

    const needle = normalizeText(text);
    if (!needle) return [];

    return this.db.prepare<[string, string, number], TrackRow>(`
      SELECT t.* FROM tracks t
      JOIN track_keys k ON k.track_id = t.id
      WHERE (k.artist_key || ' ' || k.track_key) LIKE '%' || ? || '%'
         OR k.track_key LIKE '%' || ? || '%'
      LIMIT ?
    `).all(needle, needle, SEARCH_LIMIT).map(toLibraryTrack);
  }

  close(): void {
    this.db.close();
  }

  private writeKeys(id: string, artist: string, track: string): void {
    this.db.prepare<[string, string, string]>(`
      INSERT OR REPLACE INTO track_keys (track_id, artist_key, track_key) VALUES (?, ?, ?)
    `).run(id, normalizeText(artist), normalizeText(track));
  }
}

function toLibraryTrack(row: TrackRow): LibraryTrack {
  return {
    id: row.id,
    artist: row.artist,
    track: row.track,
    album: row.album ?? undefined,
    duration: row.duration ?? undefined,
    url: row.url ?? undefined
  };
}
