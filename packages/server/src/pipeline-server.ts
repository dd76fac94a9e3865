/**
 * Tonearm Server
 *
 * A headless host for the query-resolution pipeline.
 * Owns the library index, the pipeline and its local resolver, and
 * exposes them over a small HTTP API.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z } from 'zod';
import { Pipeline, TrackQuery, type TrackResult } from '@tonearm/core';

import type { ServerConfig } from './config';
import { LibraryIndex } from './services/library-index';
import { LocalLibraryResolver } from './services/local-resolver';
import { createServiceLogger, isLogLevel, logService, log } from './services/log-service';

export interface PipelineServerOptions {
  config: ServerConfig;
  onReady?: (info: ServerInfo) => void;
}

export interface ServerInfo {
  localUrl: string;
  port: number;
  maxConcurrent: number;
}

const submitQuerySchema = z.object({
  artist: z.string().default(''),
  track: z.string().default(''),
  album: z.string().optional(),
  duration: z.number().positive().optional(),
  fullText: z.string().optional(),
  prioritized: z.boolean().default(false),
  // Web lookups are fire-and-forget unless the caller says otherwise
  temporary: z.boolean().default(true)
}).refine(
  body => (body.fullText?.trim() ?? '') !== '' || body.track.trim() !== '',
  { message: 'Either track or fullText is required' }
);

function serializeQuery(query: TrackQuery) {
  return {
    id: query.id,
    artist: query.artist,
    track: query.track,
    album: query.album,
    fullText: query.fullText,
    finished: query.isResolvingFinished(),
    solved: query.isSatisfied(),
    resolvedBy: [...query.resolvedBy].map(r => r.name),
    results: query.results
  };
}

export class PipelineServer {
  readonly pipeline: Pipeline<TrackResult, TrackQuery>;
  readonly index: LibraryIndex;
  private fastify: FastifyInstance;
  private config: ServerConfig;
  private localResolver: LocalLibraryResolver;
  private prepared: Promise<void> | null = null;
  private isRunning = false;

  constructor(private options: PipelineServerOptions) {
    this.config = options.config;
    logService.setLevel(this.config.logging.level);

    this.fastify = Fastify({
      logger: this.config.logging.level === 'debug'
    });

    this.index = new LibraryIndex(this.config.library.database);
    this.pipeline = new Pipeline<TrackResult, TrackQuery>({
      maxConcurrent: this.config.pipeline.maxConcurrent,
      temporaryQueryTimeout: this.config.pipeline.temporaryQueryTimeout,
      logger: createServiceLogger('Pipeline')
    });

    this.localResolver = new LocalLibraryResolver(this.index, this.pipeline);
    this.pipeline.addResolver(this.localResolver);

    this.pipeline.on('idle', () => {
      log.debug('Server', 'Pipeline idle');
    });
  }

  get app(): FastifyInstance {
    return this.fastify;
  }

  /**
   * Register plugins and routes without listening
   */
  ready(): Promise<void> {
    if (!this.prepared) {
      this.prepared = (async () => {
        await this.registerPlugins();
        this.registerRoutes();
        await this.fastify.ready();
      })();
    }
    return this.prepared;
  }

  /**
   * Load the library index; the pipeline starts once it is ready
   */
  startPipeline(): Promise<void> {
    return this.pipeline.startWhenReady(this.index);
  }

  async start(): Promise<ServerInfo> {
    if (this.isRunning) {
      throw new Error('Server is already running');
    }

    log.info('Server', 'Starting Tonearm server...');

    await this.ready();
    await this.startPipeline();

    await this.fastify.listen({
      port: this.config.server.port,
      host: this.config.server.host
    });
    this.isRunning = true;

    const address = this.fastify.server.address();
    const port = address !== null && typeof address === 'object' ? address.port : this.config.server.port;
    const info: ServerInfo = {
      localUrl: `http://${this.config.server.host}:${port}`,
      port,
      maxConcurrent: this.pipeline.maxConcurrent
    };

    log.info('Server', 'Ready', {
      url: info.localUrl,
      tracks: this.index.count(),
      resolvers: this.pipeline.resolvers().map(r => r.name)
    });

    this.options.onReady?.(info);
    return info;
  }

  async stop(): Promise<void> {
    log.info('Server', 'Stopping...');

    this.pipeline.dispose();
    await this.fastify.close();
    this.index.close();
    this.isRunning = false;

    log.info('Server', 'Stopped');
  }

  private async registerPlugins(): Promise<void> {
    await this.fastify.register(cors, {
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS']
    });

    await this.fastify.register(rateLimit, {
      max: 300,
      timeWindow: '1 minute'
    });
  }

  private registerRoutes(): void {
    this.fastify.get('/health', async () => ({
      status: 'ok',
      running: this.pipeline.isRunning,
      uptime: process.uptime()
    }));

    this.fastify.get('/api/pipeline', async () => ({
      running: this.pipeline.isRunning,
      maxConcurrent: this.pipeline.maxConcurrent,
      active: this.pipeline.activeQueryCount,
      pending: this.pipeline.pendingQueryCount
    }));

    this.fastify.get('/api/resolvers', async () => ({
      resolvers: this.pipeline.resolvers().map(r => ({
        name: r.name,
        weight: r.weight,
        timeout: r.timeout
      }))
    }));

    this.fastify.post('/api/queries', async (request, reply) => {
      const parsed = submitQuerySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.code(400).send({
          error: 'Invalid query',
          issues: parsed.error.issues.map(issue => issue.message)
        });
      }

      const { prioritized, temporary, ...init } = parsed.data;
      const query = new TrackQuery(init);
      this.pipeline.submit(query, { prioritized, temporary });

      log.debug('Server', `Submitted ${query}`, { queryId: query.id, prioritized, temporary });
      return reply.code(202).send({ id: query.id });
    });

    this.fastify.get<{ Params: { id: string } }>('/api/queries/:id', async (request, reply) => {
      const query = this.pipeline.query(request.params.id);
      if (!query) {
        return reply.code(404).send({ error: 'Query not found' });
      }
      return serializeQuery(query);
    });

    this.fastify.get<{ Params: { id: string } }>('/api/results/:id', async (request, reply) => {
      const result = this.pipeline.result(request.params.id);
      if (!result) {
        return reply.code(404).send({ error: 'Result not found' });
      }
      return result;
    });

    this.fastify.get<{ Querystring: { count?: string; level?: string; service?: string } }>(
      '/api/logs',
      async (request) => {
        const { count, level, service } = request.query;
        const limit = count !== undefined ? parseInt(count, 10) : NaN;

        return {
          logs: logService.recent({
            count: Number.isNaN(limit) ? undefined : limit,
            level: level !== undefined && isLogLevel(level) ? level : undefined,
            service
          }),
          stats: logService.stats()
        };
      }
    );
  }
}
