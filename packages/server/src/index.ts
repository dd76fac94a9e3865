/**
 * Tonearm Server - Library Entry Point
 *
 * This module exports the server components for programmatic use.
 * For CLI usage, see ./cli.ts
 */

export { PipelineServer } from './pipeline-server';
export { loadConfig, mergeConfig, generateExampleConfig } from './config';
export { parseArgs } from './cli-args';

// Services
export { LibraryIndex } from './services/library-index';
export { LocalLibraryResolver } from './services/local-resolver';
export { LogService, logService, log, createServiceLogger } from './services/log-service';

// Types
export type { ServerConfig, ConfigOverrides, LoadConfigOptions } from './config';
export type { CliArgs } from './cli-args';
export type { ServerInfo, PipelineServerOptions } from './pipeline-server';
export type { LibraryTrack } from './services/library-index';
export type { LocalLibraryResolverOptions } from './services/local-resolver';
export type { LogEntry, LogLevel, LogQuery, LogStats } from './services/log-service';
