/**
 * Configuration loader for the Tonearm server
 *
 * Supports (in order of precedence):
 * 1. Environment variables (TONEARM_*)
 * 2. Config file (config.yml or config.json)
 * 3. Default values
 */

import * as fs from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_TEMPORARY_QUERY_TIMEOUT } from '@tonearm/core';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './services/log-service';

export interface ServerConfig {
  server: {
    port: number;
    host: string;
  };
  pipeline: {
    /** Unset = derived from the host's parallelism */
    maxConcurrent?: number;
    /** Quiet period (ms) before temporary queries are evicted */
    temporaryQueryTimeout: number;
  };
  library: {
    /** SQLite file, or ':memory:' */
    database: string;
  };
  logging: {
    level: LogLevel;
  };
}

const DEFAULT_CONFIG: ServerConfig = {
  server: {
    port: 8585,
    host: '0.0.0.0'
  },
  pipeline: {
    temporaryQueryTimeout: DEFAULT_TEMPORARY_QUERY_TIMEOUT
  },
  library: {
    database: './data/library.db'
  },
  logging: {
    level: 'info'
  }
};

const configOverridesSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535),
    host: z.string().min(1)
  }).partial().optional(),
  pipeline: z.object({
    maxConcurrent: z.number().int().positive(),
    temporaryQueryTimeout: z.number().int().positive()
  }).partial().optional(),
  library: z.object({
    database: z.string().min(1)
  }).partial().optional(),
  logging: z.object({
    level: z.enum(LOG_LEVELS)
  }).partial().optional()
});

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const level = env.TONEARM_LOG_LEVEL;

  return {
    server: {
      port: parseInteger(env.TONEARM_PORT),
      host: env.TONEARM_HOST || undefined
    },
    pipeline: {
      maxConcurrent: parseInteger(env.TONEARM_MAX_CONCURRENT),
      temporaryQueryTimeout: parseInteger(env.TONEARM_TEMPORARY_QUERY_TIMEOUT)
    },
    library: {
      database: env.TONEARM_DATABASE || undefined
    },
    logging: {
      level: level !== undefined && isLogLevel(level) ? level : undefined
    }
  };
}

/**
 * Load configuration from file
 */
function loadFromFile(configPath?: string, basePath: string = process.cwd()): ConfigOverrides {
  const searchPaths = configPath
    ? [configPath]
    : ['config.yml', 'config.yaml', 'config.json'].map(name => path.join(basePath, name));

  for (const filePath of searchPaths) {
    if (!fs.existsSync(filePath)) continue;

    const content = fs.readFileSync(filePath, 'utf-8');
    const raw: unknown = filePath.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
    const parsed = configOverridesSchema.safeParse(raw ?? {});

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid config file ${filePath}: ${issues}`);
    }

    return parsed.data;
  }

  if (configPath) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  return {};
}

function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

/**
 * Layer overrides on top of a config, ignoring unset values
 */
export function mergeConfig(base: ServerConfig, overrides: ConfigOverrides): ServerConfig {
  return {
    server: {
      port: pick(overrides.server?.port, base.server.port),
      host: pick(overrides.server?.host, base.server.host)
    },
    pipeline: {
      maxConcurrent: pick(overrides.pipeline?.maxConcurrent, base.pipeline.maxConcurrent),
      temporaryQueryTimeout: pick(
        overrides.pipeline?.temporaryQueryTimeout,
        base.pipeline.temporaryQueryTimeout
      )
    },
    library: {
      database: pick(overrides.library?.database, base.library.database)
    },
    logging: {
      level: pick(overrides.logging?.level, base.logging.level)
    }
  };
}

/**
 * Resolve relative paths to absolute paths
 */
function resolvePaths(config: ServerConfig, basePath: string): ServerConfig {
  const { database } = config.library;
  if (database === ':memory:' || path.isAbsolute(database)) {
    return config;
  }

  return {
    ...config,
    library: { database: path.resolve(basePath, database) }
  };
}

export interface LoadConfigOptions {
  configPath?: string;
  basePath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const basePath = options.basePath || process.cwd();

  const fileConfig = loadFromFile(options.configPath, basePath);
  const envConfig = loadFromEnv(options.env);

  // Merge: defaults <- file <- env
  const config = mergeConfig(mergeConfig(DEFAULT_CONFIG, fileConfig), envConfig);

  return resolvePaths(config, basePath);
}

/**
 * Generate example config file
 */
export function generateExampleConfig(): string {
  return YAML.stringify({
    server: {
      port: DEFAULT_CONFIG.server.port,
      host: DEFAULT_CONFIG.server.host
    },
    pipeline: {
      temporaryQueryTimeout: DEFAULT_CONFIG.pipeline.temporaryQueryTimeout
    },
    library: {
      database: DEFAULT_CONFIG.library.database
    },
    logging: {
      level: DEFAULT_CONFIG.logging.level
    }
  });
}
