import type { PipelineLogger } from '../types/pipeline';

export function createConsoleLogger(prefix: string): PipelineLogger {
  const tag = `[${prefix}]`;
  const write = (fn: (...args: unknown[]) => void, message: string, data?: Record<string, unknown>) => {
    if (data && Object.keys(data).length > 0) {
      fn(tag, message, data);
    } else {
      fn(tag, message);
    }
  };

  return {
    debug: (message, data) => write(console.debug, message, data),
    info: (message, data) => write(console.log, message, data),
    warn: (message, data) => write(console.warn, message, data),
    error: (message, data) => write(console.error, message, data),
  };
}
