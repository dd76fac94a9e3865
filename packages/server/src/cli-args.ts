export interface CliArgs {
  configPath?: string;
  port?: number;
  host?: string;
  init?: boolean;
  help?: boolean;
  version?: boolean;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--config':
      case '-c':
        result.configPath = args[++i];
        break;
      case '--port':
      case '-p': {
        const port = parseInt(args[++i] ?? '', 10);
        if (!Number.isNaN(port)) {
          result.port = port;
        }
        break;
      }
      case '--host': {
        const host = args[i + 1];
        if (host && !host.startsWith('-')) {
          result.host = host;
          i++;
        } else {
          result.help = true;
        }
        break;
      }
      case '--init':
        result.init = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--version':
      case '-v':
        result.version = true;
        break;
    }
  }

  return result;
}
