import path from 'node:path';
import type { BackendKind, StorageConfig } from './types/index.js';
import { expandHome } from './utils/config.js';

export interface CliArgs {
  notesPath?: string;
  backend?: BackendKind;
  help: boolean;
}

export const USAGE = `Usage: termnotes [options]

Options:
  -p, --path <file>                   notes file (default: $TERMNOTES_PATH or ~/.termnotes/notes.json)
      --backend <filesystem|memory>   storage backend (default: $TERMNOTES_BACKEND or filesystem)
  -h, --help                          show this help

Keys:
  n new  e/enter edit  d delete  up/down navigate  q quit
  Ctrl+S save  Esc cancel  Tab switch field`;

function isBackendKind(value: string): value is BackendKind {
  return value === 'filesystem' || value === 'memory';
}

/**
 * Parse command line flags (without the node and script entries).
 * @throws Error on an unknown flag or a missing/invalid value
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const equals = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = equals === -1 ? arg : arg.slice(0, equals);
    const inline = equals === -1 ? undefined : arg.slice(equals + 1);

    const value = (): string => {
      if (inline !== undefined) {
        return inline;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new Error(`Missing value for ${flag}`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '-p':
      case '--path':
        args.notesPath = value();
        break;
      case '--backend': {
        const backend = value();
        if (!isBackendKind(backend)) {
          throw new Error(`Unknown backend "${backend}" (expected filesystem or memory)`);
        }
        args.backend = backend;
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

/**
 * Flags override the configured storage settings.
 */
export function applyArgs(storage: StorageConfig, args: CliArgs): StorageConfig {
  return {
    ...storage,
    backend: args.backend ?? storage.backend,
    notesPath: args.notesPath ? path.resolve(expandHome(args.notesPath)) : storage.notesPath,
  };
}
