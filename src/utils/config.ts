import dotenv from 'dotenv';
import pino from 'pino';
import { homedir } from 'node:os';
import path from 'node:path';
import { AppConfig, BackendKind, SyncFailurePolicy } from '../types/index.js';

dotenv.config();

const BACKENDS: readonly BackendKind[] = ['filesystem', 'memory'];
const SYNC_POLICIES: readonly SyncFailurePolicy[] = ['soft', 'hard'];
const LOG_LEVELS: readonly string[] = [...Object.keys(pino.levels.values), 'silent'];

export function defaultDataDir(): string {
  return path.join(homedir(), '.termnotes');
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(value: string): string {
  if (value === '~') {
    return homedir();
  }
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return path.join(homedir(), value.slice(2));
  }
  return value;
}

function pickOne<T extends string>(
  name: string,
  raw: string | undefined,
  allowed: readonly T[],
  fallback: T,
  warnings: string[]
): T {
  if (!raw) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === raw.trim().toLowerCase());
  if (!match) {
    warnings.push(`${name}="${raw}" is not one of ${allowed.join(', ')}; using "${fallback}"`);
    return fallback;
  }
  return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const warnings: string[] = [];
  const dataDir = defaultDataDir();

  return {
    storage: {
      backend: pickOne('TERMNOTES_BACKEND', env.TERMNOTES_BACKEND, BACKENDS, 'filesystem', warnings),
      notesPath: path.resolve(expandHome(env.TERMNOTES_PATH || path.join(dataDir, 'notes.json'))),
      syncFailurePolicy: pickOne(
        'TERMNOTES_SYNC_POLICY',
        env.TERMNOTES_SYNC_POLICY,
        SYNC_POLICIES,
        'soft',
        warnings
      ),
    },
    logging: {
      level: pickOne('LOG_LEVEL', env.LOG_LEVEL, LOG_LEVELS, 'info', warnings),
      file: path.resolve(expandHome(env.LOG_FILE || path.join(dataDir, 'termnotes.log'))),
    },
    warnings,
  };
}
