import type { StorageConfig } from '../types/index.js';
import type { Backend } from './backend.js';
import { FileSystemBackend } from './file-system-backend.js';
import { MemoryBackend } from './memory-backend.js';
import logger from '../utils/logger.js';

/**
 * Build the backend selected by the storage configuration.
 */
export async function createBackend(storage: StorageConfig): Promise<Backend> {
  switch (storage.backend) {
    case 'memory':
      logger.info('Using in-memory backend, notes are discarded on exit');
      return new MemoryBackend();
    case 'filesystem': {
      const backend = await FileSystemBackend.create(storage.notesPath);
      logger.info({ notesPath: backend.path }, 'Using file system backend');
      return backend;
    }
  }
}
