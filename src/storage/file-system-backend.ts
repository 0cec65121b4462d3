import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Note } from '../types/index.js';
import type { Backend } from './backend.js';
import { decodeNotes, encodeNotes } from './note-codec.js';
import logger from '../utils/logger.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * JSON file-based backend.
 * Stores the whole collection in one file, rewritten in place on every save.
 */
export class FileSystemBackend implements Backend {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  /**
   * Construct a backend and create its parent directory.
   */
  static async create(filePath: string): Promise<FileSystemBackend> {
    const backend = new FileSystemBackend(filePath);
    await backend.initialize();
    return backend;
  }

  get path(): string {
    return this.filePath;
  }

  async initialize(): Promise<void> {
    const dir = path.dirname(this.filePath);
    try {
      await fs.mkdir(dir, { recursive: true });
      logger.debug({ dir }, 'Storage directory ready');
    } catch (error) {
      logger.error({ error, dir }, 'Failed to create storage directory');
      throw error;
    }
  }

  async loadAll(): Promise<Note[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.debug({ filePath: this.filePath }, 'Notes file not found, starting empty');
        return [];
      }
      logger.error({ error, filePath: this.filePath }, 'Failed to read notes file');
      throw error;
    }

    const notes = decodeNotes(content, this.filePath);
    logger.debug({ filePath: this.filePath, count: notes.length }, 'Notes loaded');
    return notes;
  }

  async saveAll(notes: Note[]): Promise<void> {
    try {
      await fs.writeFile(this.filePath, encodeNotes(notes), 'utf-8');
      logger.debug({ filePath: this.filePath, count: notes.length }, 'Notes saved');
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Failed to save notes');
      throw error;
    }
  }
}
