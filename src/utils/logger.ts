import pino from 'pino';
import { loadConfig } from './config.js';

const { logging } = loadConfig();

// The terminal UI owns stdout, so log lines go to a file.
const logger =
  logging.level === 'silent'
    ? pino({ level: 'silent' })
    : pino(
        { level: logging.level, name: 'termnotes' },
        pino.destination({ dest: logging.file, mkdir: true, sync: false })
      );

export default logger;
