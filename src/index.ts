#!/usr/bin/env node
import { USAGE, applyArgs, parseArgs } from './cli.js';
import { createEventBus } from './core/event-bus.js';
import { errorMessage } from './core/errors.js';
import { NoteStore } from './services/note-store.js';
import { createBackend } from './storage/create-backend.js';
import { InteractionModel } from './ui/interaction-model.js';
import { previewBody, renderFrame } from './ui/render/frame.js';
import { createMarkdownRenderer } from './ui/render/markdown.js';
import { createTheme } from './ui/render/theme.js';
import { TerminalApp } from './ui/terminal-app.js';
import { loadConfig } from './utils/config.js';
import logger from './utils/logger.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  // Load configuration
  const config = loadConfig();
  for (const warning of config.warnings) {
    logger.warn({ warning }, 'Invalid configuration value');
  }
  const storage = applyArgs(config.storage, args);

  const eventBus = createEventBus();
  eventBus.subscribe('*', (event) => {
    logger.debug({ eventType: event.type, noteId: event.noteId, payload: event.payload }, 'Event emitted');
  });

  const backend = await createBackend(storage);
  const store = await NoteStore.open({
    backend,
    syncFailurePolicy: storage.syncFailurePolicy,
    eventBus,
  });

  const theme = createTheme();
  const collaborators = { theme, renderMarkdown: createMarkdownRenderer(theme) };
  const model = new InteractionModel(store, {
    measurePreview: (note, width) => previewBody(note, width, collaborators).length,
  });
  const app = new TerminalApp({
    model,
    render: (view) => renderFrame(view, collaborators),
    input: process.stdin,
    output: process.stdout,
    eventBus,
  });

  // Graceful shutdown: give the terminal back before the process goes away
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down...');
    app.stop();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  process.on('SIGHUP', shutdown);
  process.once('exit', () => app.stop());

  await app.run();
  logger.info({ notes: store.count() }, 'Exiting');
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    logger.error({ error }, 'Fatal error');
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    process.exit(1);
  }
);
