#!/usr/bin/env tsx
/**
 * Seed the configured notes file with sample notes.
 * Usage: npm run demo [-- --path <file>]
 * Or: tsx src/demo.ts
 */

import { applyArgs, parseArgs } from './cli.js';
import { errorMessage } from './core/errors.js';
import { NoteStore } from './services/note-store.js';
import { createBackend } from './storage/create-backend.js';
import { loadConfig } from './utils/config.js';
import logger from './utils/logger.js';

const SAMPLE_NOTES: ReadonlyArray<{ title: string; content: string }> = [
  {
    title: 'Welcome to termnotes',
    content: [
      '# Welcome',
      '',
      'Notes are written in **markdown** and rendered in the preview pane.',
      '',
      '- Press `n` to create a note',
      '- Press `e` to edit the selected note',
      '- Press `d` to delete it',
    ].join('\n'),
  },
  {
    title: 'Shopping list',
    content: ['- [x] Coffee', '- [ ] Bread', '- [ ] Apples', '- [ ] Olive oil'].join('\n'),
  },
  {
    title: 'Snippet: retry loop',
    content: [
      'A small helper that retries a promise:',
      '',
      '```ts',
      'for (let attempt = 1; attempt <= 3; attempt++) {',
      '  try {',
      '    return await task();',
      '  } catch (error) {',
      '    if (attempt === 3) throw error;',
      '  }',
      '}',
      '```',
    ].join('\n'),
  },
  {
    title: 'Reading notes',
    content: [
      '## Ideas worth keeping',
      '',
      '> Write things down before they slip away.',
      '',
      '1. Skim first',
      '2. Take notes on the second pass',
      '3. Summarize in *one* paragraph',
    ].join('\n'),
  },
];

async function seed(): Promise<void> {
  const config = loadConfig();
  const storage = applyArgs(config.storage, parseArgs(process.argv.slice(2)));
  logger.info({ notesPath: storage.notesPath, backend: storage.backend }, 'Seeding demo notes');

  const store = await NoteStore.open({
    backend: await createBackend(storage),
    syncFailurePolicy: 'hard',
  });

  for (const sample of SAMPLE_NOTES) {
    const note = await store.create(sample.title, sample.content);
    console.log(`Created note ${note.id}: ${note.title}`);
  }

  console.log(`${store.count()} notes in ${storage.notesPath}`);
}

seed().catch((error: unknown) => {
  logger.error({ error }, 'Seeding demo notes failed');
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
