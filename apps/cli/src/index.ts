#!/usr/bin/env node

import { createContext } from './context.js';
import { createProgram } from './program.js';
import * as out from './output.js';

// Initialize database and services
const ctx = createContext();

if (ctx.store.loadError) {
  out.warning(`Saved tasks could not be read and were skipped: ${ctx.store.loadError.message}`);
  const kept = ctx.snapshots.createSnapshot('unreadable data found');
  if (kept) out.warning(`The stored rows were kept in backup ${kept.id}. Use 'taskdeck backup list' to find a copy to restore.`);
}

await createProgram(ctx).parseAsync();
