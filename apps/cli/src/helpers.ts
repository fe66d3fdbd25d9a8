/**
 * CLI helpers: error handling, argument parsing.
 */

import type { Priority as PriorityType, TaskStore, SnapshotManager } from '@taskdeck/core';
import { Priority, parseDate, parseTime } from '@taskdeck/core';
import * as out from './output.js';

/**
 * Parse a priority string into a Priority value. Returns null if unknown.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  switch (level.toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/** Like parsePriorityArg, but an unknown level is an error */
export function requirePriority(level: string): PriorityType {
  const priority = parsePriorityArg(level);
  if (priority == null) throw new Error(`Unknown priority '${level}'. Use high, medium or low`);
  return priority;
}

/** Parse a --due value into yyyy-MM-dd, or fail with a readable message */
export function requireDate(input: string, now?: Date): string {
  const date = parseDate(input, now);
  if (date == null) throw new Error(`Could not understand the date '${input}'`);
  return date;
}

/** Parse a --time value into HH:mm, or fail with a readable message */
export function requireTime(input: string): string {
  const time = parseTime(input);
  if (time == null) throw new Error(`Could not understand the time '${input}'`);
  return time;
}

/** Parse a positive number of minutes */
export function requireMinutes(input: string): number {
  const minutes = Number(input);
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw new Error(`Lead time must be a positive whole number of minutes, got '${input}'`);
  }
  return minutes;
}

/**
 * Run a command action, printing any thrown error and flagging the
 * process exit code.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

export interface MutationDeps {
  store: TaskStore;
  snapshots: SnapshotManager;
}

/**
 * Run a command that changes tasks: snapshot first (labelled "before
 * <action>"), then report a failed save as an error.
 */
export function $mutate(deps: MutationDeps, action: string, fn: () => void): Promise<void> {
  return $try(() => {
    deps.snapshots.createSnapshot(`before ${action}`);
    fn();
    const failure = deps.store.persistenceError;
    if (failure) throw new Error(`Changes could not be saved: ${failure.message}`);
  });
}
