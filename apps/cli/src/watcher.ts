import { watch } from 'chokidar';

export interface DbWatcher {
  close(): Promise<void>;
}

/**
 * Call `onChange` whenever another process writes the database. Writes land
 * in the WAL file first, so both files are watched.
 */
export function startDbWatcher(dbPath: string, onChange: () => void): DbWatcher {
  const watcher = watch([dbPath, `${dbPath}-wal`], {
    persistent: true,
    ignoreInitial: true,
    // Debounce rapid changes (e.g. multiple writes in a transaction)
    awaitWriteFinish: {
      stabilityThreshold: 300,
      pollInterval: 100,
    },
  });

  watcher.on('add', onChange);
  watcher.on('change', onChange);

  return {
    close: () => watcher.close(),
  };
}
