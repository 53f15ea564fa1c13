/**
 * Process-wide store + runner shared by the route handlers.
 * Kept on globalThis so dev hot reloads don't drop imported threads.
 */

import { processedDir, rawDir } from './env';
import { publishRun, readRawDir } from './files';
import { DocumentStore, PipelineRunner } from './store';

export type AppState = {
  store: DocumentStore;
  runner: PipelineRunner;
  rawDir: string;
  processedDir: string;
};

export type StateOptions = {
  rawDir?: string;
  processedDir?: string;
};

const globalForState = globalThis as typeof globalThis & { threadtally?: AppState };

function createState(options: StateOptions = {}): AppState {
  const dirs = {
    rawDir: options.rawDir ?? rawDir,
    processedDir: options.processedDir ?? processedDir,
  };

  const store = new DocumentStore();
  const { batches, failed } = readRawDir(dirs.rawDir);
  for (const batch of batches) {
    store.add(batch);
  }
  if (batches.length > 0 || failed.length > 0) {
    console.log(`[import] Loaded ${batches.length} batches from ${dirs.rawDir} (${failed.length} unreadable)`);
  }

  const runner = new PipelineRunner(store, {
    publish: run => {
      publishRun(dirs.processedDir, run);
    },
  });

  return { store, runner, ...dirs };
}

export function getState(): AppState {
  const existing = globalForState.threadtally;
  if (existing) return existing;

  const state = createState();
  globalForState.threadtally = state;
  return state;
}

/**
 * Replace the shared state, e.g. to point it at other data directories
 */
export function resetState(options: StateOptions = {}): AppState {
  const state = createState(options);
  globalForState.threadtally = state;
  return state;
}
