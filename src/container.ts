/**
 * Builds the services a process needs, around one store client created at start-up
 */

import { config } from './config/index.js';
import { PuzzleImportService } from './services/PuzzleImportService.js';
import { PuzzleStorageService } from './services/PuzzleStorageService.js';
import { LichessPuzzleSource } from './sources/LichessPuzzleSource.js';
import { SupabasePuzzleStore, createSupabaseClient } from './store/SupabasePuzzleStore.js';

export interface Services {
  storage: PuzzleStorageService;
  importService: PuzzleImportService;
}

export function createServices(): Services {
  const store = new SupabasePuzzleStore(createSupabaseClient(config));
  const storage = new PuzzleStorageService(store);
  const importService = new PuzzleImportService({ storage, source: new LichessPuzzleSource() });

  return { storage, importService };
}
