/**
 * Supabase (Postgres) backed puzzle store
 *
 * Tables are described in supabase/schema.sql. Column names are snake_case;
 * the mapping to the camelCase records happens here and nowhere else.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Config } from '../config/index.js';
import type {
  PuzzleRecord,
  RotationCursor,
  SolutionRecord,
  StoredPuzzleSummary,
} from '../types/puzzle.types.js';
import { StoreUnavailableError } from '../utils/errors.js';
import type { PairedCollection, PuzzleStore } from './PuzzleStore.js';

const PAGE_SIZE = 500;
const UNIQUE_VIOLATION = '23505';

const puzzleSummaryRowSchema = z.object({
  id: z.string(),
  created_at: z.unknown(),
});

const idRowSchema = z.object({ id: z.string() });

const cursorRowSchema = z.object({
  last_index: z.number().int(),
  names: z.array(z.string()).nullable().optional(),
});

interface StoreErrorLike {
  message: string;
  code?: string;
}

export function toPuzzleRow(record: PuzzleRecord) {
  return {
    id: record.id,
    puzzle_id: record.puzzleId,
    title: record.title,
    description: record.description,
    board: record.board,
    fen: record.fen,
    first_move: record.firstMove,
    created_at: record.createdAt,
    created_by: record.createdBy,
    has_solutions: record.hasSolutions,
    date: record.date,
    rating: record.rating,
    theme: record.theme,
  };
}

export function toSolutionRow(record: SolutionRecord) {
  return {
    id: record.id,
    puzzle_id: record.puzzleId,
    solutions: record.solutions,
    last_updated: record.lastUpdated,
  };
}

export function cursorFromRow(row: unknown): RotationCursor {
  const parsed = cursorRowSchema.parse(row);
  return parsed.names ? { lastIndex: parsed.last_index, names: parsed.names } : { lastIndex: parsed.last_index };
}

function fail(operation: string, error: StoreErrorLike): never {
  throw new StoreUnavailableError(`Supabase ${operation} failed: ${error.message}`, error);
}

/**
 * fetch that aborts every request after `timeoutMs`. PostgREST hands the abort
 * back as a query error, which the store raises as StoreUnavailableError.
 */
export function withRequestTimeout(fetchImpl: typeof fetch, timeoutMs: number): typeof fetch {
  return (input, init) => fetchImpl(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
}

export function createSupabaseClient(
  settings: Pick<Config, 'supabaseUrl' | 'supabaseServiceKey' | 'storeTimeoutMs'>,
  fetchImpl: typeof fetch = fetch
): SupabaseClient {
  return createClient(settings.supabaseUrl, settings.supabaseServiceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    global: {
      fetch: withRequestTimeout(fetchImpl, settings.storeTimeoutMs),
    },
  });
}

export class SupabasePuzzleStore implements PuzzleStore {
  constructor(private readonly client: SupabaseClient) {}

  async hasPuzzle(id: string): Promise<boolean> {
    const { count, error } = await this.client
      .from('puzzles')
      .select('id', { count: 'exact', head: true })
      .eq('id', id);

    if (error) fail('puzzle lookup', error);
    return (count ?? 0) > 0;
  }

  async writePuzzle(record: PuzzleRecord): Promise<void> {
    const { error } = await this.client.from('puzzles').upsert(toPuzzleRow(record), { onConflict: 'id' });
    if (error) fail('puzzle write', error);
  }

  async writeSolution(record: SolutionRecord): Promise<void> {
    const { error } = await this.client.from('solutions').upsert(toSolutionRow(record), { onConflict: 'id' });
    if (error) fail('solution write', error);
  }

  async listPuzzles(): Promise<StoredPuzzleSummary[]> {
    const summaries: StoredPuzzleSummary[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from('puzzles')
        .select('id, created_at')
        .order('id')
        .range(from, from + PAGE_SIZE - 1);

      if (error) fail('puzzle scan', error);

      const rows = z.array(puzzleSummaryRowSchema).parse(data ?? []);
      summaries.push(...rows.map((row) => ({ id: row.id, createdAt: row.created_at })));

      if (rows.length < PAGE_SIZE) break;
    }

    return summaries;
  }

  async listSolutionIds(): Promise<string[]> {
    const ids: string[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from('solutions')
        .select('id')
        .order('id')
        .range(from, from + PAGE_SIZE - 1);

      if (error) fail('solution scan', error);

      const rows = z.array(idRowSchema).parse(data ?? []);
      ids.push(...rows.map((row) => row.id));

      if (rows.length < PAGE_SIZE) break;
    }

    return ids;
  }

  async deleteRecord(collection: PairedCollection, id: string): Promise<void> {
    const { error } = await this.client.from(collection).delete().eq('id', id);
    if (error) fail(`${collection} delete`, error);
  }

  async readCursor(name: string): Promise<RotationCursor | null> {
    const { data, error } = await this.client
      .from('metadata')
      .select('last_index, names')
      .eq('name', name)
      .maybeSingle();

    if (error) fail('cursor read', error);
    return data ? cursorFromRow(data) : null;
  }

  async compareAndSetCursor(name: string, expectedLastIndex: number | null, next: RotationCursor): Promise<boolean> {
    const row = {
      name,
      last_index: next.lastIndex,
      names: next.names ?? null,
      updated_at: new Date().toISOString(),
    };

    if (expectedLastIndex === null) {
      const { error } = await this.client.from('metadata').insert(row);
      if (error?.code === UNIQUE_VIOLATION) return false;
      if (error) fail('cursor insert', error);
      return true;
    }

    const { data, error } = await this.client
      .from('metadata')
      .update(row)
      .eq('name', name)
      .eq('last_index', expectedLastIndex)
      .select('name');

    if (error) fail('cursor update', error);
    return (data ?? []).length === 1;
  }
}
