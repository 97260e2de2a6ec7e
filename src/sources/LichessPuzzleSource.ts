/**
 * Lichess puzzle API client
 */

import { config } from '../config/index.js';
import type { RawPuzzlePayload } from '../types/puzzle.types.js';
import { InvalidPayloadError, SourceUnavailableError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { rawPuzzlePayloadSchema } from '../utils/validation.js';
import { fetchWithRetry } from './fetchWithRetry.js';

const sourceLogger = logger.child({ service: 'LichessPuzzleSource' });

export interface PuzzleSource {
  fetchDaily(): Promise<RawPuzzlePayload>;
  fetchById(id: string): Promise<RawPuzzlePayload>;
  fetchNext(theme?: string): Promise<RawPuzzlePayload>;
}

export interface LichessSourceOptions {
  baseUrl?: string;
  token?: string;
  difficulty?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export class LichessPuzzleSource implements PuzzleSource {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly difficulty: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: LichessSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.lichessBaseUrl).replace(/\/+$/, '');
    this.token = options.token ?? config.lichessToken;
    this.difficulty = options.difficulty ?? config.sourceDifficulty;
    this.timeoutMs = options.timeoutMs ?? config.fetchTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.fetchMaxRetries;
    this.retryDelayMs = options.retryDelayMs ?? config.fetchRetryDelayMs;
  }

  fetchDaily(): Promise<RawPuzzlePayload> {
    return this.get('/api/puzzle/daily');
  }

  fetchById(id: string): Promise<RawPuzzlePayload> {
    return this.get(`/api/puzzle/${encodeURIComponent(id)}`);
  }

  /**
   * Random puzzle, optionally restricted to a theme ("angle" in the Lichess API)
   */
  fetchNext(theme?: string): Promise<RawPuzzlePayload> {
    const params = new URLSearchParams();
    if (theme) params.set('angle', theme);
    if (this.difficulty) params.set('difficulty', this.difficulty);
    const query = params.toString();
    return this.get(`/api/puzzle/next${query ? `?${query}` : ''}`);
  }

  private async get(path: string): Promise<RawPuzzlePayload> {
    const url = `${this.baseUrl}${path}`;
    sourceLogger.debug({ url }, 'Fetching puzzle');

    let res: Response;
    try {
      res = await fetchWithRetry(
        url,
        {
          headers: {
            Accept: 'application/json',
            ...(this.token ? { Authorization: `Bearer ${this.token}` } : {}),
          },
        },
        {
          timeoutMs: this.timeoutMs,
          maxRetries: this.maxRetries,
          retryDelayMs: this.retryDelayMs,
          onRetry: ({ attempt, status, error, waitMs }) =>
            sourceLogger.warn(
              { url, attempt, status, error: error === undefined ? undefined : errorMessage(error), waitMs },
              'Puzzle fetch failed, retrying'
            ),
        }
      );
    } catch (error) {
      sourceLogger.error({ url, error: errorMessage(error) }, 'Puzzle source unreachable');
      throw new SourceUnavailableError(`Puzzle source unreachable: ${errorMessage(error)}`, { cause: error });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      sourceLogger.error({ url, status: res.status, body: body.slice(0, 200) }, 'Puzzle source returned an error');
      throw new SourceUnavailableError(`Puzzle source returned ${res.status}`, { status: res.status });
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new InvalidPayloadError(`Puzzle source returned invalid JSON: ${errorMessage(error)}`);
    }

    const parsed = rawPuzzlePayloadSchema.safeParse(json);
    if (!parsed.success) {
      sourceLogger.error({ url, issues: parsed.error.issues }, 'Unexpected puzzle payload');
      throw new InvalidPayloadError('Puzzle payload does not match the expected shape', parsed.error.issues);
    }

    return parsed.data;
  }
}
