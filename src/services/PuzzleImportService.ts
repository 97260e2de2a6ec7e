/**
 * PuzzleImportService
 * The import pipeline: resolve the starting position, convert the solution to
 * SAN, gate it on length, skip duplicates, pick title and description, compose
 * the rows and upsert them.
 *
 * Validation failures (illegal move, length) end the run as "skipped" and are
 * never thrown. Source and store failures are thrown as PipelineErrors.
 */

import { config, type PlyConvention, type PuzzleSourceMode } from '../config/index.js';
import { THEME_CURSOR_NAME, TITLE_CURSOR_NAME } from '../config/puzzleConstants.js';
import type { PuzzleSource } from '../sources/LichessPuzzleSource.js';
import type {
  ImportOutcome,
  PuzzlePreview,
  RawPuzzlePayload,
  RetentionReport,
  RotationCursor,
} from '../types/puzzle.types.js';
import { sleep } from '../utils/async.js';
import { ConfigError, IllegalSolutionMoveError, SolutionTooLongError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { AcceptanceGateService, acceptanceGateService } from './AcceptanceGateService.js';
import { NotationConverterService, notationConverterService } from './NotationConverterService.js';
import { PositionResolverService, positionResolverService } from './PositionResolverService.js';
import { PuzzleMetadataService, puzzleMetadataService } from './PuzzleMetadataService.js';
import type { PuzzleStorageService } from './PuzzleStorageService.js';
import { RecordComposerService, composeId, recordComposerService, serializeBoard } from './RecordComposerService.js';

const importLogger = logger.child({ service: 'PuzzleImport' });

export interface ImportDependencies {
  storage: PuzzleStorageService;
  source?: PuzzleSource;
  resolver?: PositionResolverService;
  converter?: NotationConverterService;
  gate?: AcceptanceGateService;
  metadata?: PuzzleMetadataService;
  composer?: RecordComposerService;
}

export interface ImportOptions {
  mode?: PuzzleSourceMode;
  plyConvention?: PlyConvention;
  candidateAttempts?: number;
  candidateDelayMs?: number;
  // Inclusive; puzzles without a rating are not filtered. null disables the check.
  ratingRange?: RatingRange | null;
}

export interface RatingRange {
  min: number;
  max: number;
}

export interface ProcessContext {
  theme?: string;
}

export interface RunResult {
  outcome: ImportOutcome | null;
  retention: RetentionReport;
  theme: string | null;
}

export class PuzzleImportService {
  private readonly storage: PuzzleStorageService;
  private readonly source: PuzzleSource | undefined;
  private readonly resolver: PositionResolverService;
  private readonly converter: NotationConverterService;
  private readonly gate: AcceptanceGateService;
  private readonly metadata: PuzzleMetadataService;
  private readonly composer: RecordComposerService;

  private readonly mode: PuzzleSourceMode;
  private readonly plyConvention: PlyConvention;
  private readonly candidateAttempts: number;
  private readonly candidateDelayMs: number;
  private readonly ratingRange: RatingRange | null;

  constructor(deps: ImportDependencies, options: ImportOptions = {}) {
    this.storage = deps.storage;
    this.source = deps.source;
    this.resolver = deps.resolver ?? positionResolverService;
    this.converter = deps.converter ?? notationConverterService;
    this.gate = deps.gate ?? acceptanceGateService;
    this.metadata = deps.metadata ?? puzzleMetadataService;
    this.composer = deps.composer ?? recordComposerService;

    this.mode = options.mode ?? config.sourceMode;
    this.plyConvention = options.plyConvention ?? config.plyConvention;
    this.candidateAttempts = Math.max(1, options.candidateAttempts ?? config.candidateAttempts);
    this.candidateDelayMs = options.candidateDelayMs ?? config.candidateDelayMs;
    this.ratingRange =
      options.ratingRange === undefined ? { min: config.minRating, max: config.maxRating } : options.ratingRange;
  }

  /**
   * Everything up to the store: position, SAN, acceptance and description.
   */
  preview(payload: RawPuzzlePayload): PuzzlePreview {
    const position = this.resolver.resolvePayload(payload, { convention: this.plyConvention });
    const conversion = this.converter.convert(position.fen, payload.puzzle.solution);
    // A failed conversion is rejected before the gate
    const decision = conversion.failure ? null : this.gate.evaluate(conversion.san);

    return {
      puzzleId: composeId(payload),
      position,
      board: serializeBoard(position.fen),
      conversion,
      decision,
      description: decision?.accepted ? this.metadata.describe(conversion.san) : null,
    };
  }

  async processPayload(payload: RawPuzzlePayload, context: ProcessContext = {}): Promise<ImportOutcome> {
    const id = composeId(payload);
    const sourceId = payload.puzzle.id ?? id;

    const { rating } = payload.puzzle;
    if (this.ratingRange && rating !== undefined && (rating < this.ratingRange.min || rating > this.ratingRange.max)) {
      const message = `Rating ${rating} is outside ${this.ratingRange.min}-${this.ratingRange.max}`;
      importLogger.info({ puzzleId: id, rating }, message);
      return { status: 'skipped', puzzleId: id, reason: 'rating-out-of-range', message };
    }

    const position = this.resolver.resolvePayload(payload, { convention: this.plyConvention });
    importLogger.debug(
      { puzzleId: id, fen: position.fen, plies: position.pliesApplied, source: position.source },
      'Resolved starting position'
    );

    const conversion = this.converter.convert(position.fen, payload.puzzle.solution);
    if (conversion.failure) {
      const { index, move, reason } = conversion.failure;
      const error = new IllegalSolutionMoveError(index, move, reason);
      importLogger.warn({ puzzleId: id, index, move, reason, converted: conversion.san }, error.message);
      return { status: 'skipped', puzzleId: id, reason: 'illegal-move', message: error.message };
    }

    const decision = this.gate.evaluate(conversion.san);
    if (!decision.accepted) {
      const message =
        decision.reason === 'too-long'
          ? new SolutionTooLongError(decision.halfMoves, this.gate.limits.maxFullMoves).message
          : this.gate.reasonText(decision);
      importLogger.info({ puzzleId: id, reason: decision.reason, halfMoves: decision.halfMoves }, message);
      return { status: 'skipped', puzzleId: id, reason: decision.reason, message };
    }

    if (await this.storage.exists(id)) {
      importLogger.info({ puzzleId: id }, 'Puzzle already stored, skipping upload');
      return { status: 'duplicate', puzzleId: id };
    }

    const titleCursor = await this.storage.readCursor(TITLE_CURSOR_NAME);
    const { title, cursor: nextTitleCursor } = this.metadata.nextTitle(titleCursor);
    const description = this.metadata.describe(conversion.san);

    const records = this.composer.compose({
      id,
      sourceId,
      position,
      sanMoves: conversion.san,
      title,
      description,
      rating: payload.puzzle.rating,
      theme: context.theme,
    });

    await this.storage.upsert(records.puzzle, records.solution);
    const cursorPersisted = await this.storage.persistCursor(TITLE_CURSOR_NAME, titleCursor, nextTitleCursor);

    importLogger.info({ puzzleId: id, title, description, solution: conversion.san }, 'Puzzle uploaded');

    return {
      status: 'uploaded',
      puzzleId: id,
      title,
      description,
      solution: conversion.san,
      cursorPersisted,
    };
  }

  /**
   * One scheduled run: retention first, then up to `candidateAttempts` puzzles
   * from the source until one is uploaded.
   */
  async run(): Promise<RunResult> {
    const source = this.source;
    if (!source) {
      throw new ConfigError('No puzzle source configured');
    }

    const retention = await this.storage.retire();

    let theme: string | null = null;
    let themeCursor: RotationCursor | null = null;
    let nextThemeCursor: RotationCursor | null = null;
    if (this.mode === 'theme') {
      themeCursor = await this.storage.readCursor(THEME_CURSOR_NAME);
      const step = this.metadata.nextTheme(themeCursor);
      theme = step.theme;
      nextThemeCursor = step.cursor;
      importLogger.info({ theme }, 'Selected puzzle theme');
    }

    let outcome: ImportOutcome | null = null;

    for (let attempt = 1; attempt <= this.candidateAttempts; attempt++) {
      importLogger.info({ attempt, of: this.candidateAttempts, theme }, 'Fetching puzzle candidate');
      const payload = this.mode === 'daily' ? await source.fetchDaily() : await source.fetchNext(theme ?? undefined);

      outcome = await this.processPayload(payload, { theme: theme ?? undefined });

      if (outcome.status === 'uploaded') {
        if (nextThemeCursor) {
          await this.storage.persistCursor(THEME_CURSOR_NAME, themeCursor, nextThemeCursor);
        }
        break;
      }

      // The daily puzzle is the same on every request
      if (this.mode === 'daily') break;

      if (attempt < this.candidateAttempts && this.candidateDelayMs > 0) {
        await sleep(this.candidateDelayMs);
      }
    }

    if (outcome && outcome.status !== 'uploaded') {
      importLogger.info({ status: outcome.status, puzzleId: outcome.puzzleId }, 'No puzzle uploaded this run');
    }

    return { outcome, retention, theme };
  }
}
