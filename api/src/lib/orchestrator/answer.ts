/**
 * Question Answerer
 *
 * Boundary pipeline around the pure core:
 * draft (LLM or keywords) → sanitize → compile → execute → summarize →
 * narrate. Owns the caches and every piece of I/O.
 */

import type { AnswerPayload, ErrorPayload, ResponsePayload } from '../../../../shared/types/api';
import type {
  CompileError,
  CompileResult,
  CompiledQuery,
  Intent,
} from '../../../../shared/types/intent';
import type { DataRange, MeasurementRow } from '../../../../shared/types/measurements';
import { LRUCache, type CacheStats } from '../cache';
import type { MeasurementStore } from '../db/store';
import type { Gazetteer } from '../gazetteer';
import type { LLMClient } from '../llm/types';
import type { DatasetSnapshot, SchemaSnapshotProvider } from '../schema/provider';
import {
  compileAvailablePeriodsQuery,
  compileIntent,
  compileTrackQuery,
  type CompileContext,
} from './compiler';
import { IntentParser, type DraftResult } from './parser';
import { sanitizeIntent } from './sanitizer';
import { summarizeResults, type ResultDigest } from './summarizer';

export interface AnswererOptions {
  parseCacheSize?: number;
  responseCacheSize?: number;
  responseCacheTtlMs?: number;
  /** Attach the sanitized intent to answers */
  showIntentDebug?: boolean;
  /** Let the language model phrase the final summary */
  narrate?: boolean;
  now?: () => Date;
}

export interface AnswererDeps {
  llm: LLMClient;
  store: MeasurementStore;
  snapshots: SchemaSnapshotProvider;
  gazetteer: Gazetteer;
}

type IntentCompiler = (intent: Intent, context: CompileContext) => CompileResult;

export interface AnswererStats {
  answered: number;
  fallbackDrafts: number;
  parse: CacheStats;
  response: CacheStats;
}

/**
 * Database trouble outside the core. `stage` tells the route whether the
 * database could not be reached at all or a compiled statement failed.
 */
export class BackendError extends Error {
  constructor(
    message: string,
    readonly stage: 'schema' | 'execution',
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'BackendError';
  }
}

/**
 * User-facing payload for a compile error
 */
export function toErrorPayload(error: CompileError, data: MeasurementRow[] = []): ErrorPayload {
  return {
    query_type: 'Error',
    error_kind: error.kind,
    summary: error.message,
    data,
  };
}

function formatDay(date: Date | null): string | undefined {
  return date ? date.toISOString().slice(0, 10) : undefined;
}

/**
 * "2019-01-03 to 2024-11-30", or "unknown" for an empty table
 */
export function formatDataRange(range: DataRange): string {
  const min = formatDay(range.min);
  const max = formatDay(range.max);
  return min && max ? `${min} to ${max}` : 'unknown';
}

function elapsed(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

export class QuestionAnswerer {
  private parser: IntentParser;
  private parseCache: LRUCache<DraftResult>;
  private responseCache: LRUCache<ResponsePayload>;
  private now: () => Date;
  private answered = 0;
  private fallbackDrafts = 0;

  constructor(
    private deps: AnswererDeps,
    private options: AnswererOptions = {}
  ) {
    this.parser = new IntentParser(deps.llm, deps.gazetteer);
    this.parseCache = new LRUCache<DraftResult>(options.parseCacheSize ?? 200, 60 * 60 * 1000);
    this.responseCache = new LRUCache<ResponsePayload>(
      options.responseCacheSize ?? 100,
      options.responseCacheTtlMs ?? 15 * 60 * 1000
    );
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Answer a natural-language question
   */
  async answer(question: string): Promise<ResponsePayload> {
    const cached = this.responseCache.get(question);
    if (cached) {
      return cached;
    }

    const start = performance.now();
    const dataset = await this.dataset();

    let draft = this.parseCache.get(question);
    if (!draft) {
      draft = await this.parser.draft(question, dataset.schema);
      if (draft.source === 'llm') {
        this.parseCache.set(question, draft);
      } else {
        this.fallbackDrafts++;
      }
    }
    const parseTimeMs = elapsed(start);

    const intent = this.sanitize(draft.draft, question, dataset);
    const payload = await this.respond(intent, dataset, question);

    this.answered++;
    console.log(
      `  ${payload.query_type} answered in ${elapsed(start)}ms (draft: ${draft.source}, ${parseTimeMs}ms)`
    );
    this.responseCache.set(question, payload);
    return payload;
  }

  /**
   * Answer a caller-supplied draft intent; the question text, when given,
   * feeds the sanitizer's pattern backstops
   */
  async answerIntent(raw: unknown, question = ''): Promise<ResponsePayload> {
    const dataset = await this.dataset();
    const intent = this.sanitize(raw, question, dataset);
    return this.respond(intent, dataset, question);
  }

  /**
   * A float's path, one position per cycle, from a draft intent naming the float
   */
  async answerTrack(raw: unknown): Promise<ResponsePayload> {
    const dataset = await this.dataset();
    const intent = this.sanitize(raw, '', dataset);
    return this.respond(intent, dataset, '', compileTrackQuery);
  }

  /**
   * Distinct (year, month) pairs with data, newest first
   */
  async listPeriods(): Promise<Array<{ year: number; month: number }>> {
    const rows = await this.execute(compileAvailablePeriodsQuery());
    return rows.flatMap((row) =>
      typeof row.year === 'number' && typeof row.month === 'number'
        ? [{ year: row.year, month: row.month }]
        : []
    );
  }

  getStats(): AnswererStats {
    return {
      answered: this.answered,
      fallbackDrafts: this.fallbackDrafts,
      parse: this.parseCache.getStats(),
      response: this.responseCache.getStats(),
    };
  }

  clearCaches(): void {
    this.parseCache.clear();
    this.responseCache.clear();
  }

  // ==========================================================================
  // Pipeline stages
  // ==========================================================================

  private async dataset(): Promise<DatasetSnapshot> {
    try {
      return await this.deps.snapshots.get();
    } catch (error) {
      throw new BackendError('Measurement database is unavailable', 'schema', error);
    }
  }

  private sanitize(raw: unknown, question: string, dataset: DatasetSnapshot): Intent {
    return sanitizeIntent(raw, question, {
      schema: dataset.schema,
      gazetteer: this.deps.gazetteer,
      now: this.now(),
    });
  }

  private compileContext(dataset: DatasetSnapshot): CompileContext {
    return {
      schema: dataset.schema,
      temporal: {
        datasetLatest: dataset.range.max,
        currentYear: this.now().getUTCFullYear(),
      },
      knownLocations: this.deps.gazetteer.listKnownNames(),
    };
  }

  private async respond(
    intent: Intent,
    dataset: DatasetSnapshot,
    question: string,
    compile: IntentCompiler = compileIntent
  ): Promise<ResponsePayload> {
    const compiled = compile(intent, this.compileContext(dataset));
    if (!compiled.success) {
      return this.recover(compiled.error);
    }

    const { query } = compiled;
    const rows = await this.execute(query);
    const digest = summarizeResults(rows, query, intent);
    const summary = await this.narrate(question, digest);

    const payload: AnswerPayload = {
      query_type: query.queryType,
      sql_query: query.sql,
      summary,
      data: rows,
      data_range: formatDataRange(dataset.range),
      ...(this.options.showIntentDebug && { intent_debug: intent }),
    };
    return payload;
  }

  /**
   * A missing float id is recoverable: list candidate floats instead
   */
  private async recover(error: CompileError): Promise<ErrorPayload> {
    if (error.kind !== 'MissingFloatIdentifier') {
      return toErrorPayload(error);
    }

    const candidates = await this.execute(error.candidateQuery);
    const ids = candidates.flatMap((row) =>
      typeof row.float_id === 'number' || typeof row.float_id === 'string'
        ? [String(row.float_id)]
        : []
    );
    const suggestion =
      ids.length > 0
        ? ` Try one of these floats: ${ids.join(', ')}.`
        : ' No floats match the other filters either.';
    return toErrorPayload({ ...error, message: error.message + suggestion }, candidates);
  }

  private async execute(query: CompiledQuery): Promise<MeasurementRow[]> {
    try {
      return await this.deps.store.run({ sql: query.sql, params: query.params });
    } catch (error) {
      console.error('Query execution failed:', error);
      throw new BackendError('Query execution failed', 'execution', error);
    }
  }

  /**
   * Phrase the digest as a short answer; the digest itself is the fallback
   */
  private async narrate(question: string, digest: ResultDigest): Promise<string> {
    if (!this.options.narrate || !question || digest.rowCount === 0) {
      return digest.text;
    }

    const prompt = `You are an oceanography assistant. Answer the question in two or three sentences using only these facts. Do not invent numbers.

Question: "${question.replace(/"/g, "'")}"

Facts:
${digest.text}

Answer:`;
    try {
      const text = (await this.deps.llm.complete(prompt, { temperature: 0.3, maxTokens: 300 })).trim();
      return text || digest.text;
    } catch (error) {
      console.warn(
        '  Narration unavailable, returning digest:',
        error instanceof Error ? error.message : error
      );
      return digest.text;
    }
  }
}
