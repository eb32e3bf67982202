/**
 * In-process stand-ins shared by the suites: a scripted LLM, a fake
 * measurement store and intent/context builders.
 */

import type { CompileContext } from '../src/lib/orchestrator/compiler';
import type { Intent } from '../../shared/types/intent';
import {
  CANONICAL_COLUMNS,
  type DataRange,
  type MeasurementRow,
} from '../../shared/types/measurements';
import type { MeasurementStore, SqlStatement } from '../src/lib/db/store';
import type { CompletionOptions, LLMClient } from '../src/lib/llm/types';
import { getGazetteer } from '../src/lib/gazetteer';
import { SchemaSnapshot } from '../src/lib/schema/snapshot';

export const FIXED_NOW = new Date('2025-01-15T00:00:00Z');

export function fullSchema(): SchemaSnapshot {
  return new SchemaSnapshot(CANONICAL_COLUMNS);
}

export function makeIntent(overrides: Partial<Intent> = {}): Intent {
  return {
    queryType: 'General',
    metrics: ['temperature'],
    aggregation: 'avg',
    limit: 500,
    locationPredicate: { kind: 'everywhere' },
    ...overrides,
  };
}

export function makeContext(overrides: Partial<CompileContext> = {}): CompileContext {
  return {
    schema: fullSchema(),
    temporal: {
      datasetLatest: new Date('2024-06-30T12:00:00Z'),
      currentYear: 2025,
    },
    knownLocations: getGazetteer().listKnownNames(),
    ...overrides,
  };
}

/**
 * Replies with queued responses in order; an Error entry is thrown
 */
export class ScriptedLLM implements LLMClient {
  readonly prompts: string[] = [];

  constructor(private responses: Array<string | Error> = []) {}

  queue(response: string | Error): void {
    this.responses.push(response);
  }

  async complete(prompt: string, _options?: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    const response = this.responses.shift();
    if (response === undefined) {
      throw new Error('No scripted response left');
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}

export type RowHandler = (statement: SqlStatement) => MeasurementRow[];

/**
 * MeasurementStore that records statements and answers from a handler
 */
export class FakeStore implements MeasurementStore {
  readonly statements: SqlStatement[] = [];
  columns: string[] = [...CANONICAL_COLUMNS];
  range: DataRange = {
    min: new Date('2019-01-03T00:00:00Z'),
    max: new Date('2024-11-30T18:00:00Z'),
  };
  failColumns = false;
  failRun = false;
  columnCalls = 0;

  constructor(private handler: RowHandler = () => []) {}

  setHandler(handler: RowHandler): void {
    this.handler = handler;
  }

  async listColumns(): Promise<string[]> {
    this.columnCalls++;
    if (this.failColumns) {
      throw new Error('connection refused');
    }
    return this.columns;
  }

  async getDataRange(): Promise<DataRange> {
    return this.range;
  }

  async run(statement: SqlStatement): Promise<MeasurementRow[]> {
    this.statements.push(statement);
    if (this.failRun) {
      throw new Error('relation "argo_data" does not exist');
    }
    return this.handler(statement);
  }

  async ping(): Promise<void> {
    if (this.failColumns) {
      throw new Error('connection refused');
    }
  }
}
