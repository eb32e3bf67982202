/**
 * Question Answerer Tests
 *
 * The full boundary pipeline against a scripted model and an in-memory store
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  BackendError,
  QuestionAnswerer,
  formatDataRange,
  type AnswererOptions,
} from '../src/lib/orchestrator/answer';
import { LLMConnectionError } from '../src/lib/llm/types';
import { getGazetteer } from '../src/lib/gazetteer';
import { SchemaSnapshotProvider } from '../src/lib/schema/provider';
import type { SqlStatement } from '../src/lib/db/store';
import type { MeasurementRow } from '../../shared/types/measurements';
import { FIXED_NOW, FakeStore, ScriptedLLM } from './helpers';

const ARABIAN_SEA_DRAFT = JSON.stringify({
  query_type: 'Statistic',
  metrics: ['temperature'],
  aggregation: 'avg',
  location_name: 'arabian sea',
  time_constraint: '2023',
});

const CANDIDATES: MeasurementRow[] = [
  { float_id: 2902115, first_seen: '2023-01-04', last_seen: '2024-10-30', samples: 412 },
  { float_id: 2902116, first_seen: '2023-02-11', last_seen: '2024-11-28', samples: 388 },
];

function rowsFor(statement: SqlStatement): MeasurementRow[] {
  if (statement.sql.includes('GROUP BY "float_id"')) {
    return CANDIDATES;
  }
  if (statement.sql.includes('AVG(NULLIF("temperature"')) {
    return [{ temperature: 27.456 }];
  }
  return [];
}

describe('QuestionAnswerer', () => {
  let store: FakeStore;
  let llm: ScriptedLLM;

  function createAnswerer(options: AnswererOptions = {}): QuestionAnswerer {
    return new QuestionAnswerer(
      { llm, store, snapshots: new SchemaSnapshotProvider(store), gazetteer: getGazetteer() },
      { now: () => FIXED_NOW, ...options }
    );
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    store = new FakeStore(rowsFor);
    llm = new ScriptedLLM();
  });

  describe('answer', () => {
    it('answers a question from the model draft', async () => {
      llm.queue(ARABIAN_SEA_DRAFT);
      const answerer = createAnswerer();

      const payload = await answerer.answer('Average temperature in the Arabian Sea in 2023');

      expect(payload).toMatchObject({
        query_type: 'Statistic',
        summary: 'Statistic query returned 1 row.\ntemperature: 27.46 °C.',
        data: [{ temperature: 27.456 }],
        data_range: '2019-01-03 to 2024-11-30',
      });
      expect(payload).not.toHaveProperty('intent_debug');
      expect(store.statements).toHaveLength(1);
      expect(store.statements[0]?.params).toEqual([5, 25, 50, 75, '2023-01-01', '2024-01-01']);
    });

    it('serves a repeated question from the response cache', async () => {
      llm.queue(ARABIAN_SEA_DRAFT);
      const answerer = createAnswerer();

      const first = await answerer.answer('Average temperature in the Arabian Sea in 2023');
      const second = await answerer.answer('  AVERAGE temperature in the arabian   sea in 2023');

      expect(second).toBe(first);
      expect(llm.prompts).toHaveLength(1);
      expect(store.statements).toHaveLength(1);
      expect(answerer.getStats()).toMatchObject({
        answered: 1,
        fallbackDrafts: 0,
        response: { hits: 1, misses: 1, size: 1 },
        parse: { size: 1 },
      });
    });

    it('re-asks the model after the caches are cleared', async () => {
      llm.queue(ARABIAN_SEA_DRAFT);
      llm.queue(ARABIAN_SEA_DRAFT);
      const answerer = createAnswerer();

      await answerer.answer('Average temperature in the Arabian Sea in 2023');
      answerer.clearCaches();
      await answerer.answer('Average temperature in the Arabian Sea in 2023');

      expect(llm.prompts).toHaveLength(2);
    });

    it('falls back to keywords and does not cache the fallback draft', async () => {
      llm.queue(new LLMConnectionError('connect ECONNREFUSED', 'http://localhost:11434'));
      const answerer = createAnswerer();

      const payload = await answerer.answer('temperature vs salinity');

      expect(payload.query_type).toBe('Scatter');
      expect(payload.summary).toBe('No data found for the requested filters.');
      expect(answerer.getStats().fallbackDrafts).toBe(1);
      expect(answerer.getStats().parse.size).toBe(0);
    });

    it('narrates the digest when enabled', async () => {
      llm.queue(ARABIAN_SEA_DRAFT);
      llm.queue('  The Arabian Sea averaged 27.46 °C in 2023.  ');
      const answerer = createAnswerer({ narrate: true });

      const payload = await answerer.answer('Average temperature in the Arabian Sea in 2023');

      expect(payload.summary).toBe('The Arabian Sea averaged 27.46 °C in 2023.');
      expect(llm.prompts[1]).toContain('Facts:\nStatistic query returned 1 row.\ntemperature: 27.46 °C.');
    });

    it('keeps the digest when narration fails', async () => {
      llm.queue(ARABIAN_SEA_DRAFT);
      llm.queue(new Error('timeout'));
      const answerer = createAnswerer({ narrate: true });

      const payload = await answerer.answer('Average temperature in the Arabian Sea in 2023');

      expect(payload.summary).toBe('Statistic query returned 1 row.\ntemperature: 27.46 °C.');
    });

    it('does not narrate an empty result', async () => {
      llm.queue('{"query_type": "General", "metrics": ["nitrate"]}');
      const answerer = createAnswerer({ narrate: true });

      await answerer.answer('show nitrate');

      expect(llm.prompts).toHaveLength(1);
    });

    it('reports an unreachable database as a schema failure', async () => {
      store.failColumns = true;
      const answerer = createAnswerer();

      const error = await answerer.answer('average salinity').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({ stage: 'schema', message: 'Measurement database is unavailable' });
    });
  });

  describe('answerIntent', () => {
    it('suggests candidate floats when a trajectory has no float id', async () => {
      const answerer = createAnswerer();

      const payload = await answerer.answerIntent({ query_type: 'Trajectory', float_id: null });

      expect(payload).toEqual({
        query_type: 'Error',
        error_kind: 'MissingFloatIdentifier',
        summary:
          'No float ID specified. Please provide a valid float ID for this query. Try one of these floats: 2902115, 2902116.',
        data: CANDIDATES,
      });
      expect(store.statements[0]?.params).toEqual([20]);
    });

    it('says so when no candidate floats exist', async () => {
      store.setHandler(() => []);
      const answerer = createAnswerer();

      const payload = await answerer.answerIntent({ query_type: 'Trajectory' });

      expect(payload.summary).toBe(
        'No float ID specified. Please provide a valid float ID for this query. No floats match the other filters either.'
      );
      expect(payload.data).toEqual([]);
    });

    it('rejects an unknown place without touching the database', async () => {
      const answerer = createAnswerer();

      const payload = await answerer.answerIntent({ query_type: 'Statistic', location_name: 'Atlantis' });

      expect(payload.query_type).toBe('Error');
      expect(payload).toMatchObject({ error_kind: 'UnsupportedLocation' });
      expect(payload.summary.startsWith("Location 'atlantis' is not supported. Valid locations are: indian ocean, pacific ocean,")).toBe(true);
      expect(store.statements).toHaveLength(0);
    });

    it('rejects a year outside the supported range', async () => {
      const answerer = createAnswerer();

      const payload = await answerer.answerIntent({ query_type: 'Statistic', year: 1999 });

      expect(payload).toEqual({
        query_type: 'Error',
        error_kind: 'OutOfRangeYear',
        summary: 'Year 1999 is out of supported range (2000-2026). Please specify a valid year.',
        data: [],
      });
    });

    it('attaches the sanitized intent when debugging', async () => {
      const answerer = createAnswerer({ showIntentDebug: true });

      const payload = await answerer.answerIntent({ query_type: 'General', metrics: ['salinity'], limit: 10 });

      expect(payload).toMatchObject({
        intent_debug: {
          queryType: 'General',
          metrics: ['salinity'],
          aggregation: 'avg',
          limit: 10,
          locationPredicate: { kind: 'everywhere' },
        },
      });
    });

    it('wraps statement failures as execution errors', async () => {
      store.failRun = true;
      const answerer = createAnswerer();

      const error = await answerer.answerIntent({ query_type: 'General' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({ stage: 'execution', message: 'Query execution failed' });
    });
  });

  describe('listPeriods', () => {
    it('keeps well-formed year/month rows', async () => {
      store.setHandler(() => [
        { year: 2024, month: 11 },
        { year: 2024, month: 10 },
        { year: '2023', month: 12 },
      ]);
      const answerer = createAnswerer();

      await expect(answerer.listPeriods()).resolves.toEqual([
        { year: 2024, month: 11 },
        { year: 2024, month: 10 },
      ]);
    });
  });
});

describe('formatDataRange', () => {
  it('formats both ends as dates', () => {
    expect(
      formatDataRange({ min: new Date('2019-01-03T00:00:00Z'), max: new Date('2024-11-30T18:00:00Z') })
    ).toBe('2019-01-03 to 2024-11-30');
  });

  it('reports an empty table as unknown', () => {
    expect(formatDataRange({ min: null, max: null })).toBe('unknown');
  });
});
