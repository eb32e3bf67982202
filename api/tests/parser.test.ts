/**
 * Intent Parser Tests
 *
 * Model replies → draft intents, with the keyword fallback behind them
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IntentParser, extractJsonObject } from '../src/lib/orchestrator/parser';
import { LLMConnectionError } from '../src/lib/llm/types';
import { getGazetteer } from '../src/lib/gazetteer';
import { ScriptedLLM, fullSchema } from './helpers';

describe('extractJsonObject', () => {
  it('pulls the object out of surrounding prose', () => {
    expect(extractJsonObject('Here you go:\n{"query_type": "Trajectory", "float_id": 7}\nDone.')).toEqual({
      query_type: 'Trajectory',
      float_id: 7,
    });
  });

  it.each(['no json here', '[1, 2, 3]', '{not: valid}', ''])('rejects %j', (text) => {
    expect(extractJsonObject(text)).toBeUndefined();
  });
});

describe('IntentParser', () => {
  let llm: ScriptedLLM;
  let parser: IntentParser;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    llm = new ScriptedLLM();
    parser = new IntentParser(llm, getGazetteer());
  });

  it('returns the model draft', async () => {
    const reply = '{"query_type": "Statistic", "metrics": ["temperature"], "location_name": "arabian sea"}';
    llm.queue(reply);

    const result = await parser.draft('Average temperature in the Arabian Sea', fullSchema());

    expect(result).toEqual({
      draft: { query_type: 'Statistic', metrics: ['temperature'], location_name: 'arabian sea' },
      source: 'llm',
      rawResponse: reply,
    });
  });

  it('falls back when the model is unreachable', async () => {
    llm.queue(new LLMConnectionError('connect ECONNREFUSED', 'http://localhost:11434'));

    const result = await parser.draft('Show the path of float 2902115', fullSchema());

    expect(result).toEqual({
      draft: { query_type: 'Trajectory', metrics: [], aggregation: 'avg', float_id: 2902115 },
      source: 'fallback',
      fallbackReason: 'LLM service unavailable',
    });
  });

  it('falls back when the request fails', async () => {
    llm.queue(new Error('Ollama API error (500): overloaded'));

    const result = await parser.draft('temperature vs salinity', fullSchema());

    expect(result.source).toBe('fallback');
    expect(result.fallbackReason).toBe('LLM request failed: Ollama API error (500): overloaded');
    expect(result.draft.query_type).toBe('Scatter');
  });

  it('falls back on a reply without JSON and keeps the reply', async () => {
    llm.queue('I am not sure what you mean.');

    const result = await parser.draft('nearest floats to chennai', fullSchema());

    expect(result.source).toBe('fallback');
    expect(result.fallbackReason).toBe('LLM did not return valid JSON');
    expect(result.rawResponse).toBe('I am not sure what you mean.');
    expect(result.draft.location_name).toBe('chennai');
  });

  it('falls back on a JSON array', async () => {
    llm.queue('["Statistic"]');
    const result = await parser.draft('average salinity', fullSchema());
    expect(result.source).toBe('fallback');
  });

  describe('buildPrompt', () => {
    it('lists the live columns, query types and places', () => {
      const prompt = parser.buildPrompt('What is "warm" water?', fullSchema());

      expect(prompt).toContain(
        'Measurement columns: float_id, timestamp, latitude, longitude, pressure, temperature, salinity, dissolved_oxygen, chlorophyll, nitrate, ph'
      );
      expect(prompt).toContain(
        'Query types: Statistic, Proximity, Trajectory, Profile, TimeSeries, Scatter, General'
      );
      expect(prompt).toContain('bay of bengal');
      expect(prompt).toContain(`User: "What is 'warm' water?"`);
    });

    it('sends the prompt to the model', async () => {
      llm.queue('{}');
      await parser.draft('average salinity', fullSchema());
      expect(llm.prompts).toHaveLength(1);
      expect(llm.prompts[0]).toContain('User: "average salinity"');
    });
  });
});
