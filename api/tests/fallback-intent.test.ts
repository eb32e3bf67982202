/**
 * Keyword Draft Producer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  draftIntentFromQuestion,
  findLocationName,
} from '../src/lib/orchestrator/fallback-intent';
import { getGazetteer } from '../src/lib/gazetteer';

const gazetteer = getGazetteer();

describe('draftIntentFromQuestion', () => {
  it('drafts a regional yearly statistic', () => {
    expect(
      draftIntentFromQuestion('What was the average temperature in the Bay of Bengal in 2023?', gazetteer)
    ).toEqual({
      query_type: 'Statistic',
      metrics: ['temperature'],
      aggregation: 'avg',
      location_name: 'bay of bengal',
      time_constraint: '2023',
    });
  });

  it('drafts a float trajectory with a month', () => {
    expect(
      draftIntentFromQuestion('Show the trajectory of float 2902115 during March 2024', gazetteer)
    ).toEqual({
      query_type: 'Trajectory',
      metrics: [],
      aggregation: 'avg',
      float_id: 2902115,
      time_constraint: 'march 2024',
    });
  });

  it('drafts a proximity search with a radius', () => {
    expect(
      draftIntentFromQuestion('nearest 3 floats within 200 km of chennai', gazetteer)
    ).toEqual({
      query_type: 'Proximity',
      metrics: [],
      aggregation: 'avg',
      location_name: 'chennai',
      distance_km: 200,
    });
  });

  it('drafts a float count over a relative window', () => {
    expect(
      draftIntentFromQuestion('How many floats were in the Arabian Sea in the last 6 months?', gazetteer)
    ).toEqual({
      query_type: 'Statistic',
      metrics: [],
      aggregation: 'count',
      location_name: 'arabian sea',
      time_constraint: 'last 6 months',
    });
  });

  it('does not read the verb "may" as a month', () => {
    expect(draftIntentFromQuestion('May I see salinity readings?', gazetteer)).toEqual({
      query_type: 'General',
      metrics: ['salinity'],
      aggregation: 'avg',
    });
  });

  it('keeps metrics in order of mention', () => {
    const draft = draftIntentFromQuestion('salinity vs temperature', gazetteer);
    expect(draft.query_type).toBe('Scatter');
    expect(draft.metrics).toEqual(['salinity', 'temperature']);
  });

  it.each([
    ['Salinity profile of float 2902116', 'Profile'],
    ['Temperature trend over time', 'TimeSeries'],
    ['highest salinity this year', 'Statistic'],
    ['Show me some data', 'General'],
  ])('classifies %j as %s', (question, expected) => {
    expect(draftIntentFromQuestion(question, gazetteer).query_type).toBe(expected);
  });

  it.each([
    ['highest salinity', 'max'],
    ['coldest water', 'min'],
    ['total nitrate', 'sum'],
  ])('reads the aggregation from %j', (question, expected) => {
    expect(draftIntentFromQuestion(question, gazetteer).aggregation).toBe(expected);
  });

  it('recognizes "this year"', () => {
    expect(draftIntentFromQuestion('average oxygen this year', gazetteer).time_constraint).toBe(
      'this year'
    );
  });
});

describe('findLocationName', () => {
  it('prefers the longest matching name', () => {
    expect(findLocationName('salinity in the north indian ocean', gazetteer)).toBe(
      'north indian ocean'
    );
  });

  it('matches whole words only', () => {
    expect(findLocationName('the goals of the survey', gazetteer)).toBeUndefined();
  });
});
