/**
 * Intent Parser
 *
 * Asks the language model for a draft intent (JSON) and falls back to the
 * keyword producer whenever the model is unreachable or its reply is not a
 * JSON object. The draft is untrusted either way; only the sanitizer
 * turns it into an Intent.
 */

import { QUERY_TYPES, type RawIntent } from '../../../../shared/types/intent';
import type { Gazetteer } from '../gazetteer';
import { LLMConnectionError, type LLMClient } from '../llm/types';
import type { SchemaSnapshot } from '../schema/snapshot';
import { draftIntentFromQuestion } from './fallback-intent';

/**
 * Draft plus where it came from
 */
export interface DraftResult {
  draft: RawIntent;
  source: 'llm' | 'fallback';
  /** Original LLM response for debugging */
  rawResponse?: string;
  /** Why the fallback was used */
  fallbackReason?: string;
}

/**
 * First `{...}` object in a model reply, or undefined
 */
export function extractJsonObject(text: string): RawIntent | undefined {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(jsonMatch[0]);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // Not JSON; caller falls back
  }
  return undefined;
}

export class IntentParser {
  constructor(
    private llm: LLMClient,
    private gazetteer: Gazetteer
  ) {}

  /**
   * Produce a draft intent for a question
   */
  async draft(question: string, schema: SchemaSnapshot): Promise<DraftResult> {
    let rawResponse: string;
    try {
      rawResponse = await this.llm.complete(this.buildPrompt(question, schema));
    } catch (error) {
      const reason =
        error instanceof LLMConnectionError
          ? 'LLM service unavailable'
          : `LLM request failed: ${error instanceof Error ? error.message : String(error)}`;
      console.warn(`  ${reason}; using keyword fallback`);
      return this.fallback(question, reason);
    }

    const draft = extractJsonObject(rawResponse);
    if (!draft) {
      console.warn('  LLM did not return a JSON object; using keyword fallback');
      return this.fallback(question, 'LLM did not return valid JSON', rawResponse);
    }

    return { draft, source: 'llm', rawResponse };
  }

  private fallback(question: string, fallbackReason: string, rawResponse?: string): DraftResult {
    return {
      draft: draftIntentFromQuestion(question, this.gazetteer),
      source: 'fallback',
      fallbackReason,
      ...(rawResponse !== undefined && { rawResponse }),
    };
  }

  /**
   * Build the prompt with the live columns, known places and examples
   */
  buildPrompt(question: string, schema: SchemaSnapshot): string {
    const columns = schema.columns.join(', ');
    const locations = this.gazetteer.listKnownNames().join(', ');

    return `You translate questions about ocean float measurements into a JSON intent.

Measurement columns: ${columns}
Query types: ${QUERY_TYPES.join(', ')}
Aggregations: avg, max, min, count, sum
Known locations: ${locations}

Output ONLY valid JSON with these keys (omit keys that do not apply):
{
  "query_type": "one of the query types",
  "metrics": ["column names"],
  "aggregation": "avg|max|min|count|sum",
  "location_name": "a known location",
  "latitude": number,
  "longitude": number,
  "distance_km": number,
  "time_constraint": "e.g. 2024, March 2023, last 6 months",
  "year": number,
  "month": number,
  "float_id": number,
  "limit": number
}

Examples:
User: "Average temperature in the Arabian Sea in 2023"
{"query_type": "Statistic", "metrics": ["temperature"], "aggregation": "avg", "location_name": "arabian sea", "time_constraint": "2023"}

User: "Nearest 3 floats to 13.08, 80.27"
{"query_type": "Proximity", "latitude": 13.08, "longitude": 80.27, "limit": 3}

User: "Show the path of float 2902115"
{"query_type": "Trajectory", "float_id": 2902115}

User: "Salinity profile near Chennai last month"
{"query_type": "Profile", "metrics": ["salinity"], "location_name": "chennai", "time_constraint": "last month"}

User: "Temperature vs salinity in the Bay of Bengal"
{"query_type": "Scatter", "metrics": ["temperature", "salinity"], "location_name": "bay of bengal"}

Now parse this question:
User: "${question.replace(/"/g, "'")}"

Output only the JSON object, no other text:`;
  }
}
