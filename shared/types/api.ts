/**
 * API Response Types
 *
 * JSON bodies returned by the question-answering endpoints. Keys are
 * snake_case to match what existing clients already render.
 */

import type { CompileErrorKind, Intent, QueryType } from './intent';
import type { MeasurementRow } from './measurements';

/**
 * Successful answer (possibly with zero rows)
 */
export interface AnswerPayload {
  query_type: QueryType;
  sql_query: string;
  summary: string;
  data: MeasurementRow[];
  data_range: string;
  intent_debug?: Intent;
}

/**
 * Failure that the user can act on. `data` carries suggestions such as
 * candidate floats when the error is recoverable.
 */
export interface ErrorPayload {
  query_type: 'Error';
  error_kind: CompileErrorKind;
  summary: string;
  data: MeasurementRow[];
}

export type ResponsePayload = AnswerPayload | ErrorPayload;

export function isErrorPayload(payload: ResponsePayload): payload is ErrorPayload {
  return payload.query_type === 'Error';
}
