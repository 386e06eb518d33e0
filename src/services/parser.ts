/**
 * Extraction of SQL, explanation and confidence from a model response.
 *
 * The response is expected to carry the three labelled fields requested by
 * the prompt, in the order SQL, EXPLANATION, CONFIDENCE. Each field is sliced
 * from its marker to the next expected marker, so a response that reorders
 * the fields yields different values rather than an error:
 *
 *   "CONFIDENCE: 0.8\nSQL: SELECT 1\nEXPLANATION: x"
 *     -> sqlQuery "SELECT 1", explanation "x", confidence 0.5
 *        (the confidence text runs to the end and is not a number)
 *
 * Parsing never fails. A response without usable SQL gets FALLBACK_SQL and a
 * `fallback` outcome.
 */

import type { TranslationResult } from '../types/models.js';
import { fellBack, succeeded, type Recoverable } from '../types/utils.js';
import { CONFIDENCE_MARKER, EXPLANATION_MARKER, SQL_MARKER } from './prompt.js';
import { FALLBACK_TABLE } from './schema.js';

export const FALLBACK_SQL = `SELECT * FROM ${FALLBACK_TABLE} LIMIT 10;`;

/** Confidence when the response has no CONFIDENCE field. */
export const ABSENT_CONFIDENCE = 0.0;

/** Confidence when the CONFIDENCE field is not a number. */
export const UNREADABLE_CONFIDENCE = 0.5;

const DECIMAL_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Text after the first `marker`, cut at the first `until` that follows it.
 * Undefined when `marker` does not occur.
 */
function sliceField(text: string, marker: string, until?: string): string | undefined {
  const start = text.indexOf(marker);
  if (start === -1) {
    return undefined;
  }

  const rest = text.slice(start + marker.length);
  const end = until ? rest.indexOf(until) : -1;

  return (end === -1 ? rest : rest.slice(0, end)).trim();
}

/**
 * Strict float parsing: `parseFloat('0.9.')` would read 0.9, this does not.
 */
export function parseConfidence(text: string | undefined): number {
  if (text === undefined) {
    return ABSENT_CONFIDENCE;
  }
  if (!DECIMAL_LITERAL.test(text)) {
    return UNREADABLE_CONFIDENCE;
  }
  return Math.min(1, Math.max(0, Number(text)));
}

export function parseModelResponse(raw: string): Recoverable<TranslationResult> {
  const sql = sliceField(raw, SQL_MARKER, EXPLANATION_MARKER);
  const explanation = sliceField(raw, EXPLANATION_MARKER, CONFIDENCE_MARKER);
  const confidence = parseConfidence(sliceField(raw, CONFIDENCE_MARKER));

  if (!sql) {
    const reason =
      sql === undefined ? 'Response has no SQL field' : 'Response has an empty SQL field';
    return fellBack({ sqlQuery: FALLBACK_SQL, explanation, confidence }, reason);
  }

  return succeeded({ sqlQuery: sql, explanation, confidence });
}
