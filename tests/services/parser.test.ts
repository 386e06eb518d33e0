import { describe, it, expect } from 'vitest';
import {
  ABSENT_CONFIDENCE,
  FALLBACK_SQL,
  UNREADABLE_CONFIDENCE,
  parseConfidence,
  parseModelResponse,
} from '../../src/services/parser.js';

describe('parseModelResponse', () => {
  it('extracts all three fields from a well-formed response', () => {
    const outcome = parseModelResponse(
      'SQL: SELECT model FROM cars WHERE cyl = 6;\nEXPLANATION: Lists six-cylinder models.\nCONFIDENCE: 0.75'
    );

    expect(outcome).toEqual({
      status: 'succeeded',
      value: {
        sqlQuery: 'SELECT model FROM cars WHERE cyl = 6;',
        explanation: 'Lists six-cylinder models.',
        confidence: 0.75,
      },
    });
  });

  it('keeps multi-line SQL intact', () => {
    const outcome = parseModelResponse(
      'SQL: SELECT model\nFROM cars\nORDER BY hp DESC;\nEXPLANATION: Sorted by power.\nCONFIDENCE: 1'
    );

    expect(outcome.value.sqlQuery).toBe('SELECT model\nFROM cars\nORDER BY hp DESC;');
    expect(outcome.value.confidence).toBe(1);
  });

  it.each([
    ['SELECT * FROM cars;', 'All cars.', '0', 0, ''],
    ['SELECT model FROM cars WHERE cyl = 8;', 'Eight-cylinder models.', '0.0', 0, '  '],
    ['SELECT model, hp\nFROM cars\nORDER BY hp DESC;', 'Sorted by power.\nHighest first.', '1.0', 1, '\t'],
    ['SELECT COUNT(*) FROM cars;', 'Counts every row.\n\nIncludes all models.', '.5', 0.5, ' \n '],
  ])('reads back SQL %j and explanation %j with confidence %s', (sql, explanation, confidenceText, confidence, pad) => {
    const raw =
      `SQL:${pad}${sql}${pad}\n` +
      `EXPLANATION:${pad}${explanation}${pad}\n` +
      `CONFIDENCE:${pad}${confidenceText}${pad}`;

    expect(parseModelResponse(raw)).toEqual({
      status: 'succeeded',
      value: { sqlQuery: sql, explanation, confidence },
    });
  });

  it('falls back when the response has no SQL field', () => {
    const outcome = parseModelResponse('EXPLANATION: I cannot answer that.\nCONFIDENCE: 0.2');

    expect(outcome).toEqual({
      status: 'fallback',
      reason: 'Response has no SQL field',
      value: {
        sqlQuery: 'SELECT * FROM cars LIMIT 10;',
        explanation: 'I cannot answer that.',
        confidence: 0.2,
      },
    });
  });

  it('falls back when the SQL field is blank', () => {
    const outcome = parseModelResponse('SQL:   \nEXPLANATION: nothing to run');

    expect(outcome.status).toBe('fallback');
    expect(outcome.value.sqlQuery).toBe(FALLBACK_SQL);
    expect(outcome.value.explanation).toBe('nothing to run');
    expect(outcome.status === 'fallback' && outcome.reason).toBe('Response has an empty SQL field');
  });

  it('falls back on free text', () => {
    const outcome = parseModelResponse('Sorry, I do not know.');

    expect(outcome.status).toBe('fallback');
    expect(outcome.value).toEqual({
      sqlQuery: FALLBACK_SQL,
      explanation: undefined,
      confidence: ABSENT_CONFIDENCE,
    });
  });

  it('uses 0.5 for a CONFIDENCE field that is not a number', () => {
    const outcome = parseModelResponse('SQL: SELECT 1\nEXPLANATION: x\nCONFIDENCE: high');

    expect(outcome.value.confidence).toBe(UNREADABLE_CONFIDENCE);
  });

  it('uses 0.0 when there is no CONFIDENCE field', () => {
    const outcome = parseModelResponse('SQL: SELECT 1\nEXPLANATION: x');

    expect(outcome.value.confidence).toBe(0);
  });

  describe('field order', () => {
    it('reads reordered fields literally', () => {
      const outcome = parseModelResponse('CONFIDENCE: 0.8\nSQL: SELECT 1\nEXPLANATION: x');

      expect(outcome.status).toBe('succeeded');
      expect(outcome.value).toEqual({
        sqlQuery: 'SELECT 1',
        explanation: 'x',
        confidence: 0.5,
      });
    });

    it('runs the SQL field to the end when EXPLANATION is missing', () => {
      const outcome = parseModelResponse('SQL: SELECT 2\nCONFIDENCE: 0.4');

      expect(outcome.value.sqlQuery).toBe('SELECT 2\nCONFIDENCE: 0.4');
      expect(outcome.value.explanation).toBeUndefined();
      expect(outcome.value.confidence).toBe(0.4);
    });

    it('uses the first occurrence of each marker', () => {
      const outcome = parseModelResponse(
        'SQL: SELECT 3\nEXPLANATION: first\nCONFIDENCE: 0.6\nSQL: SELECT 4\nEXPLANATION: second'
      );

      expect(outcome.value.sqlQuery).toBe('SELECT 3');
      expect(outcome.value.explanation).toBe('first');
      expect(outcome.value.confidence).toBe(0.5);
    });
  });
});

describe('parseConfidence', () => {
  it('returns 0.0 for an absent field', () => {
    expect(parseConfidence(undefined)).toBe(0);
  });

  it.each([
    ['0.9', 0.9],
    ['1', 1],
    ['.25', 0.25],
    ['1e-1', 0.1],
    ['+0.3', 0.3],
  ])('reads %s as %s', (text, expected) => {
    expect(parseConfidence(text)).toBe(expected);
  });

  it.each(['0.9.', 'high', '', '90%', 'NaN', 'Infinity'])('reads %j as 0.5', (text) => {
    expect(parseConfidence(text)).toBe(0.5);
  });

  it('clamps values outside [0, 1]', () => {
    expect(parseConfidence('1.7')).toBe(1);
    expect(parseConfidence('-0.2')).toBe(0);
    expect(parseConfidence('85')).toBe(1);
  });
});
