import { describe, it, expect } from 'vitest';
import { bindNamedParams } from '../../src/services/bindings.js';

describe('bindNamedParams', () => {
  it('returns the text unchanged when there are no params', () => {
    const sql = "SELECT ':x' AS label, model FROM cars WHERE model LIKE '%?%' AND cyl = :cyl";

    expect(bindNamedParams(sql)).toEqual({ text: sql, values: [] });
  });

  it('numbers placeholders in order of first use', () => {
    const outcome = bindNamedParams('SELECT model FROM cars WHERE cyl = :cyl AND am = :am', {
      am: 1,
      cyl: 8,
    });

    expect(outcome).toEqual({
      text: 'SELECT model FROM cars WHERE cyl = $1 AND am = $2',
      values: [8, 1],
    });
  });

  it('gives a repeated name one position', () => {
    const outcome = bindNamedParams('SELECT * FROM cars WHERE cyl = :n OR gear = :n', { n: 4 });

    expect(outcome).toEqual({ text: 'SELECT * FROM cars WHERE cyl = $1 OR gear = $1', values: [4] });
  });

  it('leaves string literals and quoted identifiers alone', () => {
    const outcome = bindNamedParams(
      `SELECT ':cyl' AS label, 'it''s :cyl' AS quoted, "odd:name" FROM cars WHERE cyl = :cyl`,
      { cyl: 8 }
    );

    expect(outcome).toEqual({
      text: `SELECT ':cyl' AS label, 'it''s :cyl' AS quoted, "odd:name" FROM cars WHERE cyl = $1`,
      values: [8],
    });
  });

  it('honours backslash escapes in E strings', () => {
    const outcome = bindNamedParams("SELECT E'it\\'s :x' AS label, :y AS value", { y: 'ok' });

    expect(outcome).toEqual({ text: "SELECT E'it\\'s :x' AS label, $1 AS value", values: ['ok'] });
  });

  it('skips comments and dollar-quoted bodies', () => {
    const outcome = bindNamedParams(
      "SELECT $$it's :x$$, $tag$:y$tag$, :z -- :skip\nFROM cars /* :also /* :nested */ */ WHERE hp > :hp",
      { z: 1, hp: 200 }
    );

    expect(outcome).toEqual({
      text: "SELECT $$it's :x$$, $tag$:y$tag$, $1 -- :skip\nFROM cars /* :also /* :nested */ */ WHERE hp > $2",
      values: [1, 200],
    });
  });

  it('keeps casts and question marks', () => {
    const outcome = bindNamedParams(
      "SELECT mpg::text, data ? 'k', data ?| array['a'] FROM cars WHERE id = :id",
      { id: 3 }
    );

    expect(outcome).toEqual({
      text: "SELECT mpg::text, data ? 'k', data ?| array['a'] FROM cars WHERE id = $1",
      values: [3],
    });
  });

  it('rejects positional markers alongside named params', () => {
    expect(() => bindNamedParams('SELECT * FROM cars WHERE cyl = $1 AND am = :am', { am: 1 })).toThrow(
      'Positional $n parameters cannot be mixed with named parameters'
    );
  });

  it('binds an array as a single value', () => {
    const outcome = bindNamedParams('SELECT * FROM cars WHERE id = ANY(:ids)', { ids: [1, 2] });

    expect(outcome).toEqual({ text: 'SELECT * FROM cars WHERE id = ANY($1)', values: [[1, 2]] });
  });

  it('rejects a placeholder with no value', () => {
    expect(() => bindNamedParams('SELECT * FROM cars WHERE cyl = :cyl AND am = :am', { cyl: 6 })).toThrow(
      'No value bound for parameter :am'
    );
  });

  it('does not read inherited properties as values', () => {
    expect(() => bindNamedParams('SELECT :toString', {})).toThrow('No value bound for parameter :toString');
  });
});
