import { describe, it, expect } from 'vitest';
import { parse, toParsedPlan } from '../parser.js';
import { locateJsonCandidates, locateJsonRegion } from '../json-region.js';

describe('parse', () => {
  describe('without a plan', () => {
    it('should handle empty output', () => {
      const result = parse('');

      expect(result.explanation).toBe('');
      expect(result.plan).toBeNull();
      expect(result.format_violation).toBe(false);
      expect(result.format_ok).toBe(false);
      expect(result.diagnostics).toEqual([{ code: 'PARSE_FAILURE', message: 'No JSON object found in output' }]);
    });

    it('should keep prose-only output as the explanation', () => {
      const result = parse('  Doar text, fără plan.\n');

      expect(result.explanation).toBe('Doar text, fără plan.');
      expect(result.plan).toBeNull();
    });

    it('should report an unparseable region', () => {
      const result = parse('Plan: {nu este json}');

      expect(result.explanation).toBe('Plan:');
      expect(result.plan).toBeNull();
      expect(result.repaired).toBe(false);
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0].code).toBe('PARSE_FAILURE');
      expect(result.diagnostics[0].message).toMatch(/^JSON region could not be parsed: /);
    });
  });

  describe('well-formed output', () => {
    it('should split explanation and plan', () => {
      const result = parse('Explicație.\n{"answer": "Berlin"}');

      expect(result.explanation).toBe('Explicație.');
      expect(result.plan).toEqual(new Map([['answer', 'Berlin']]));
      expect(result.format_violation).toBe(false);
      expect(result.format_ok).toBe(true);
      expect(result.repaired).toBe(false);
      expect(result.diagnostics).toEqual([]);
    });

    it('should take the last object when several appear', () => {
      const result = parse('Exemplu: {"a": "x"}\nPlan final:\n{"answer": "y"}');

      expect(result.plan).toEqual(new Map([['answer', 'y']]));
      expect(result.explanation).toBe('Exemplu: {"a": "x"}\nPlan final:');
    });

    it('should ignore braces inside string values', () => {
      const result = parse('{"day1": ["Sala {mare}"], "day2": ["}"]}');

      expect(result.plan).toEqual(
        new Map([
          ['day1', ['Sala {mare}']],
          ['day2', ['}']],
        ])
      );
    });

    it('should ignore quotes in the prose before the plan', () => {
      const result = parse('Am ales "cel mai bun" plan: {"answer": "Berlin"}');

      expect(result.explanation).toBe('Am ales "cel mai bun" plan:');
      expect(result.plan).toEqual(new Map([['answer', 'Berlin']]));
    });

    it('should strip an enclosing markdown fence', () => {
      const result = parse('Text.\n```json\n{"answer": "Berlin"}\n```\n');

      expect(result.explanation).toBe('Text.');
      expect(result.format_violation).toBe(false);
      expect(result.format_ok).toBe(true);
    });

    it('should keep null slots and coerce numbers', () => {
      const result = parse('{"Luni_dimineață": null, "day1": [1, "A2"]}');

      expect(result.plan).toEqual(
        new Map<string, string | string[] | null>([
          ['Luni_dimineață', null],
          ['day1', ['1', 'A2']],
        ])
      );
      expect(result.diagnostics).toEqual([]);
    });
  });

  describe('format violations', () => {
    it('should flag text after the plan', () => {
      const result = parse('{"answer": "Berlin"}\nSper că ajută.');

      expect(result.plan).toEqual(new Map([['answer', 'Berlin']]));
      expect(result.format_violation).toBe(true);
      expect(result.format_ok).toBe(false);
    });

    it('should flag text after a closing fence', () => {
      const result = parse('Text.\n```json\n{"answer": "Berlin"}\n```\nGata.');

      expect(result.explanation).toBe('Text.');
      expect(result.format_violation).toBe(true);
    });

    it('should not flag trailing whitespace', () => {
      expect(parse('{"answer": "Berlin"}  \n\n').format_violation).toBe(false);
    });
  });

  describe('repair', () => {
    it('should close a truncated plan', () => {
      const result = parse('Planul:\n{"day1": ["Parcul Central", "Muzeul');

      expect(result.explanation).toBe('Planul:');
      expect(result.plan).toEqual(new Map([['day1', ['Parcul Central', 'Muzeul']]]));
      expect(result.repaired).toBe(true);
      expect(result.format_violation).toBe(false);
      expect(result.format_ok).toBe(false);
    });

    it('should drop trailing commas', () => {
      const result = parse('{"day1": ["A1", "A2",], }');

      expect(result.plan).toEqual(new Map([['day1', ['A1', 'A2']]]));
      expect(result.repaired).toBe(true);
    });

    it('should normalise smart quotes', () => {
      const result = parse('Răspuns: {“answer”: “Berlin”}');

      expect(result.plan).toEqual(new Map([['answer', 'Berlin']]));
      expect(result.repaired).toBe(true);
    });

    it('should strip comments', () => {
      const result = parse('{"answer": "Berlin" // capitala\n}');

      expect(result.plan).toEqual(new Map([['answer', 'Berlin']]));
    });

    it('should escape unescaped quotes inside values', () => {
      const result = parse('{"answer": "Teatrul "Mihai Eminescu""}');

      expect(result.plan).toEqual(new Map([['answer', 'Teatrul "Mihai Eminescu"']]));
      expect(result.repaired).toBe(true);
    });
  });

  describe('fallback regions', () => {
    it('should keep the fenced plan when prose after it holds braces', () => {
      const result = parse('Text.\n```json\n{"answer": "Berlin"}\n```\nNotă: {Berlin} este capitala.');

      expect(result.explanation).toBe('Text.');
      expect(result.plan).toEqual(new Map([['answer', 'Berlin']]));
      expect(result.format_violation).toBe(true);
      expect(result.format_ok).toBe(false);
      expect(result.diagnostics).toEqual([]);
    });

    it('should fall back to an earlier bare object', () => {
      const result = parse('{"answer": "Berlin"} deci {Berlin}');

      expect(result.explanation).toBe('');
      expect(result.plan).toEqual(new Map([['answer', 'Berlin']]));
      expect(result.format_violation).toBe(true);
    });

    it('should report the last region when no candidate parses', () => {
      const result = parse('{unu} și {doi}');

      expect(result.plan).toBeNull();
      expect(result.explanation).toBe('{unu} și');
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0].context).toEqual({ start: 9, truncated: false });
    });
  });

  it('should be deterministic', () => {
    const raw = 'Text.\n```json\n{"day1": ["A1", 2, true]}\n```';
    expect(parse(raw)).toEqual(parse(raw));
  });
});

describe('toParsedPlan', () => {
  it('should drop non-string list items and null out non-string scalars', () => {
    const { plan, diagnostics } = toParsedPlan({ day1: ['A1', null, { id: 'A2' }], day2: true, day3: 'A3' });

    expect(plan).toEqual(
      new Map<string, string | string[] | null>([
        ['day1', ['A1']],
        ['day2', null],
        ['day3', 'A3'],
      ])
    );
    expect(diagnostics.map((d) => d.code)).toEqual(['COERCED_VALUE', 'COERCED_VALUE', 'COERCED_VALUE']);
    expect(diagnostics[2].message).toBe('Slot "day2" holds boolean; treated as empty');
  });
});

describe('locateJsonRegion', () => {
  it('should return null when the text has no brace', () => {
    expect(locateJsonRegion('fără plan')).toBeNull();
  });

  it('should prefer a truncated object opened after the last complete one', () => {
    const text = '{"a": "1"} apoi {"b": ["2"';
    const region = locateJsonRegion(text);

    expect(region).toEqual({ start: 16, end: text.length, truncated: true, outerStart: 16, outerEnd: text.length });
  });

  it('should fall back to a naive scan when a stray quote hides the braces', () => {
    const text = '{"a": "x} {"b": "y"}';
    const region = locateJsonRegion(text);

    expect(region).toEqual({ start: 10, end: 20, truncated: false, outerStart: 10, outerEnd: 20 });
  });

  it('should widen the region to the fence', () => {
    const text = 'x\n```json\n{"a": 1}\n```';
    const region = locateJsonRegion(text);

    expect(region).toEqual({ start: 10, end: 18, truncated: false, outerStart: 2, outerEnd: text.length });
  });
});

describe('locateJsonCandidates', () => {
  it('should return nothing for text without braces', () => {
    expect(locateJsonCandidates('fără plan')).toEqual([]);
  });

  it('should order fenced regions before bare ones, newest first', () => {
    const text = '{"a": 1} ```json\n{"b": 2}\n```\nDar {"c": 3} {x}';
    const starts = locateJsonCandidates(text).map((region) => region.start);

    expect(starts).toEqual([text.indexOf('{x}'), text.indexOf('{"b"'), text.indexOf('{"c"'), 0]);
  });
});
