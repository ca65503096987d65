import { describe, it, expect } from 'vitest';
import { DEFAULT_EVALUATION_CONFIG } from '@worldgrade/core';
import { getDefaultLexicons } from '@worldgrade/language';
import { evaluateBatch, familyOf, summarizeReports } from '../batch.js';
import { factWorld, instanceOf, travelWorld } from '../../__tests__/fixtures.js';

const options = { config: DEFAULT_EVALUATION_CONFIG, lexicons: getDefaultLexicons() };

describe('evaluateBatch', () => {
  it('should score matched outputs and report the rest', () => {
    const instances = [instanceOf(travelWorld()), instanceOf(factWorld())];
    const result = evaluateBatch(
      instances,
      [
        { instance_id: 'fact_000000', output: '{"answer": "Cluj-Napoca"}' },
        { instance_id: 'travel_999999', output: 'nimic' },
        { instance_id: 'travel_000000', output: 'nimic' },
      ],
      options
    );

    expect(result.reports.map((r) => r.instance_id)).toEqual(['fact_000000', 'travel_000000']);
    expect(result.reports[0].U).toBe(1);
    expect(result.unmatched).toEqual(['travel_999999']);
  });

  it('should return nothing for no outputs', () => {
    expect(evaluateBatch([instanceOf(travelWorld())], [], options)).toEqual({ reports: [], unmatched: [] });
  });
});

describe('familyOf', () => {
  it('should take the prefix before the first underscore', () => {
    expect(familyOf('travel_000003')).toBe('travel');
    expect(familyOf('solo')).toBe('solo');
  });
});

describe('summarizeReports', () => {
  it('should average overall and per family', () => {
    const summary = summarizeReports([
      { instance_id: 'travel_000000', U: 1, R: 0.5, G: 0.5, F: 1 },
      { instance_id: 'fact_000000', U: 0, R: 1, G: 1, F: 0 },
      { instance_id: 'travel_000001', U: 0.5, R: 0.5, G: 1, F: 0 },
    ]);

    expect(summary.overall).toEqual({ family: 'all', count: 3, U: 0.5, R: 2 / 3, G: 2.5 / 3, F: 1 / 3 });
    expect(summary.families).toEqual([
      { family: 'fact', count: 1, U: 0, R: 1, G: 1, F: 0 },
      { family: 'travel', count: 2, U: 0.75, R: 0.5, G: 0.75, F: 0.5 },
    ]);
  });

  it('should report zeros for no records', () => {
    expect(summarizeReports([])).toEqual({
      overall: { family: 'all', count: 0, U: 0, R: 0, G: 0, F: 0 },
      families: [],
    });
  });
});
