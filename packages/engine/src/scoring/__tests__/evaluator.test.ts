import { describe, it, expect } from 'vitest';
import { DEFAULT_EVALUATION_CONFIG, stripDiacritics } from '@worldgrade/core';
import { getDefaultLexicons } from '@worldgrade/language';
import { clampScore, evaluate, type EvaluateOptions } from '../evaluator.js';
import {
  TRAVEL_EXPLANATION,
  TRAVEL_PLAN_JSON,
  factWorld,
  instanceOf,
  travelWorld,
} from '../../__tests__/fixtures.js';

const options: EvaluateOptions = { config: DEFAULT_EVALUATION_CONFIG, lexicons: getDefaultLexicons() };
const fenced = (explanation: string): string => `${explanation}\n\n\`\`\`json\n${TRAVEL_PLAN_JSON}\n\`\`\``;

describe('evaluate', () => {
  const travel = instanceOf(travelWorld());

  it('should score a faithful, well-formed answer at the top', () => {
    const report = evaluate(travel, fenced(TRAVEL_EXPLANATION), options);

    expect(report.instance_id).toBe('travel_000000');
    expect(report.U).toBe(1);
    expect(report.R).toBe(1);
    expect(report.F).toBe(1);
    expect(report.G).toBeCloseTo(1, 10);
    expect(report.parse).toEqual({ format_ok: true, format_violation: false, repaired: false, diagnostics: [] });
    expect(report.F_detail.mentioned).toEqual(['A1', 'A2']);
  });

  it('should only charge trailing text to U', () => {
    const report = evaluate(travel, fenced(TRAVEL_EXPLANATION) + '\nSper că planul este util.', options);

    expect(report.U).toBe(0.8);
    expect(report.U_detail.format_penalty).toBe(1);
    expect(report.R).toBe(1);
    expect(report.F).toBe(1);
  });

  it('should keep a fenced plan when braces appear in prose after it', () => {
    const report = evaluate(travel, fenced(TRAVEL_EXPLANATION) + '\nNotă: {Biserica Neagră} este monument.', options);

    expect(report.U).toBe(0.8);
    expect(report.R).toBe(1);
    expect(report.F).toBe(1);
    expect(report.parse.format_violation).toBe(true);
  });

  it('should not let a failing lemmatizer escape', () => {
    const report = evaluate(travel, fenced('Planul este gata.'), {
      ...options,
      lemmatizer: {
        lemmatize: () => {
          throw new Error('lemmatizer down');
        },
      },
    });

    expect(report.F).toBe(0);
    expect(report.F_detail.missing).toEqual(['A1', 'A2']);
    expect(report.F_detail.lemmatizer_error).toBe('lemmatizer down');
    expect(report.U).toBe(1);
  });

  it('should lower only G when diacritics are missing', () => {
    const report = evaluate(travel, fenced(stripDiacritics(TRAVEL_EXPLANATION)), options);

    expect(report.G).toBeCloseTo(0.5, 10);
    expect(report.G_detail.G_dia).toBe(0);
    expect(report.U).toBe(1);
    expect(report.F).toBe(1);
  });

  it('should score an output without a plan at zero except G', () => {
    const report = evaluate(travel, 'Nu am reușit să construiesc un plan.', options);

    expect(report.U).toBe(0);
    expect(report.R).toBe(0);
    expect(report.F).toBe(0);
    expect(report.F_detail.planned).toEqual([]);
    expect(report.parse.diagnostics.map((d) => d.code)).toEqual(['PARSE_FAILURE']);
    expect(report.G).toBeGreaterThanOrEqual(0);
    expect(report.G).toBeLessThanOrEqual(1);
  });

  it('should accept the context answer and reject world knowledge', () => {
    const fact = instanceOf(factWorld());

    expect(evaluate(fact, 'Conform contextului:\n{"answer": "Cluj-Napoca"}', options).U).toBe(1);
    expect(evaluate(fact, 'Știu că:\n{"answer": "București"}', options).U).toBe(0);
  });

  it('should keep every score within bounds', () => {
    const outputs = ['', '{', '{"day1": []}', fenced(''), 'text {"day1": ["A4", "A4"], "day2": ["x"]} more'];
    for (const output of outputs) {
      const report = evaluate(travel, output, options);
      for (const score of [report.U, report.R, report.G, report.F]) {
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe('clampScore', () => {
  it('should clamp into [0, 1] and map NaN to 0', () => {
    expect(clampScore(1.2)).toBe(1);
    expect(clampScore(-0.1)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(0);
    expect(clampScore(0.25)).toBe(0.25);
  });
});
