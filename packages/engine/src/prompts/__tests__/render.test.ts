import { describe, it, expect } from 'vitest';
import { renderPrompt } from '../render.js';
import { parse } from '../../parser/parser.js';
import { factWorld, recipeWorld, scheduleWorld, travelWorld } from '../../__tests__/fixtures.js';

function exampleBlock(prompt: string): string {
  const lines = prompt.split('\n');
  const start = lines.findIndex((l) => l === '{');
  const end = lines.lastIndexOf('}');
  return lines.slice(start, end + 1).join('\n');
}

describe('renderPrompt', () => {
  describe('travel', () => {
    const world = travelWorld();

    it('should list attractions with their details in Romanian', () => {
      const prompt = renderPrompt(world, 'ro');

      expect(prompt.startsWith('Ai la dispoziție 2 zile în Brașov pentru o excursie.\n')).toBe(true);
      expect(prompt).toContain('\n  • Biserica Neagră (monument, interior, potrivit pentru copii, 1.5 ore, 25 lei)\n');
      expect(prompt).toContain(
        '\n  • Pârtia Poiana Brașov (sport, exterior, nepotrivit pentru copii mici, 4 ore, 150 lei)\n'
      );
      expect(prompt).toContain('\n  - C_MUST_MONUMENT\n  - C_MAX_OUTDOOR_PER_DAY\n  - C_FAMILY_FRIENDLY\n  - C_BUDGET\n');
    });

    it('should show both names in English', () => {
      const prompt = renderPrompt(world, 'en');

      expect(prompt.startsWith('You have 2 days in Brasov for a trip.\n')).toBe(true);
      expect(prompt).toContain(
        '\n  • Black Church / Biserica Neagră (monument, indoor, suitable for children, 1.5 h, 25 lei)\n'
      );
    });

    it('should end with the JSON format and nothing after it', () => {
      const prompt = renderPrompt(world, 'ro');

      expect(exampleBlock(prompt)).toBe(
        '{\n  "day1": [\n    "nume atracție"\n  ],\n  "day2": [\n    "nume atracție"\n  ]\n}'
      );
      expect(prompt.endsWith('- Nu adăuga comentarii sau text după blocul JSON.\n')).toBe(true);
    });

    it('should keep the same slot keys in both languages', () => {
      const keys = (prompt: string): string[] => [...(parse(exampleBlock(prompt)).plan?.keys() ?? [])];
      expect(keys(renderPrompt(world, 'en'))).toEqual(keys(renderPrompt(world, 'ro')));
    });
  });

  describe('schedule', () => {
    it('should translate days and slots but not the slot keys', () => {
      const prompt = renderPrompt(scheduleWorld(), 'en');

      expect(prompt).toContain('You have a calendar for the days: Monday, Tuesday.\n');
      expect(prompt).toContain('\n  • Medical checkup / Control medical (priority: high, scheduled: Monday morning)\n');
      expect(prompt).toContain('  "Luni_dimineață": "appointment name or null",\n');
    });

    it('should label priorities in Romanian', () => {
      expect(renderPrompt(scheduleWorld(), 'ro')).toContain(
        '\n  • Ședință de proiect (prioritate: medie, programată: Marți dimineață)\n'
      );
    });
  });

  describe('fact', () => {
    it('should state the context answers and the question', () => {
      const prompt = renderPrompt(factWorld(), 'ro');

      expect(prompt).toContain('\n  • Care este capitala României? Cluj-Napoca\n');
      expect(prompt).toContain('\nÎntrebare: Care este capitala României?\n');
      expect(exampleBlock(prompt)).toBe('{\n  "answer": "răspunsul tău"\n}');
    });

    it('should ask the question in English', () => {
      expect(renderPrompt(factWorld(), 'en')).toContain('\nQuestion: What is the capital of Romania?\n');
    });
  });

  describe('recipe', () => {
    it('should tag each dish', () => {
      const prompt = renderPrompt(recipeWorld(), 'ro');

      expect(prompt.startsWith('Planifică mesele pentru 1 zi (mic dejun, prânz, cină).\n')).toBe(true);
      expect(prompt).toContain('\n  • Ouă jumări cu roșii (mic dejun, vegetarian, 250 kcal, 20 min)\n');
      expect(prompt).toContain('\n  • Sarmale în foi de viță (prânz, 450 kcal, 20 min)\n');
    });

    it('should fall back to the canonical name without an alias', () => {
      expect(renderPrompt(recipeWorld(), 'en')).toContain('\n  • Ouă jumări cu roșii (breakfast, vegetarian, 250 kcal, 20 min)\n');
    });
  });

  it('should be deterministic', () => {
    expect(renderPrompt(travelWorld(), 'en')).toBe(renderPrompt(travelWorld(), 'en'));
  });
});
