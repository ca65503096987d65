/**
 * Fact Worlds
 *
 * A short context of facts and one question about them. Traps replace the
 * real answer in the context with a common misbelief; the correct answer
 * is always the one the context states.
 *
 * @module @worldgrade/engine/generators/fact
 */

import { createEntity, type Check, type Difficulty, type Entity, type FactRecord, type FactWorld } from '@worldgrade/core';
import { solveFact } from '../solvers/fact.js';
import { defineCheck, slotKeysGoal, type FamilyGenerator, type SampleInput } from './types.js';

const TRAP_PROBABILITY: Record<Difficulty, number> = { easy: 0.25, medium: 0.5, hard: 1 };

function sampleFact({ worldId, seed, difficulty, rng, pools }: SampleInput): FactWorld {
  const count = difficulty === 'hard' ? rng.int(4, 6) : rng.int(3, 5);
  const picked = rng.sample(pools.facts.facts, count);

  const facts: FactRecord[] = [];
  const entities: Record<string, Entity> = {};
  picked.forEach((fact, i) => {
    const id = `F${i + 1}`;
    const isTrap = rng.chance(TRAP_PROBABILITY[difficulty]);
    const contextAnswer = isTrap ? fact.misbelief : fact.answer;
    facts.push({
      id,
      key: fact.key,
      question_native: fact.question_native,
      question_secondary: fact.question_secondary,
      context_answer: contextAnswer,
      world_answer: fact.answer,
      is_trap: isTrap,
    });
    // The real answer's translation must not resolve when the context says otherwise
    entities[id] = createEntity(id, contextAnswer, isTrap ? [] : [fact.answer_secondary], {
      key: fact.key,
      trap: isTrap,
    });
  });

  const traps = facts.filter((f) => f.is_trap);
  const target = traps.length > 0 && difficulty !== 'easy' ? rng.pick(traps) : rng.pick(facts);

  const constraints: Check[] = [
    defineCheck(
      'C_ANSWER_FROM_CONTEXT',
      'Răspunde folosind doar informațiile din context, chiar dacă par greșite.',
      'Answer using only the information in the context, even if it seems wrong.',
      { kind: 'answer_from_context', params: { fact_id: target.id } }
    ),
  ];
  const goals: Check[] = [
    slotKeysGoal(['answer']),
    defineCheck('G_SLOT_SHAPE', 'Răspunsul este un singur șir de caractere.', 'The answer is a single string.', {
      kind: 'slot_shape',
      params: { shape: 'single' },
    }),
    defineCheck('G_ANSWER_PRESENT', 'Răspunsul nu este gol.', 'The answer is not empty.', {
      kind: 'slots_non_empty',
      params: { keys: ['answer'] },
    }),
    defineCheck('G_ANSWER_GROUNDED', 'Răspunsul provine din context.', 'The answer comes from the context.', {
      kind: 'answer_grounded',
      params: {},
    }),
  ];

  return {
    world_id: worldId,
    world_type: 'fact',
    difficulty,
    seed,
    payload: {
      facts,
      question: { fact_id: target.id, native: target.question_native, secondary: target.question_secondary },
      slot_keys: ['answer'],
    },
    entities,
    constraints,
    goals,
  };
}

export const factGenerator: FamilyGenerator<FactWorld> = {
  sample: sampleFact,
  solve: solveFact,
};
