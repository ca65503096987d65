/**
 * Prompt Rendering
 *
 * Turns a world into the task text a model sees, in the native (`ro`) or
 * secondary (`en`) language. Slot keys and entity names in the expected
 * JSON stay the same in both languages so one parser and one check set
 * serve both prompts.
 *
 * @module @worldgrade/engine/prompts
 */

import {
  attributeOf,
  listEntities,
  type Check,
  type Entity,
  type FactWorld,
  type RecipeWorld,
  type ScheduleWorld,
  type TravelWorld,
  type World,
} from '@worldgrade/core';

export type PromptLanguage = 'ro' | 'en';

// =============================================================================
// Shared Pieces
// =============================================================================

interface Frame {
  task: string;
  explanation: string;
  requirements: string;
  important: string;
  lastJson: string;
  nothingAfter: string;
}

const FRAME: Record<PromptLanguage, Frame> = {
  ro: {
    task: 'Te rog:',
    explanation: 'Scrie o explicație în limba română (2-3 paragrafe) care prezintă planul și justifică alegerile.',
    requirements: 'Respectă următoarele cerințe:',
    important: 'IMPORTANT:',
    lastJson: 'Scrie mai întâi explicația, iar la finalul răspunsului include EXACT un bloc JSON cu formatul:',
    nothingAfter: 'Nu adăuga comentarii sau text după blocul JSON.',
  },
  en: {
    task: 'Please:',
    explanation: 'Write an explanation in English (2-3 paragraphs) presenting the plan and justifying the choices.',
    requirements: 'Respect the following requirements:',
    important: 'IMPORTANT:',
    lastJson: 'Write the explanation first, and at the end of your response include EXACTLY one JSON block with the format:',
    nothingAfter: 'Do not add comments or text after the JSON block.',
  },
};

function secondaryName(entity: Entity): string {
  return entity.aliases[0] ?? entity.canonical_name;
}

function entityLabel(entity: Entity, language: PromptLanguage): string {
  if (language === 'ro') return entity.canonical_name;
  const secondary = secondaryName(entity);
  return secondary === entity.canonical_name ? secondary : `${secondary} / ${entity.canonical_name}`;
}

function bullets(lines: readonly string[]): string {
  return lines.map((line) => `  • ${line}`).join('\n');
}

function requirementList(checks: readonly Check[], language: PromptLanguage): string {
  return checks
    .map((c) => `  - ${language === 'ro' ? c.description_native : c.description_secondary}`)
    .join('\n');
}

function exampleJson(keys: readonly string[], placeholder: string | string[]): string {
  return JSON.stringify(Object.fromEntries(keys.map((k) => [k, placeholder])), null, 2);
}

function assemble(
  language: PromptLanguage,
  intro: string,
  planStep: string,
  world: World,
  example: string
): string {
  const frame = FRAME[language];
  return [
    intro,
    '',
    frame.task,
    '',
    `1. ${planStep}`,
    '',
    `2. ${frame.explanation}`,
    '',
    frame.requirements,
    '',
    requirementList(world.constraints, language),
    '',
    frame.important,
    `- ${frame.lastJson}`,
    example,
    `- ${frame.nothingAfter}`,
    '',
  ].join('\n');
}

function text(entity: Entity, attribute: string): string {
  const value = attributeOf(entity, attribute);
  return value === null ? '' : String(value);
}

// =============================================================================
// Families
// =============================================================================

function travelPrompt(world: TravelWorld, language: PromptLanguage): string {
  const { city, city_secondary: citySecondary, num_days: days, slot_keys: keys } = world.payload;
  const ro = language === 'ro';

  const catalogue = listEntities(world).map((e) => {
    const details = ro
      ? [
          text(e, 'type'),
          attributeOf(e, 'indoor') === true ? 'interior' : 'exterior',
          attributeOf(e, 'familyFriendly') === true ? 'potrivit pentru copii' : 'nepotrivit pentru copii mici',
          `${text(e, 'durationHours')} ore`,
          `${text(e, 'cost')} lei`,
        ]
      : [
          text(e, 'typeSecondary'),
          attributeOf(e, 'indoor') === true ? 'indoor' : 'outdoor',
          attributeOf(e, 'familyFriendly') === true ? 'suitable for children' : 'not suitable for small children',
          `${text(e, 'durationHours')} h`,
          `${text(e, 'cost')} lei`,
        ];
    return `${entityLabel(e, language)} (${details.join(', ')})`;
  });

  const intro = ro
    ? `Ai la dispoziție ${days} zile în ${city} pentru o excursie.\n\nAi următoarele opțiuni de vizitare:\n\n${bullets(catalogue)}`
    : `You have ${days} days in ${citySecondary} for a trip.\n\nYou have the following options:\n\n${bullets(catalogue)}`;
  const planStep = ro
    ? `Creează un plan pentru cele ${days} zile în format JSON, folosind EXACT numele atracțiilor din lista de mai sus.`
    : `Create a plan for the ${days} days in JSON format, using EXACTLY the attraction names from the list above.`;

  return assemble(language, intro, planStep, world, exampleJson(keys, [ro ? 'nume atracție' : 'attraction name']));
}

function schedulePrompt(world: ScheduleWorld, language: PromptLanguage): string {
  const { days, days_secondary: daysSecondary, slots, slots_secondary: slotsSecondary, slot_keys: keys } = world.payload;
  const ro = language === 'ro';
  const translate = (value: string, from: readonly string[], to: readonly string[]): string => {
    const index = from.indexOf(value);
    return index === -1 ? value : to[index];
  };
  const priorityLabel: Record<string, string> = ro
    ? { high: 'înaltă', medium: 'medie', low: 'scăzută' }
    : { high: 'high', medium: 'medium', low: 'low' };

  const catalogue = listEntities(world).map((e) => {
    const priority = priorityLabel[text(e, 'priority')] ?? text(e, 'priority');
    const day = ro ? text(e, 'day') : translate(text(e, 'day'), days, daysSecondary);
    const slot = ro ? text(e, 'slot') : translate(text(e, 'slot'), slots, slotsSecondary);
    return ro
      ? `${entityLabel(e, language)} (prioritate: ${priority}, programată: ${day} ${slot})`
      : `${entityLabel(e, language)} (priority: ${priority}, scheduled: ${day} ${slot})`;
  });

  const intro = ro
    ? `Ai un calendar pentru zilele: ${days.join(', ')}.\nFiecare zi are două intervale: ${slots.join(', ')}.\n\nTrebuie organizate următoarele întâlniri:\n\n${bullets(catalogue)}`
    : `You have a calendar for the days: ${daysSecondary.join(', ')}.\nEach day has two time slots: ${slotsSecondary.join(', ')}.\n\nThe following appointments need to be organized:\n\n${bullets(catalogue)}`;
  const planStep = ro
    ? 'Creează programul final în format JSON, cu câte o întâlnire sau null pentru fiecare interval.'
    : 'Create the final schedule in JSON format, with one appointment or null per slot.';

  return assemble(language, intro, planStep, world, exampleJson(keys, ro ? 'nume întâlnire sau null' : 'appointment name or null'));
}

function factPrompt(world: FactWorld, language: PromptLanguage): string {
  const { facts, question } = world.payload;
  const ro = language === 'ro';

  const context = facts.map((f) => `${ro ? f.question_native : f.question_secondary} ${f.context_answer}`);
  const intro = ro
    ? `Ai următoarea bază de fapte:\n\n${bullets(context)}\n\nÎntrebare: ${question.native}`
    : `You have the following fact database:\n\n${bullets(context)}\n\nQuestion: ${question.secondary}`;
  const planStep = ro
    ? 'Răspunde la întrebare în format JSON, folosind răspunsul din baza de fapte.'
    : 'Answer the question in JSON format, using the answer from the fact database.';

  return assemble(language, intro, planStep, world, exampleJson(['answer'], ro ? 'răspunsul tău' : 'your answer'));
}

function recipePrompt(world: RecipeWorld, language: PromptLanguage): string {
  const { num_days: days, meals, meals_native: mealsNative, meals_secondary: mealsSecondary, slot_keys: keys } =
    world.payload;
  const ro = language === 'ro';
  const mealName = (key: string): string => {
    const index = meals.indexOf(key);
    if (index === -1) return key;
    return ro ? mealsNative[index] : mealsSecondary[index];
  };

  const catalogue = listEntities(world).map((e) => {
    const tags = [mealName(text(e, 'meal'))];
    if (attributeOf(e, 'vegetarian') === true) tags.push('vegetarian');
    if (attributeOf(e, 'vegan') === true) tags.push('vegan');
    if (attributeOf(e, 'containsGluten') === true) tags.push(ro ? 'conține gluten' : 'contains gluten');
    if (attributeOf(e, 'containsLactose') === true) tags.push(ro ? 'conține lactoză' : 'contains lactose');
    tags.push(`${text(e, 'calories')} kcal`, `${text(e, 'prepMinutes')} min`);
    return `${entityLabel(e, language)} (${tags.join(', ')})`;
  });

  const mealList = (ro ? mealsNative : mealsSecondary).join(', ');
  const intro = ro
    ? `Planifică mesele pentru ${days} ${days === 1 ? 'zi' : 'zile'} (${mealList}).\n\nAi la dispoziție următoarele preparate:\n\n${bullets(catalogue)}`
    : `Plan the meals for ${days} ${days === 1 ? 'day' : 'days'} (${mealList}).\n\nThe following dishes are available:\n\n${bullets(catalogue)}`;
  const planStep = ro
    ? 'Creează meniul în format JSON, cu câte un preparat pentru fiecare masă, folosind EXACT numele din listă.'
    : 'Create the menu in JSON format, with one dish per meal, using EXACTLY the names from the list.';

  return assemble(language, intro, planStep, world, exampleJson(keys, ro ? 'nume preparat' : 'dish name'));
}

// =============================================================================
// Entry Point
// =============================================================================

export function renderPrompt(world: World, language: PromptLanguage): string {
  switch (world.world_type) {
    case 'travel':
      return travelPrompt(world, language);
    case 'schedule':
      return schedulePrompt(world, language);
    case 'fact':
      return factPrompt(world, language);
    case 'recipe':
      return recipePrompt(world, language);
  }
}
