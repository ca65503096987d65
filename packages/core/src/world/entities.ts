/**
 * Entity Resolution
 *
 * Maps a raw reference written by a model to a canonical entity id.
 * Resolution order: exact id, folded canonical name, folded alias.
 * Total: any input, including non-strings, yields an id or null.
 *
 * @module @worldgrade/core/world/entities
 */

import { fold } from '../text/fold.js';
import type { AttributeValue, Entity, World } from './schemas.js';

type EntityHolder = Pick<World, 'entities'>;

/**
 * Entities in id order of insertion
 */
export function listEntities(world: EntityHolder): Entity[] {
  return Object.values(world.entities);
}

export function getEntity(world: EntityHolder, id: string): Entity | undefined {
  return Object.prototype.hasOwnProperty.call(world.entities, id) ? world.entities[id] : undefined;
}

/**
 * Resolve a reference to an entity id, or null when nothing matches
 */
export function resolve(reference: unknown, world: EntityHolder): string | null {
  if (typeof reference !== 'string') {
    return null;
  }

  const trimmed = reference.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (getEntity(world, trimmed)) {
    return trimmed;
  }

  const key = fold(trimmed);
  if (key.length === 0) {
    return null;
  }

  const entities = listEntities(world);

  for (const entity of entities) {
    if (fold(entity.canonical_name) === key) return entity.id;
  }

  for (const entity of entities) {
    if (entity.aliases.some((alias) => fold(alias) === key)) return entity.id;
  }

  // Lower-cased ids ("a1") only after every name has been tried
  for (const entity of entities) {
    if (fold(entity.id) === key) return entity.id;
  }

  return null;
}

/**
 * Resolve and return the entity itself
 */
export function resolveEntity(reference: unknown, world: EntityHolder): Entity | null {
  const id = resolve(reference, world);
  return id === null ? null : getEntity(world, id) ?? null;
}

/**
 * Read an attribute, treating a missing one as null
 */
export function attributeOf(entity: Entity, attribute: string): AttributeValue {
  return Object.prototype.hasOwnProperty.call(entity.attributes, attribute) ? entity.attributes[attribute] : null;
}

/**
 * Build an entity with de-duplicated aliases (case/diacritic-insensitive,
 * never repeating the canonical name)
 */
export function createEntity(
  id: string,
  canonicalName: string,
  aliases: readonly string[],
  attributes: Record<string, AttributeValue>
): Entity {
  const seen = new Set<string>([fold(canonicalName)]);
  const unique: string[] = [];
  for (const alias of aliases) {
    const key = fold(alias);
    if (key.length > 0 && !seen.has(key)) {
      seen.add(key);
      unique.push(alias);
    }
  }
  return { id, canonical_name: canonicalName, aliases: unique, attributes: { ...attributes } };
}
