import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '@worldgrade/core';
import { getDefaultPools, loadEntityPools } from '../pools.js';

describe('getDefaultPools', () => {
  const pools = getDefaultPools();

  it('should load every bundled pool', () => {
    expect(pools.travel.cities.length).toBeGreaterThan(0);
    expect(pools.schedule.slots).toHaveLength(2);
    expect(pools.facts.facts.length).toBeGreaterThanOrEqual(6);
    expect(pools.recipes.meals.map((m) => m.key)).toEqual(['mic_dejun', 'pranz', 'cina']);
  });

  it('should hold enough entities for the largest sample', () => {
    for (const city of pools.travel.cities) {
      expect(city.attractions.length, city.name).toBeGreaterThanOrEqual(6);
    }
    for (const meal of pools.recipes.meals) {
      expect(meal.dishes.length, meal.key).toBeGreaterThanOrEqual(5);
    }
    expect(pools.schedule.appointments.length).toBeGreaterThanOrEqual(5);
  });

  it('should name every attraction type', () => {
    for (const city of pools.travel.cities) {
      for (const attraction of city.attractions) {
        expect(pools.travel.types[attraction.type], attraction.name).toBeDefined();
      }
    }
  });

  it('should be shared and frozen', () => {
    expect(getDefaultPools()).toBe(pools);
    expect(Object.isFrozen(pools.travel.cities[0])).toBe(true);
  });
});

describe('loadEntityPools', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'worldgrade-pools-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should report a missing pool file', () => {
    expect(() => loadEntityPools(dir)).toThrow(`Entity pool not found: ${path.join(dir, 'travel.json')}`);
  });

  it('should report invalid JSON', () => {
    fs.writeFileSync(path.join(dir, 'travel.json'), '{ nope');

    expect(() => loadEntityPools(dir)).toThrow(ConfigurationError);
    expect(() => loadEntityPools(dir)).toThrow('Entity pool is not valid JSON');
  });

  it('should list schema issues', () => {
    fs.writeFileSync(path.join(dir, 'travel.json'), JSON.stringify({ types: {}, cities: [] }));

    expect(() => loadEntityPools(dir)).toThrow(/Invalid entity pool .*travel\.json:\n  - cities: /);
  });
});
