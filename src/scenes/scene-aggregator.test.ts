/**
 * Tests for per-scene aggregation: verdict, short-circuit scans and restore sets.
 */

import { describe, it, expect, vi } from 'vitest';
import { createSpyLogger } from '../../tests/helpers/spy-logger.ts';
import { EntityStateMatcher } from './entity-state-matcher.ts';
import { SceneAggregator } from './scene-aggregator.ts';
import type { AttributeMap, EntityObservation, EntitySpec, SceneSpec } from './types.ts';

// ---------- helpers ----------

function entity(entityId: string, state: string, attributes: AttributeMap = {}): EntitySpec {
  return { entity_id: entityId, domain: entityId.split('.')[0], target_state: state, target_attributes: attributes };
}

function scene(entities: EntitySpec[]): SceneSpec {
  return {
    id: '1001',
    name: 'Reading',
    entity_id: 'scene.reading',
    icon: null,
    area: null,
    learn: false,
    entities: new Map(entities.map((e) => [e.entity_id, e])),
    number_tolerance: 3,
  };
}

function obs(entityId: string, state: string, attributes: AttributeMap = {}): EntityObservation {
  return { entity_id: entityId, domain: entityId.split('.')[0], state, attributes };
}

function fetcherFor(observations: EntityObservation[]) {
  const byId = new Map(observations.map((o) => [o.entity_id, o]));
  return vi.fn((entityId: string) => byId.get(entityId) ?? null);
}

const matcher = new EntityStateMatcher({ logger: createSpyLogger() });

const threeLights = scene([entity('light.a', 'on'), entity('light.b', 'on'), entity('light.c', 'on')]);

// ---------- tests ----------

describe('SceneAggregator', () => {
  it('rejects a scene without entities', () => {
    expect(
      () => new SceneAggregator(scene([]), matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 }),
    ).toThrow('Scene has no entities: Reading');
  });

  it('starts every entity as not matched without an observation', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
    expect(agg.runtime('light.a')).toEqual({ lastMatch: 'not_matched', lastObservation: null });
    expect(agg.verdict()).toBe(false);
  });

  it('refuses to observe an entity outside the scene', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
    expect(() => agg.observe('light.z', 'matched', null)).toThrow('Entity light.z is not part of scene Reading');
  });

  it('is on when every entity matches', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
    const fetch = fetcherFor([obs('light.a', 'on'), obs('light.b', 'on'), obs('light.c', 'on')]);
    expect(agg.recomputeAll(fetch)).toBe(true);
  });

  it('scans every entity when restore is enabled', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
    const fetch = fetcherFor([obs('light.a', 'off'), obs('light.b', 'on'), obs('light.c', 'on')]);

    expect(agg.recomputeAll(fetch)).toBe(false);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('stops at the first mismatch when restore is disabled', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: false, ignoreUnavailable: false, numberTolerance: 3 });
    const fetch = fetcherFor([obs('light.a', 'off'), obs('light.b', 'on'), obs('light.c', 'on')]);

    expect(agg.recomputeAll(fetch)).toBe(false);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(agg.runtime('light.b')).toEqual({ lastMatch: 'not_matched', lastObservation: null });
  });

  it('excludes unknown entities from the verdict', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: true, numberTolerance: 3 });
    const fetch = fetcherFor([obs('light.a', 'unavailable'), obs('light.b', 'on'), obs('light.c', 'on')]);

    expect(agg.recomputeAll(fetch)).toBe(true);
    expect(agg.runtime('light.a')?.lastMatch).toBe('unknown');
  });

  it('is off when every entity is unknown', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: true, numberTolerance: 3 });
    const fetch = fetcherFor([obs('light.a', 'unavailable'), obs('light.b', 'unavailable'), obs('light.c', 'unavailable')]);

    expect(agg.recomputeAll(fetch)).toBe(false);
  });

  it('treats missing entities as not matched', () => {
    const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: true, numberTolerance: 3 });
    const fetch = fetcherFor([obs('light.a', 'on'), obs('light.b', 'on')]);

    expect(agg.recomputeAll(fetch)).toBe(false);
    expect(agg.runtime('light.c')?.lastMatch).toBe('not_matched');
  });

  describe('restorePayload', () => {
    it('omits never-observed entities and keeps only allow-listed attributes', () => {
      const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
      agg.observe('light.a', 'not_matched', obs('light.a', 'on', { brightness: 40, friendly_name: 'A', supported_features: 44 }));
      agg.observe('light.b', 'matched', obs('light.b', 'off'));

      expect(agg.restorePayload()).toEqual({
        'light.a': { state: 'on', attributes: { brightness: 40 } },
        'light.b': { state: 'off', attributes: {} },
      });
    });

    it('reflects the last observation of each entity', () => {
      const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
      agg.recomputeAll(fetcherFor([obs('light.a', 'on', { brightness: 10 }), obs('light.b', 'on'), obs('light.c', 'on')]));
      agg.recomputeAll(fetcherFor([obs('light.a', 'on', { brightness: 200 }), obs('light.b', 'on'), obs('light.c', 'off')]));

      expect(agg.restorePayload()['light.a']).toEqual({ state: 'on', attributes: { brightness: 200 } });
      expect(agg.restorePayload()['light.c']).toEqual({ state: 'off', attributes: {} });
    });

    it('prefers the state recorded before a change over later scans', () => {
      const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
      agg.recordPrevious('light.a', obs('light.a', 'off', { brightness: 20 }));
      agg.recomputeAll(fetcherFor([obs('light.a', 'on', { brightness: 255 }), obs('light.b', 'on')]));

      expect(agg.restorePayload()).toEqual({
        'light.a': { state: 'off', attributes: { brightness: 20 } },
        'light.b': { state: 'on', attributes: {} },
      });
    });

    it('keeps the recorded state when a later change has no previous state', () => {
      const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
      agg.recordPrevious('light.a', obs('light.a', 'off'));
      agg.recordPrevious('light.a', null);

      expect(agg.restorePayload()).toEqual({ 'light.a': { state: 'off', attributes: {} } });
    });

    it('rejects a recorded state for an entity outside the scene', () => {
      const agg = new SceneAggregator(threeLights, matcher, { restoreOnDeactivate: true, ignoreUnavailable: false, numberTolerance: 3 });
      expect(() => agg.recordPrevious('light.z', obs('light.z', 'on'))).toThrow('Entity light.z is not part of scene Reading');
    });
  });
});
