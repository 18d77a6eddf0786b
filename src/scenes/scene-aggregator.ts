/**
 * Per-scene aggregation of entity match results.
 *
 * Keeps, for every entity of one scene, the last match result together with
 * the raw observation that produced it, and derives the scene verdict and
 * the restore set from them.
 *
 * The restore set prefers the state an entity had before its latest change
 * event. Activating a scene changes its members, so the observation cached by
 * the following re-check is the scene itself and restoring it would be a no-op.
 */

import type { EntityStateMatcher } from './entity-state-matcher.ts';
import type {
  AttributeMap,
  EntityObservation,
  MatchResult,
  RestorePayload,
  SceneSpec,
} from './types.ts';

// ---------- types ----------

/** Cached runtime of one scene entity. */
export interface EntityRuntime {
  lastMatch: MatchResult;
  /** Only used to build restore sets, never for comparison. */
  lastObservation: EntityObservation | null;
}

/** Synchronous read of an entity's current observation. */
export type ObservationFetcher = (entityId: string) => EntityObservation | null;

export interface SceneAggregatorOptions {
  restoreOnDeactivate: boolean;
  ignoreUnavailable: boolean;
  numberTolerance: number;
}

// ---------- SceneAggregator ----------

export class SceneAggregator {
  readonly scene: SceneSpec;
  restoreOnDeactivate: boolean;
  ignoreUnavailable: boolean;
  numberTolerance: number;

  private readonly matcher: EntityStateMatcher;
  private readonly runtimes = new Map<string, EntityRuntime>();
  /** State of each entity before its latest change event. */
  private readonly previous = new Map<string, EntityObservation>();

  constructor(scene: SceneSpec, matcher: EntityStateMatcher, opts: SceneAggregatorOptions) {
    if (scene.entities.size === 0) {
      throw new Error(`Scene has no entities: ${scene.name}`);
    }
    this.scene = scene;
    this.matcher = matcher;
    this.restoreOnDeactivate = opts.restoreOnDeactivate;
    this.ignoreUnavailable = opts.ignoreUnavailable;
    this.numberTolerance = opts.numberTolerance;

    for (const entityId of scene.entities.keys()) {
      this.runtimes.set(entityId, { lastMatch: 'not_matched', lastObservation: null });
    }
  }

  /** Entity ids in declaration order. */
  entityIds(): string[] {
    return [...this.scene.entities.keys()];
  }

  /** Copy of the cached runtime of one entity, or undefined if it is not in the scene. */
  runtime(entityId: string): EntityRuntime | undefined {
    const entry = this.runtimes.get(entityId);
    return entry ? { ...entry } : undefined;
  }

  /** Record a match result and the observation it was computed from. */
  observe(entityId: string, result: MatchResult, rawObservation: EntityObservation | null): void {
    const entry = this.runtimes.get(entityId);
    if (!entry) {
      throw new Error(`Entity ${entityId} is not part of scene ${this.scene.name}`);
    }
    entry.lastObservation = rawObservation;
    entry.lastMatch = result;
  }

  /**
   * Record the state an entity had before a change. A null observation (the
   * entity did not exist yet) keeps the earlier snapshot.
   */
  recordPrevious(entityId: string, observation: EntityObservation | null): void {
    if (!this.runtimes.has(entityId)) {
      throw new Error(`Entity ${entityId} is not part of scene ${this.scene.name}`);
    }
    if (observation) {
      this.previous.set(entityId, observation);
    }
  }

  /**
   * Re-check every entity and return the scene verdict.
   *
   * When restore on deactivate is off, the scan stops at the first entity
   * that does not match and reports off. Entities after it keep whatever was
   * cached by an earlier scan. With restore on, every entity is scanned so
   * the restore set is complete.
   */
  recomputeAll(fetch: ObservationFetcher): boolean {
    for (const [entityId, spec] of this.scene.entities) {
      const observation = fetch(entityId);
      const result = this.matcher.check(spec, observation, {
        tolerance: this.numberTolerance,
        ignoreUnavailable: this.ignoreUnavailable,
        sceneName: this.scene.name,
      });
      this.observe(entityId, result, observation);

      if (!this.restoreOnDeactivate && result !== 'matched') {
        return false;
      }
    }
    return this.verdict();
  }

  /** On iff the known results are non-empty and all matched. */
  verdict(): boolean {
    let known = 0;
    for (const { lastMatch } of this.runtimes.values()) {
      switch (lastMatch) {
        case 'unknown':
          continue;
        case 'not_matched':
          return false;
        case 'matched':
          known++;
          break;
      }
    }
    return known > 0;
  }

  /**
   * State and allow-listed attributes to restore for every entity: its state
   * before the latest change event, else its last observation. Entities with
   * neither are left out.
   */
  restorePayload(): RestorePayload {
    const payload: RestorePayload = {};
    for (const [entityId, { lastObservation }] of this.runtimes) {
      const source = this.previous.get(entityId) ?? lastObservation;
      if (!source) continue;

      const attributes: AttributeMap = {};
      for (const attribute of this.matcher.attributesFor(source.domain)) {
        if (!Object.hasOwn(source.attributes, attribute)) continue;
        attributes[attribute] = source.attributes[attribute];
      }
      payload[entityId] = { state: source.state, attributes };
    }
    return payload;
  }
}
