/**
 * Scene controller: activation, deactivation and debounced re-evaluation of
 * one scene against the host.
 *
 * Key behaviours:
 * - `turnOn()` activates the host scene entity and marks the scene on
 * - `turnOff()` restores the states members had before the scene was applied,
 *   or turns every member off
 * - interesting member changes restart a per-scene debounce timer; when it
 *   fires the scene is re-checked against live states
 * - learn scenes sample their members after activation and are never switched
 *   on or off by comparison
 */

import { createLogger, type Logger } from '../logger.ts';
import type { EntityStateMatcher } from './entity-state-matcher.ts';
import { NoResolvableEntityError } from './errors.ts';
import { learnSceneStates, type SceneHost } from './host.ts';
import { SceneAggregator } from './scene-aggregator.ts';
import type { EntityObservation, RestorePayload, SceneSpec, SceneState } from './types.ts';

// ---------- settings ----------

export interface SceneSettings {
  /** Seconds passed to the host when activating or restoring. */
  transitionTime: number;
  /** Seconds to wait after an interesting change before re-checking. */
  debounceTime: number;
  restoreOnDeactivate: boolean;
  ignoreUnavailable: boolean;
}

export const DEFAULT_SCENE_SETTINGS: SceneSettings = {
  transitionTime: 0,
  debounceTime: 0,
  restoreOnDeactivate: true,
  ignoreUnavailable: false,
};

/** Snapshot of a controller for status reporting. */
export interface SceneStatus {
  id: string;
  name: string;
  entity_id: string | null;
  state: SceneState;
  learn: boolean;
  settings: SceneSettings & { numberTolerance: number };
  /** States sampled after the last activation of a learn scene. */
  learned?: RestorePayload;
}

export type SceneStateListener = (state: SceneState, previous: SceneState) => void;

export interface SceneControllerOptions {
  host: SceneHost;
  matcher: EntityStateMatcher;
  settings?: Partial<SceneSettings>;
  logger?: Logger;
}

// ---------- SceneController ----------

export class SceneController {
  readonly scene: SceneSpec;

  private readonly host: SceneHost;
  private readonly matcher: EntityStateMatcher;
  private readonly aggregator: SceneAggregator;
  private readonly log: Logger;
  private readonly listeners = new Set<SceneStateListener>();

  private currentState: SceneState = 'unknown';
  private transition: number;
  private debounce: number;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private learnTimer: ReturnType<typeof setTimeout> | null = null;
  private unsubscribe: (() => void) | null = null;
  private learned: Map<string, EntityObservation> | null = null;

  constructor(scene: SceneSpec, opts: SceneControllerOptions) {
    const settings = { ...DEFAULT_SCENE_SETTINGS, ...opts.settings };
    this.scene = scene;
    this.host = opts.host;
    this.matcher = opts.matcher;
    this.log = opts.logger ?? createLogger('scene-controller');
    this.transition = settings.transitionTime;
    this.debounce = settings.debounceTime;
    this.aggregator = new SceneAggregator(scene, opts.matcher, {
      restoreOnDeactivate: settings.restoreOnDeactivate,
      ignoreUnavailable: settings.ignoreUnavailable,
      numberTolerance: scene.number_tolerance,
    });
  }

  // ---------- identity ----------

  /** Learn scenes get a suffixed id so they never collide with a declared scene. */
  get id(): string {
    return this.scene.learn ? `${this.scene.id}_learned` : this.scene.id;
  }

  get name(): string {
    return this.scene.name;
  }

  get state(): SceneState {
    return this.currentState;
  }

  get isOn(): boolean {
    return this.currentState === 'on';
  }

  /** Observations sampled by the last learn capture, null before the first one. */
  get learnedStates(): ReadonlyMap<string, EntityObservation> | null {
    return this.learned;
  }

  // ---------- settings ----------

  get transitionTime(): number {
    return this.transition;
  }

  setTransitionTime(seconds: number): void {
    this.transition = seconds;
  }

  get debounceTime(): number {
    return this.debounce;
  }

  setDebounceTime(seconds: number | null | undefined): void {
    this.debounce = seconds || 0;
  }

  get numberTolerance(): number {
    return this.aggregator.numberTolerance;
  }

  setNumberTolerance(tolerance: number | null | undefined): void {
    this.aggregator.numberTolerance = tolerance || 0;
  }

  get restoreOnDeactivate(): boolean {
    return this.aggregator.restoreOnDeactivate;
  }

  /**
   * Enabling restore re-checks immediately: scans made while it was off may
   * have stopped early and left member states stale.
   */
  setRestoreOnDeactivate(enabled: boolean): void {
    const runUpdate = !this.aggregator.restoreOnDeactivate && enabled;
    this.aggregator.restoreOnDeactivate = enabled;
    if (runUpdate) {
      this.checkAllStates();
    }
  }

  get ignoreUnavailable(): boolean {
    return this.aggregator.ignoreUnavailable;
  }

  setIgnoreUnavailable(enabled: boolean): void {
    this.aggregator.ignoreUnavailable = enabled;
  }

  // ---------- activation ----------

  async turnOn(): Promise<void> {
    const entityId = this.scene.entity_id;
    if (!entityId) {
      throw new NoResolvableEntityError(this.scene.id, this.scene.name);
    }

    if (this.currentState !== 'on') {
      this.snapshotMembers();
    }
    await this.host.applyTarget(entityId, this.transition);
    this.setState('on');

    if (this.scene.learn) {
      this.scheduleLearn();
    }
  }

  async turnOff(): Promise<void> {
    if (this.currentState !== 'on') return;

    if (this.aggregator.restoreOnDeactivate) {
      await this.host.applyRestore(this.aggregator.restorePayload(), this.transition);
    } else {
      await this.host.turnOff(this.aggregator.entityIds());
    }
    this.setState('off');
  }

  // ---------- evaluation ----------

  /**
   * Re-check all members against live states and return the verdict. Learn
   * scenes refresh their cache but keep their state.
   */
  checkAllStates(): boolean {
    const on = this.aggregator.recomputeAll((entityId) => this.host.getObservation(entityId));
    if (this.scene.learn) {
      this.log.debug('Learn scene checked, state unchanged', { scene: this.id, verdict: on });
      return on;
    }
    this.setState(on ? 'on' : 'off');
    return on;
  }

  /**
   * React to a member change; interesting ones (re)start the debounce timer.
   * While the scene is not on, the state before the change becomes the
   * member's restore snapshot.
   */
  handleChange(entityId: string, old: EntityObservation | null, next: EntityObservation): void {
    if (this.currentState !== 'on') {
      this.aggregator.recordPrevious(entityId, old);
    }
    if (!this.matcher.isInteresting(old, next, this.aggregator.numberTolerance)) return;

    this.log.debug('Interesting update', { scene: this.id, entity_id: entityId });
    this.scheduleUpdate();
  }

  /** Subscribe to member changes on the host. */
  register(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.host.subscribeChanges(this.aggregator.entityIds(), (entityId, old, next) =>
      this.handleChange(entityId, old, next),
    );
  }

  unregister(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  /** Listen for state transitions. Returns an unsubscribe function. */
  subscribe(listener: SceneStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Cancel pending timers and drop the host subscription. */
  shutdown(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.learnTimer) {
      clearTimeout(this.learnTimer);
      this.learnTimer = null;
    }
    this.unregister();
    this.listeners.clear();
  }

  status(): SceneStatus {
    const status: SceneStatus = {
      id: this.id,
      name: this.name,
      entity_id: this.scene.entity_id,
      state: this.currentState,
      learn: this.scene.learn,
      settings: {
        transitionTime: this.transition,
        debounceTime: this.debounce,
        restoreOnDeactivate: this.aggregator.restoreOnDeactivate,
        ignoreUnavailable: this.aggregator.ignoreUnavailable,
        numberTolerance: this.aggregator.numberTolerance,
      },
    };
    if (this.learned) {
      const learned: RestorePayload = {};
      for (const [entityId, observation] of this.learned) {
        learned[entityId] = { state: observation.state, attributes: observation.attributes };
      }
      status.learned = learned;
    }
    return status;
  }

  /** The aggregator's restore set, as `turnOff()` would send it. */
  restorePayload(): RestorePayload {
    return this.aggregator.restorePayload();
  }

  // ---------- private ----------

  private scheduleUpdate(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.checkAllStates();
    }, this.debounce * 1000);
  }

  /** Keep the live state of every member as the state to restore on deactivation. */
  private snapshotMembers(): void {
    for (const entityId of this.aggregator.entityIds()) {
      this.aggregator.recordPrevious(entityId, this.host.getObservation(entityId));
    }
  }

  private scheduleLearn(): void {
    if (this.learnTimer) {
      clearTimeout(this.learnTimer);
    }
    this.learnTimer = setTimeout(() => {
      this.learnTimer = null;
      this.learned = learnSceneStates(this.host, this.aggregator.entityIds(), this.log);
      this.log.info('Learned scene states', { scene: this.id, entities: this.learned.size });
    }, this.transition * 1000);
  }

  private setState(next: SceneState): void {
    const previous = this.currentState;
    this.currentState = next;
    if (previous === next) return;

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err) {
        this.log.error('State listener failed', {
          scene: this.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
