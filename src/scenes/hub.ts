/**
 * Scene hub: owns every scene and its controller.
 *
 * Scenes come from two sources: the scenes file and, optionally, host
 * `scene.*` entities matching the configured glob patterns. The latter are
 * tracked as learn scenes whose targets are sampled from the live states.
 */

import picomatch from 'picomatch';
import { createLogger, type Logger } from '../logger.ts';
import { DEFAULT_ATTRIBUTES_TO_CHECK, type AttributeAllowList } from './attribute-allowlist.ts';
import {
  buildEntitySpecs,
  buildSceneSpec,
  loadSceneDefinitions,
  validateSceneRecord,
} from './definitions.ts';
import { EntityStateMatcher } from './entity-state-matcher.ts';
import { SceneError } from './errors.ts';
import { learnSceneStates, type SceneHost } from './host.ts';
import { SceneController, type SceneSettings } from './scene-controller.ts';
import type { AttributeMap, SceneSpec } from './types.ts';

export interface SceneHubOptions {
  host: SceneHost;
  scenesFile: string;
  allowList?: AttributeAllowList;
  /** Tolerance for scenes that do not set their own. */
  numberTolerance: number;
  settings?: Partial<SceneSettings>;
  logger?: Logger;
}

/** Key a scene is stored under; matches its controller id. */
export function sceneKey(spec: SceneSpec): string {
  return spec.learn ? `${spec.id}_learned` : spec.id;
}

/** Object id of an entity id (`scene.movie` → `movie`). */
function objectId(entityId: string): string {
  const dotIndex = entityId.indexOf('.');
  return dotIndex >= 0 ? entityId.slice(dotIndex + 1) : entityId;
}

export class SceneHub {
  readonly matcher: EntityStateMatcher;

  private readonly host: SceneHost;
  private readonly scenesFile: string;
  private readonly allowList: AttributeAllowList;
  private readonly numberTolerance: number;
  private readonly settings: Partial<SceneSettings>;
  private readonly log: Logger;
  private readonly specs = new Map<string, SceneSpec>();
  private readonly ctrls = new Map<string, SceneController>();
  private readonly unsubscribers: Array<() => void> = [];

  constructor(opts: SceneHubOptions) {
    this.host = opts.host;
    this.scenesFile = opts.scenesFile;
    this.allowList = opts.allowList ?? DEFAULT_ATTRIBUTES_TO_CHECK;
    this.numberTolerance = opts.numberTolerance;
    this.settings = opts.settings ?? {};
    this.log = opts.logger ?? createLogger('scene-hub');
    this.matcher = new EntityStateMatcher({ allowList: this.allowList, logger: this.log });
  }

  /**
   * Load the scenes file. Invalid scenes are logged and skipped; a missing or
   * malformed file throws.
   */
  async loadScenes(): Promise<SceneSpec[]> {
    const records = await loadSceneDefinitions(this.scenesFile);
    const loaded: SceneSpec[] = [];

    records.forEach((raw, index) => {
      try {
        const record = validateSceneRecord(raw, index);
        const spec = buildSceneSpec(record, {
          host: this.host,
          allowList: this.allowList,
          defaultTolerance: this.numberTolerance,
        });
        if (this.addSpec(spec)) loaded.push(spec);
      } catch (err) {
        if (!(err instanceof SceneError)) throw err;
        this.log.error('Skipping invalid scene', { index, error: err.message });
      }
    });

    this.log.info('Scenes loaded', { file: this.scenesFile, count: loaded.length });
    return loaded;
  }

  /**
   * Track host scene entities matching any of `patterns` that no loaded scene
   * already refers to. Their targets are the members' current states.
   */
  discoverExternalScenes(patterns: string[]): SceneSpec[] {
    if (patterns.length === 0) return [];

    const isMatch = picomatch(patterns);
    const known = new Set<string>();
    for (const spec of this.specs.values()) {
      if (spec.entity_id) known.add(spec.entity_id);
    }

    const discovered: SceneSpec[] = [];
    for (const entityId of this.host.entityIds('scene')) {
      if (known.has(entityId) || !isMatch(entityId)) continue;

      const spec = this.prepareExternalScene(entityId);
      if (spec && this.addSpec(spec)) discovered.push(spec);
    }

    this.log.info('External scenes discovered', { patterns, count: discovered.length });
    return discovered;
  }

  /** Build a learn scene from a host scene entity, null if it has no known members. */
  prepareExternalScene(entityId: string): SceneSpec | null {
    const observation = this.host.getObservation(entityId);
    if (!observation) return null;

    const attrs = observation.attributes;
    const members = Array.isArray(attrs.entity_id)
      ? attrs.entity_id.filter((m): m is string => typeof m === 'string')
      : [];

    const learned = learnSceneStates(this.host, members, this.log);
    if (learned.size === 0) {
      this.log.warn('External scene has no known members, skipping', { entity_id: entityId });
      return null;
    }

    const targets: Record<string, AttributeMap> = {};
    for (const [member, current] of learned) {
      targets[member] = { ...current.attributes, state: current.state };
    }

    const id = typeof attrs.id === 'string' || typeof attrs.id === 'number' ? String(attrs.id) : objectId(entityId);

    return {
      id,
      name: typeof attrs.friendly_name === 'string' ? attrs.friendly_name : entityId,
      entity_id: entityId,
      icon: typeof attrs.icon === 'string' ? attrs.icon : null,
      area: this.host.areaName(entityId),
      learn: true,
      entities: buildEntitySpecs(targets, this.allowList),
      number_tolerance: this.numberTolerance,
    };
  }

  /** Create a controller per scene, subscribe it to its members and evaluate it once. */
  start(): void {
    for (const [key, spec] of this.specs) {
      if (this.ctrls.has(key)) continue;

      const controller = new SceneController(spec, {
        host: this.host,
        matcher: this.matcher,
        settings: this.settings,
        logger: this.log,
      });
      this.unsubscribers.push(
        controller.subscribe((state, previous) => {
          this.log.info('Scene state changed', { scene: controller.id, name: controller.name, state, previous });
        }),
      );
      controller.register();
      controller.checkAllStates();
      this.ctrls.set(key, controller);
    }
    this.log.info('Scene hub started', { scenes: this.ctrls.size });
  }

  get(id: string): SceneController | undefined {
    return this.ctrls.get(id);
  }

  /** Controller by id, else the one activating the host scene entity `ref`. */
  find(ref: string): SceneController | undefined {
    const byId = this.ctrls.get(ref);
    if (byId) return byId;
    for (const controller of this.ctrls.values()) {
      if (controller.scene.entity_id === ref) return controller;
    }
    return undefined;
  }

  controllers(): SceneController[] {
    return [...this.ctrls.values()];
  }

  scenes(): SceneSpec[] {
    return [...this.specs.values()];
  }

  shutdown(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    for (const controller of this.ctrls.values()) controller.shutdown();
    this.ctrls.clear();
  }

  private addSpec(spec: SceneSpec): boolean {
    const key = sceneKey(spec);
    if (this.specs.has(key)) {
      this.log.error('Duplicate scene id, skipping', { id: key, name: spec.name });
      return false;
    }
    if (!spec.entity_id) {
      this.log.warn(`Cannot find entity_id for scene: ${spec.name} (${spec.id})`);
    }
    this.specs.set(key, spec);
    return true;
  }
}
