/**
 * In-memory SceneHost for controller and hub tests.
 * @module tests/helpers/fake-host
 */

import type { EntityChangeHandler, SceneHost } from '../../src/scenes/host.ts';
import {
  extractDomain,
  type AttributeMap,
  type EntityObservation,
  type RestorePayload,
} from '../../src/scenes/types.ts';

export type HostCall =
  | { type: 'applyTarget'; sceneEntityId: string; transition: number }
  | { type: 'applyRestore'; payload: RestorePayload; transition: number }
  | { type: 'turnOff'; entityIds: string[] };

export class FakeHost implements SceneHost {
  readonly calls: HostCall[] = [];
  /** entity_id to area name */
  readonly areas = new Map<string, string>();
  /** Rejects the next action with this error, then clears itself. */
  failNext: Error | null = null;

  private readonly states = new Map<string, EntityObservation>();
  private readonly handlers = new Map<string, Set<EntityChangeHandler>>();

  /** Set an entity's state without notifying subscribers. */
  set(entityId: string, state: string, attributes: AttributeMap = {}): EntityObservation {
    const observation: EntityObservation = { entity_id: entityId, domain: extractDomain(entityId), state, attributes };
    this.states.set(entityId, observation);
    return observation;
  }

  /** Set an entity's state and notify its subscribers, as a state_changed event would. */
  emit(entityId: string, state: string, attributes: AttributeMap = {}): void {
    const old = this.states.get(entityId) ?? null;
    const next = this.set(entityId, state, attributes);
    for (const handler of this.handlers.get(entityId) ?? []) {
      handler(entityId, old, next);
    }
  }

  remove(entityId: string): void {
    this.states.delete(entityId);
  }

  subscriberCount(entityId: string): number {
    return this.handlers.get(entityId)?.size ?? 0;
  }

  // ---------- SceneHost ----------

  getObservation(entityId: string): EntityObservation | null {
    return this.states.get(entityId) ?? null;
  }

  entityIds(domain: string): string[] {
    return [...this.states.values()].filter((o) => o.domain === domain).map((o) => o.entity_id);
  }

  resolveEntityIdBySceneId(sceneId: string): string | null {
    for (const observation of this.states.values()) {
      if (observation.domain === 'scene' && observation.attributes.id === sceneId) {
        return observation.entity_id;
      }
    }
    return null;
  }

  areaName(entityId: string): string | null {
    return this.areas.get(entityId) ?? null;
  }

  async applyTarget(sceneEntityId: string, transition: number): Promise<void> {
    this.throwIfFailing();
    this.calls.push({ type: 'applyTarget', sceneEntityId, transition });
  }

  async applyRestore(payload: RestorePayload, transition: number): Promise<void> {
    this.throwIfFailing();
    this.calls.push({ type: 'applyRestore', payload, transition });
  }

  async turnOff(entityIds: string[]): Promise<void> {
    this.throwIfFailing();
    this.calls.push({ type: 'turnOff', entityIds });
  }

  subscribeChanges(entityIds: string[], handler: EntityChangeHandler): () => void {
    for (const entityId of entityIds) {
      const set = this.handlers.get(entityId) ?? new Set<EntityChangeHandler>();
      set.add(handler);
      this.handlers.set(entityId, set);
    }
    return () => {
      for (const entityId of entityIds) {
        this.handlers.get(entityId)?.delete(handler);
      }
    };
  }

  private throwIfFailing(): void {
    const err = this.failNext;
    if (err) {
      this.failNext = null;
      throw err;
    }
  }
}
