/**
 * Contract between the scene engine and the home automation host.
 */

import type { Logger } from '../logger.ts';
import type { EntityObservation, RestorePayload } from './types.ts';

/** Called for every state change of a subscribed entity. */
export type EntityChangeHandler = (
  entityId: string,
  old: EntityObservation | null,
  next: EntityObservation,
) => void;

export interface SceneHost {
  /** Current observation from the host's state cache, null if the entity is unknown. */
  getObservation(entityId: string): EntityObservation | null;

  /** Ids of all known entities of a domain. */
  entityIds(domain: string): string[];

  /** The scene entity whose `id` attribute equals `sceneId`. */
  resolveEntityIdBySceneId(sceneId: string): string | null;

  /** Area name of an entity, through its own or its device's area. */
  areaName(entityId: string): string | null;

  /** Activate a host scene entity. */
  applyTarget(sceneEntityId: string, transitionSeconds: number): Promise<void>;

  /** Apply a set of entity states in one call. */
  applyRestore(payload: RestorePayload, transitionSeconds: number): Promise<void>;

  turnOff(entityIds: string[]): Promise<void>;

  /** Returns an unsubscribe function. */
  subscribeChanges(entityIds: string[], handler: EntityChangeHandler): () => void;
}

/**
 * Sample the current observation of each entity, for scenes whose target is
 * learned rather than declared. Entities the host does not know are skipped.
 */
export function learnSceneStates(
  host: Pick<SceneHost, 'getObservation'>,
  entityIds: Iterable<string>,
  logger?: Logger,
): Map<string, EntityObservation> {
  const learned = new Map<string, EntityObservation>();
  for (const entityId of entityIds) {
    const observation = host.getObservation(entityId);
    if (!observation) {
      logger?.warn(`Cannot learn state of missing entity: ${entityId}`);
      continue;
    }
    learned.set(entityId, {
      ...observation,
      attributes: { ...observation.attributes },
    });
  }
  return learned;
}
