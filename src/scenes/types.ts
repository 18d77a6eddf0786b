/**
 * Scene and entity types shared by the comparison engine, the hub and the
 * Home Assistant host.
 */

// ---------- values ----------

/**
 * A state or attribute value as Home Assistant reports it: a scalar, a
 * number, a sequence (color tuples, effect lists) or a mapping.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type AttributeMap = Record<string, AttributeValue>;

// ---------- observations ----------

/** Snapshot of one entity's state string and attributes. */
export interface EntityObservation {
  entity_id: string;
  domain: string;
  state: string;
  attributes: AttributeMap;
  last_changed?: string;
  last_updated?: string;
}

// ---------- scene definitions ----------

/** Target definition for one entity within a scene. */
export interface EntitySpec {
  entity_id: string;
  domain: string;
  target_state: AttributeValue;
  /** Already filtered to the domain's allow-list. */
  target_attributes: AttributeMap;
}

/** Immutable scene definition, built once at load time. */
export interface SceneSpec {
  id: string;
  name: string;
  /** Host entity that activates the scene, null when it could not be resolved. */
  entity_id: string | null;
  icon: string | null;
  area: string | null;
  learn: boolean;
  entities: ReadonlyMap<string, EntitySpec>;
  number_tolerance: number;
}

// ---------- runtime ----------

/** Outcome of comparing one observation against its EntitySpec. */
export type MatchResult = 'matched' | 'not_matched' | 'unknown';

/** Lifecycle state of a scene. */
export type SceneState = 'unknown' | 'on' | 'off';

/** One entity's entry in a restore set. */
export interface RestoreEntry {
  state: string;
  attributes: AttributeMap;
}

export type RestorePayload = Record<string, RestoreEntry>;

/** Extract the HA domain from an entity_id (the part before the first dot). */
export function extractDomain(entityId: string): string {
  const dotIndex = entityId.indexOf('.');
  return dotIndex > 0 ? entityId.slice(0, dotIndex) : entityId;
}
