/**
 * Scene definition loading.
 *
 * Reads the scenes YAML file (the same list format Home Assistant writes to
 * `scenes.yaml`), validates each record and turns it into an immutable
 * SceneSpec with its target attributes filtered to the domain allow-list.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { attributesFor, type AttributeAllowList } from './attribute-allowlist.ts';
import { DefinitionInvalidError, DefinitionNotFoundError } from './errors.ts';
import type { SceneHost } from './host.ts';
import { extractDomain, type AttributeMap, type AttributeValue, type EntitySpec, type SceneSpec } from './types.ts';

// ---------- schemas ----------

export const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(AttributeValueSchema),
    z.record(z.string(), AttributeValueSchema),
  ]),
);

const EntityTargetSchema = z.record(z.string(), AttributeValueSchema);

export const RawSceneRecordSchema = z
  .object({
    name: z.string().min(1),
    id: z.union([z.string().min(1), z.number()]).transform(String),
    entity_id: z.string().min(1).optional(),
    icon: z.string().optional(),
    area: z.string().optional(),
    learn: z.boolean().optional(),
    number_tolerance: z.number().nonnegative().optional(),
    entities: z
      .record(z.string(), EntityTargetSchema)
      .refine((entities) => Object.keys(entities).length > 0, { message: 'entities must not be empty' }),
  })
  .passthrough();

export type RawSceneRecord = z.infer<typeof RawSceneRecordSchema>;

const LooseRecordSchema = z.record(z.string(), z.unknown());

// ---------- loading ----------

/**
 * Read and parse the scenes file into its raw records.
 *
 * @throws DefinitionNotFoundError when no path is given or the file does not exist
 * @throws DefinitionInvalidError when the file cannot be read or holds no list of scenes
 */
export async function loadSceneDefinitions(path: string | undefined): Promise<unknown[]> {
  if (!path) {
    throw new DefinitionNotFoundError('No scenes file specified.');
  }

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new DefinitionNotFoundError(`No scenes file ${path}`);
    }
    throw new DefinitionInvalidError(`No scenes found in ${path}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new DefinitionInvalidError(`Scenes file ${path} is not valid YAML`, { cause: err });
  }

  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new DefinitionInvalidError(`No scenes found in ${path}`);
  }
  return parsed;
}

/**
 * Validate one raw scene record.
 *
 * @throws DefinitionInvalidError naming the scene and what is missing
 */
export function validateSceneRecord(raw: unknown, index: number): RawSceneRecord {
  const loose = LooseRecordSchema.safeParse(raw);
  if (!loose.success) {
    throw new DefinitionInvalidError(`Scene #${index + 1} is not a mapping`);
  }

  const record = loose.data;
  const label = typeof record.name === 'string' ? record.name : `#${index + 1}`;

  if (!('entities' in record)) {
    throw new DefinitionInvalidError(`Scene is missing entities: ${label}`);
  }
  if (!('id' in record)) {
    throw new DefinitionInvalidError(`Scene is missing id: ${label}`);
  }

  const entities = LooseRecordSchema.safeParse(record.entities);
  if (entities.success) {
    for (const [entityId, target] of Object.entries(entities.data)) {
      const targetRecord = LooseRecordSchema.safeParse(target);
      if (!targetRecord.success || !('state' in targetRecord.data)) {
        throw new DefinitionInvalidError(`Scene is missing state for entity ${entityId}: ${label}`);
      }
    }
  }

  const result = RawSceneRecordSchema.safeParse(record);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new DefinitionInvalidError(`Scene ${label} is invalid: ${issues.join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}

// ---------- SceneSpec construction ----------

export interface BuildSceneContext {
  host: Pick<SceneHost, 'resolveEntityIdBySceneId' | 'areaName' | 'getObservation'>;
  allowList: AttributeAllowList;
  defaultTolerance: number;
}

/** Keep the allow-listed attributes of a target; `state` is held separately. */
export function filterTargetAttributes(
  allowList: AttributeAllowList,
  domain: string,
  target: AttributeMap,
): AttributeMap {
  const attributes: AttributeMap = {};
  for (const attribute of attributesFor(allowList, domain)) {
    if (Object.hasOwn(target, attribute)) {
      attributes[attribute] = target[attribute];
    }
  }
  return attributes;
}

/** Build the EntitySpec map of a scene, preserving declaration order. */
export function buildEntitySpecs(
  entities: Record<string, AttributeMap>,
  allowList: AttributeAllowList,
): Map<string, EntitySpec> {
  const specs = new Map<string, EntitySpec>();
  for (const [entityId, target] of Object.entries(entities)) {
    const domain = extractDomain(entityId);
    specs.set(entityId, {
      entity_id: entityId,
      domain,
      target_state: target.state ?? null,
      target_attributes: filterTargetAttributes(allowList, domain, target),
    });
  }
  return specs;
}

/** String `icon` attribute of a host entity, if it has one. */
export function iconOf(host: Pick<SceneHost, 'getObservation'>, entityId: string | null): string | null {
  if (!entityId) return null;
  const icon = host.getObservation(entityId)?.attributes.icon;
  return typeof icon === 'string' ? icon : null;
}

/** Turn a validated record into a SceneSpec, resolving host-derived fields. */
export function buildSceneSpec(record: RawSceneRecord, ctx: BuildSceneContext): SceneSpec {
  const entityId = record.entity_id ?? ctx.host.resolveEntityIdBySceneId(record.id);

  return {
    id: record.id,
    name: record.name,
    entity_id: entityId,
    icon: record.icon ?? iconOf(ctx.host, entityId),
    area: record.area ?? (entityId ? ctx.host.areaName(entityId) : null),
    learn: record.learn ?? false,
    entities: buildEntitySpecs(record.entities, ctx.allowList),
    number_tolerance: record.number_tolerance ?? ctx.defaultTolerance,
  };
}
