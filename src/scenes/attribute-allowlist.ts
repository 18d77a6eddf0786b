/**
 * Per-domain attribute allow-list.
 *
 * Only the attributes listed for an entity's domain take part in scene
 * comparison, change detection and restore. Domains without an entry compare
 * their state only.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { DefinitionInvalidError, DefinitionNotFoundError } from './errors.ts';

// ---------- public types ----------

export type AttributeAllowList = Readonly<Record<string, readonly string[]>>;

// ---------- defaults ----------

export const DEFAULT_ATTRIBUTES_TO_CHECK: AttributeAllowList = {
  light: ['brightness', 'color_temp', 'rgb_color', 'xy_color', 'hs_color', 'effect'],
  cover: ['current_position', 'current_tilt_position'],
  media_player: ['volume_level', 'source'],
  fan: ['direction', 'oscillating', 'percentage'],
  climate: [
    'temperature',
    'target_temp_high',
    'target_temp_low',
    'fan_mode',
    'preset_mode',
    'swing_mode',
    'hvac_mode',
  ],
  humidifier: ['humidity', 'mode'],
  switch: [],
};

const NO_ATTRIBUTES: readonly string[] = [];

/** Attributes eligible for comparison in `domain`. */
export function attributesFor(allowList: AttributeAllowList, domain: string): readonly string[] {
  return Object.hasOwn(allowList, domain) ? allowList[domain] : NO_ATTRIBUTES;
}

/** Overlay `overrides` on `base`; a domain present in overrides replaces its base entry. */
export function mergeAllowList(
  base: AttributeAllowList,
  overrides: AttributeAllowList,
): AttributeAllowList {
  return { ...base, ...overrides };
}

// ---------- file loading ----------

const AllowListFileSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

/**
 * Load an allow-list override file and merge it onto the defaults.
 *
 * The file is a YAML mapping of domain to attribute names:
 *
 * ```yaml
 * light: [brightness, rgb_color]
 * valve: [current_position]
 * ```
 */
export async function loadAllowList(path: string | undefined): Promise<AttributeAllowList> {
  if (!path) return DEFAULT_ATTRIBUTES_TO_CHECK;

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new DefinitionNotFoundError(`No attributes file ${path}`);
    }
    throw new DefinitionInvalidError(`Cannot read attributes file ${path}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new DefinitionInvalidError(`Attributes file ${path} is not valid YAML`, { cause: err });
  }

  const result = AllowListFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new DefinitionInvalidError(
      `Attributes file ${path} must map domains to lists of attribute names`,
      { cause: result.error },
    );
  }

  return mergeAllowList(DEFAULT_ATTRIBUTES_TO_CHECK, result.data);
}
