/**
 * Tests for the per-domain attribute allow-list and its override file.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  attributesFor,
  DEFAULT_ATTRIBUTES_TO_CHECK,
  loadAllowList,
  mergeAllowList,
} from './attribute-allowlist.ts';
import { DefinitionInvalidError, DefinitionNotFoundError } from './errors.ts';

describe('attributesFor', () => {
  it('returns the default light attributes', () => {
    expect(attributesFor(DEFAULT_ATTRIBUTES_TO_CHECK, 'light')).toEqual([
      'brightness',
      'color_temp',
      'rgb_color',
      'xy_color',
      'hs_color',
      'effect',
    ]);
  });

  it('returns an empty list for switches and unknown domains', () => {
    expect(attributesFor(DEFAULT_ATTRIBUTES_TO_CHECK, 'switch')).toEqual([]);
    expect(attributesFor(DEFAULT_ATTRIBUTES_TO_CHECK, 'vacuum')).toEqual([]);
  });

  it('ignores inherited object keys', () => {
    expect(attributesFor(DEFAULT_ATTRIBUTES_TO_CHECK, 'toString')).toEqual([]);
  });
});

describe('mergeAllowList', () => {
  it('replaces listed domains and keeps the others', () => {
    const merged = mergeAllowList(DEFAULT_ATTRIBUTES_TO_CHECK, { light: ['brightness'], valve: ['current_position'] });
    expect(merged.light).toEqual(['brightness']);
    expect(merged.valve).toEqual(['current_position']);
    expect(merged.cover).toEqual(['current_position', 'current_tilt_position']);
  });
});

describe('loadAllowList', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'allowlist-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the defaults without a path', async () => {
    await expect(loadAllowList(undefined)).resolves.toBe(DEFAULT_ATTRIBUTES_TO_CHECK);
  });

  it('merges the file onto the defaults', async () => {
    const path = join(dir, 'attributes.yaml');
    await writeFile(path, 'light:\n  - brightness\nvalve: [current_position]\n');

    const allowList = await loadAllowList(path);
    expect(allowList.light).toEqual(['brightness']);
    expect(allowList.valve).toEqual(['current_position']);
    expect(allowList.fan).toEqual(['direction', 'oscillating', 'percentage']);
  });

  it('throws DefinitionNotFoundError for a missing file', async () => {
    const path = join(dir, 'missing.yaml');
    await expect(loadAllowList(path)).rejects.toBeInstanceOf(DefinitionNotFoundError);
    await expect(loadAllowList(path)).rejects.toThrow(`No attributes file ${path}`);
  });

  it('throws DefinitionInvalidError when a domain does not map to a list', async () => {
    const path = join(dir, 'attributes.yaml');
    await writeFile(path, 'light: brightness\n');
    await expect(loadAllowList(path)).rejects.toBeInstanceOf(DefinitionInvalidError);
  });

  it('throws DefinitionInvalidError for malformed YAML', async () => {
    const path = join(dir, 'attributes.yaml');
    await writeFile(path, 'light: [brightness\n');
    await expect(loadAllowList(path)).rejects.toBeInstanceOf(DefinitionInvalidError);
  });
});
