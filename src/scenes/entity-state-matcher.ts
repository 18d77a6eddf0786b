/**
 * Compares live entity observations against scene targets.
 */

import { createLogger, type Logger } from '../logger.ts';
import { attributesFor, DEFAULT_ATTRIBUTES_TO_CHECK, type AttributeAllowList } from './attribute-allowlist.ts';
import type { EntityObservation, EntitySpec, MatchResult } from './types.ts';
import { attributeEqual, valuesEqual } from './value-comparator.ts';

export const UNAVAILABLE_STATE = 'unavailable';

export interface CheckOptions {
  tolerance: number;
  ignoreUnavailable: boolean;
  /** Scene name, used only in log lines. */
  sceneName?: string;
}

export interface EntityStateMatcherOptions {
  allowList?: AttributeAllowList;
  logger?: Logger;
}

export class EntityStateMatcher {
  readonly allowList: AttributeAllowList;
  private readonly log: Logger;

  constructor(opts?: EntityStateMatcherOptions) {
    this.allowList = opts?.allowList ?? DEFAULT_ATTRIBUTES_TO_CHECK;
    this.log = opts?.logger ?? createLogger('entity-matcher');
  }

  /** Attributes of `domain` that take part in comparison and restore. */
  attributesFor(domain: string): readonly string[] {
    return attributesFor(this.allowList, domain);
  }

  /**
   * Compare one observation with its target.
   *
   * A missing observation never matches. An unavailable entity is `unknown`
   * when `ignoreUnavailable` is set. Attributes present on only one side are
   * skipped.
   */
  check(spec: EntitySpec, observed: EntityObservation | null, opts: CheckOptions): MatchResult {
    const scene = opts.sceneName ?? '';

    if (!observed) {
      this.log.warn(`Entity not found: ${spec.entity_id}`, { scene });
      return 'not_matched';
    }

    if (opts.ignoreUnavailable && observed.state === UNAVAILABLE_STATE) {
      return 'unknown';
    }

    if (!valuesEqual(spec.target_state, observed.state, opts.tolerance)) {
      this.log.debug('State not matching', {
        scene,
        entity_id: spec.entity_id,
        wanted: spec.target_state,
        got: observed.state,
      });
      return 'not_matched';
    }

    for (const attribute of this.attributesFor(spec.domain)) {
      if (!Object.hasOwn(spec.target_attributes, attribute)) continue;
      if (!Object.hasOwn(observed.attributes, attribute)) continue;

      const wanted = spec.target_attributes[attribute];
      const got = observed.attributes[attribute];
      if (!attributeEqual(attribute, wanted, got, opts.tolerance)) {
        this.log.debug('Attribute not matching', {
          scene,
          entity_id: spec.entity_id,
          attribute,
          wanted,
          got,
        });
        return 'not_matched';
      }
    }

    this.log.debug('Entity matches target', { scene, entity_id: spec.entity_id });
    return 'matched';
  }

  /**
   * Whether a change is worth re-evaluating the scene for. Updates that only
   * touch attributes outside the allow-list are not.
   */
  isInteresting(old: EntityObservation | null, next: EntityObservation, tolerance: number): boolean {
    if (!old) return true;

    if (!valuesEqual(old.state, next.state, tolerance)) return true;

    for (const attribute of this.attributesFor(next.domain)) {
      if (!Object.hasOwn(old.attributes, attribute)) continue;
      if (!Object.hasOwn(next.attributes, attribute)) continue;

      if (!attributeEqual(attribute, old.attributes[attribute], next.attributes[attribute], tolerance)) {
        return true;
      }
    }
    return false;
  }
}
