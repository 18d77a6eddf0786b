/**
 * Error types raised while loading and driving scenes.
 *
 * Comparison code never throws; these cover definition loading, activation
 * and host commands.
 */

export type SceneErrorCode =
  | 'definition_not_found'
  | 'definition_invalid'
  | 'no_resolvable_entity'
  | 'host_command_failed';

/** Base class carrying a machine-readable code. */
export class SceneError extends Error {
  readonly code: SceneErrorCode;

  constructor(code: SceneErrorCode, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'SceneError';
    this.code = code;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/** The scenes file was not specified or does not exist. */
export class DefinitionNotFoundError extends SceneError {
  constructor(message: string) {
    super('definition_not_found', message);
    this.name = 'DefinitionNotFoundError';
  }
}

/** The scenes file, or one scene inside it, is malformed. */
export class DefinitionInvalidError extends SceneError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('definition_invalid', message, options);
    this.name = 'DefinitionInvalidError';
  }
}

/** Activation was requested for a scene whose host entity is unknown. */
export class NoResolvableEntityError extends SceneError {
  readonly sceneId: string;

  constructor(sceneId: string, sceneName: string) {
    super('no_resolvable_entity', `Cannot find entity_id for scene: ${sceneName} (${sceneId})`);
    this.name = 'NoResolvableEntityError';
    this.sceneId = sceneId;
  }
}

/** The host rejected a service call. */
export class HostCommandError extends SceneError {
  readonly domain: string;
  readonly service: string;

  constructor(domain: string, service: string, message: string) {
    super('host_command_failed', `${domain}.${service} failed: ${message}`);
    this.name = 'HostCommandError';
    this.domain = domain;
    this.service = service;
  }
}
