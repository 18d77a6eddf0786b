/**
 * Scene command handler for the connector.
 *
 * Receives commands from a Home Assistant event (`COMMAND_EVENT`) or from the
 * `POST /command` route of the health server, validates them, resolves the
 * scene controller and runs the action:
 *
 *   { "scene": "1001", "action": "turn_on" }
 *   { "scene": "scene.reading", "action": "turn_off" }
 *   { "scene": "1001", "action": "configure", "settings": { "debounce_time": 2 } }
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../logger.ts';
import type { SceneController, SceneStatus } from '../scenes/scene-controller.ts';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SceneCommandResult {
  success: boolean;
  error?: string;
  /** Status of the scene after the command ran. */
  scene?: SceneStatus;
}

/** Where commands look up their scene; `SceneHub` implements it. */
export interface SceneDirectory {
  find(ref: string): SceneController | undefined;
}

const SceneRefSchema = z.string().trim().min(1, 'scene is required');

const SceneSettingsPatchSchema = z
  .object({
    transition_time: z.number().min(0).optional(),
    debounce_time: z.number().min(0).optional(),
    number_tolerance: z.number().min(0).optional(),
    restore_on_deactivate: z.boolean().optional(),
    ignore_unavailable: z.boolean().optional(),
  })
  .strict()
  .refine((settings) => Object.keys(settings).length > 0, { message: 'no settings given' });

export const SceneCommandSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('turn_on'), scene: SceneRefSchema }),
  z.object({ action: z.literal('turn_off'), scene: SceneRefSchema }),
  z.object({ action: z.literal('configure'), scene: SceneRefSchema, settings: SceneSettingsPatchSchema }),
]);

export type SceneCommand = z.infer<typeof SceneCommandSchema>;

type SceneSettingsPatch = z.infer<typeof SceneSettingsPatchSchema>;

// ---------------------------------------------------------------------------
// SceneCommandHandler
// ---------------------------------------------------------------------------

export class SceneCommandHandler {
  private readonly scenes: SceneDirectory;
  private readonly log: Logger;

  constructor(scenes: SceneDirectory, logger?: Logger) {
    this.scenes = scenes;
    this.log = logger ?? createLogger('scene-commands');
  }

  /** Handle a JSON-encoded command, as received over HTTP. */
  async handleMessage(raw: string): Promise<SceneCommandResult> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return { success: false, error: 'Invalid JSON payload' };
    }
    return this.handleCommand(parsed);
  }

  /**
   * Validate and run one command. Failures are returned, never thrown.
   */
  async handleCommand(payload: unknown): Promise<SceneCommandResult> {
    // 1. Validate
    const parsed = SceneCommandSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return { success: false, error: `Invalid command: ${where}${issue.message}` };
    }
    const command = parsed.data;

    // 2. Resolve the scene
    const controller = this.scenes.find(command.scene);
    if (!controller) {
      return { success: false, error: `Unknown scene: ${command.scene}` };
    }

    // 3. Run it
    try {
      switch (command.action) {
        case 'turn_on':
          await controller.turnOn();
          break;
        case 'turn_off':
          await controller.turnOff();
          break;
        case 'configure':
          applySettings(controller, command.settings);
          break;
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error('Scene command failed', { scene: controller.id, action: command.action, error: message });
      return { success: false, error: message, scene: controller.status() };
    }

    this.log.info('Scene command handled', { scene: controller.id, action: command.action });
    return { success: true, scene: controller.status() };
  }
}

function applySettings(controller: SceneController, settings: SceneSettingsPatch): void {
  if (settings.transition_time !== undefined) controller.setTransitionTime(settings.transition_time);
  if (settings.debounce_time !== undefined) controller.setDebounceTime(settings.debounce_time);
  if (settings.number_tolerance !== undefined) controller.setNumberTolerance(settings.number_tolerance);
  if (settings.ignore_unavailable !== undefined) controller.setIgnoreUnavailable(settings.ignore_unavailable);
  // Last, since enabling it re-checks the scene.
  if (settings.restore_on_deactivate !== undefined) controller.setRestoreOnDeactivate(settings.restore_on_deactivate);
}
