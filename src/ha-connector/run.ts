/**
 * Scene connector container entry point.
 *
 * Boots the stateful scene service:
 * 1. Load configuration from the environment
 * 2. Connect to Home Assistant over WebSocket
 * 3. Load the attribute allow-list and scene definitions
 * 4. Discover external scenes and start one controller per scene
 * 5. Scene commands from a Home Assistant event
 * 6. Health server on configurable port, also taking commands
 * 7. Graceful shutdown
 */

import { ConfigError, loadConnectorConfig, redactConfig } from '../config.ts';
import { createLogger, setLogLevel } from '../logger.ts';
import { loadAllowList } from '../scenes/attribute-allowlist.ts';
import { SceneHub } from '../scenes/hub.ts';
import { HaSceneHost } from './ha-host.ts';
import { startConnectorHealthServer } from './health.ts';
import type { ConnectorHealthStatus } from './health.ts';
import { SceneCommandHandler } from './scene-commands.ts';

const log = createLogger('connector');

// ─── State ───

let shuttingDown = false;

// ─── Main ───

async function main(): Promise<void> {
  // 1. Configuration
  const config = loadConnectorConfig();
  setLogLevel(config.logLevel);
  log.info('Starting...', { config: redactConfig(config) });

  // 2. Home Assistant
  const host = new HaSceneHost({ url: config.haUrl, token: config.haToken });
  await host.connect();

  // 3. Allow-list + scenes
  const allowList = await loadAllowList(config.attributesFile);
  const hub = new SceneHub({
    host,
    scenesFile: config.scenesFile,
    allowList,
    numberTolerance: config.numberTolerance,
    settings: {
      transitionTime: config.transitionTime,
      debounceTime: config.debounceTime,
      restoreOnDeactivate: config.restoreOnDeactivate,
      ignoreUnavailable: config.ignoreUnavailable,
    },
  });
  await hub.loadScenes();

  // 4. External scenes + controllers
  hub.discoverExternalScenes(config.externalScenes);
  hub.start();

  // 5. Commands over Home Assistant events
  const commands = new SceneCommandHandler(hub);
  const unsubscribeCommands = host.subscribeEvent(config.commandEvent, (data) => {
    void commands.handleCommand(data).then(
      (result) => {
        if (!result.success) log.warn('Scene command rejected', { event_type: config.commandEvent, error: result.error });
      },
      (err: unknown) => log.error('Scene command error', { error: err instanceof Error ? err.message : String(err) }),
    );
  });

  // 6. Health server
  const healthChecks = async (): Promise<ConnectorHealthStatus> => ({
    running: !shuttingDown,
    haConnected: host.isConnected(),
    scenes: hub.controllers().map((c) => c.status()),
  });

  const healthServer = startConnectorHealthServer(config.healthPort, healthChecks, {
    onCommand: (body) => commands.handleMessage(body),
  });

  log.info(`Ready: ${hub.controllers().length} scene(s), health on :${config.healthPort}`);

  // 7. Graceful shutdown
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down...`);

    try {
      unsubscribeCommands();
      hub.shutdown();
      await host.disconnect();
      healthServer.close();
      log.info('Shutdown complete');
      process.exit(0);
    } catch (err) {
      log.error('Shutdown error', { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    log.error(err.message, { issues: err.issues });
  } else {
    log.error('Fatal', { error: err instanceof Error ? err.message : String(err) });
  }
  process.exit(1);
});
