/**
 * Home Assistant scene host.
 * Keeps a live state cache over the HA WebSocket API, executes scene
 * service calls and relays subscribed custom events.
 */

import WebSocket from 'ws';
import { z } from 'zod';
import { createLogger, type Logger } from '../logger.ts';
import { AttributeValueSchema } from '../scenes/definitions.ts';
import { HostCommandError } from '../scenes/errors.ts';
import type { EntityChangeHandler, SceneHost } from '../scenes/host.ts';
import { extractDomain, type AttributeMap, type EntityObservation, type RestorePayload } from '../scenes/types.ts';

// ---------- frame schemas ----------

const HaStateSchema = z.object({
  entity_id: z.string().min(1),
  state: z.string(),
  attributes: z.record(z.string(), AttributeValueSchema).default({}),
  last_changed: z.string().optional(),
  last_updated: z.string().optional(),
});

type HaState = z.infer<typeof HaStateSchema>;

const FrameSchema = z.object({ type: z.string() }).passthrough();

const ResultFrameSchema = z.object({
  id: z.number().int(),
  type: z.literal('result'),
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.object({ code: z.string().optional(), message: z.string() }).optional(),
});

const StateChangedFrameSchema = z.object({
  type: z.literal('event'),
  event: z.object({
    event_type: z.literal('state_changed'),
    data: z.object({
      entity_id: z.string().min(1),
      old_state: HaStateSchema.nullable().optional(),
      new_state: HaStateSchema.nullable().optional(),
    }),
  }),
});

const EventFrameSchema = z.object({
  type: z.literal('event'),
  event: z.object({ event_type: z.string(), data: z.unknown().optional() }),
});

const AreaRegistrySchema = z.array(z.object({ area_id: z.string(), name: z.string() }));
const EntityRegistrySchema = z.array(
  z.object({
    entity_id: z.string(),
    area_id: z.string().nullable().optional(),
    device_id: z.string().nullable().optional(),
  }),
);
const DeviceRegistrySchema = z.array(z.object({ id: z.string(), area_id: z.string().nullable().optional() }));

// ---------- reconnection ----------

const INITIAL_DELAY_MS = 1_000;
const MAX_DELAY_MS = 5 * 60 * 1_000;
const CONNECT_TIMEOUT_MS = 30_000;
const COMMAND_TIMEOUT_MS = 30_000;

export function nextDelay(attempt: number): number {
  const base = Math.min(INITIAL_DELAY_MS * 2 ** attempt, MAX_DELAY_MS);
  const jitter = Math.random() * 0.5 * base;
  return base + jitter;
}

// ---------- helpers ----------

/** `http(s)://host[:port][/]` to the WebSocket API endpoint. */
export function buildWsUrl(baseUrl: string): string {
  return (
    baseUrl
      .replace(/^https:\/\//, 'wss://')
      .replace(/^http:\/\//, 'ws://')
      .replace(/\/+$/, '') + '/api/websocket'
  );
}

function toObservation(state: HaState): EntityObservation {
  return {
    entity_id: state.entity_id,
    domain: extractDomain(state.entity_id),
    state: state.state,
    attributes: state.attributes,
    last_changed: state.last_changed,
    last_updated: state.last_updated,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

interface PendingCommand {
  domain: string;
  service: string;
  resolve: (result: unknown) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/** Receives the `data` of a subscribed Home Assistant event. */
export type HostEventHandler = (data: unknown) => void;

export interface HaSceneHostOptions {
  url: string;
  token: string;
  logger?: Logger;
  /** Milliseconds to wait for authentication and the initial fetch. */
  connectTimeoutMs?: number;
  /** Milliseconds to wait for the reply to a single command. */
  commandTimeoutMs?: number;
}

// ---------- HaSceneHost ----------

export class HaSceneHost implements SceneHost {
  readonly wsUrl: string;

  private readonly token: string;
  private readonly log: Logger;
  private readonly connectTimeoutMs: number;
  private readonly commandTimeoutMs: number;

  private ws: WebSocket | null = null;
  private connected = false;
  private hasConnected = false;
  private disconnecting = false;
  private attempt = 0;
  private msgId = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly states = new Map<string, EntityObservation>();
  private readonly handlers = new Map<string, Set<EntityChangeHandler>>();
  private readonly pending = new Map<number, PendingCommand>();
  private readonly eventHandlers = new Map<string, Set<HostEventHandler>>();
  private areas = new Map<string, string>();
  private entityAreas = new Map<string, { areaId: string | null; deviceId: string | null }>();
  private deviceAreas = new Map<string, string | null>();

  constructor(opts: HaSceneHostOptions) {
    this.wsUrl = buildWsUrl(opts.url);
    this.token = opts.token;
    this.log = opts.logger ?? createLogger('ha-host');
    this.connectTimeoutMs = opts.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;
    this.commandTimeoutMs = opts.commandTimeoutMs ?? COMMAND_TIMEOUT_MS;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Authenticate, subscribe to state changes and load states and registries.
   * Resolves once the cache is populated.
   */
  async connect(): Promise<void> {
    this.disconnecting = false;
    await this.open();
    this.log.info('Connected to Home Assistant', { url: this.wsUrl, entities: this.states.size });
  }

  /** Close the socket, stop reconnecting and fail pending commands. */
  async disconnect(): Promise<void> {
    this.disconnecting = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.rejectPending(new Error('Disconnected'));
    const ws = this.ws;
    this.ws = null;
    this.connected = false;
    if (ws && ws.readyState !== WebSocket.CLOSED) {
      await new Promise<void>((resolve) => {
        ws.once('close', () => resolve());
        ws.close();
      });
    }
  }

  // ---------- SceneHost: reads ----------

  getObservation(entityId: string): EntityObservation | null {
    return this.states.get(entityId) ?? null;
  }

  entityIds(domain: string): string[] {
    const prefix = `${domain}.`;
    return [...this.states.keys()].filter((id) => id.startsWith(prefix));
  }

  resolveEntityIdBySceneId(sceneId: string): string | null {
    for (const observation of this.states.values()) {
      if (observation.domain !== 'scene') continue;
      const id = observation.attributes.id;
      if ((typeof id === 'string' || typeof id === 'number') && String(id) === sceneId) {
        return observation.entity_id;
      }
    }
    return null;
  }

  areaName(entityId: string): string | null {
    const entry = this.entityAreas.get(entityId);
    if (!entry) return null;
    const areaId = entry.areaId ?? (entry.deviceId ? this.deviceAreas.get(entry.deviceId) ?? null : null);
    return areaId ? this.areas.get(areaId) ?? null : null;
  }

  // ---------- SceneHost: actions ----------

  async applyTarget(sceneEntityId: string, transitionSeconds: number): Promise<void> {
    await this.callService('scene', 'turn_on', { entity_id: sceneEntityId, transition: transitionSeconds });
  }

  async applyRestore(payload: RestorePayload, transitionSeconds: number): Promise<void> {
    const entities: Record<string, AttributeMap> = {};
    for (const [entityId, entry] of Object.entries(payload)) {
      entities[entityId] = { state: entry.state, ...entry.attributes };
    }
    await this.callService('scene', 'apply', { entities, transition: transitionSeconds });
  }

  async turnOff(entityIds: string[]): Promise<void> {
    await this.callService('homeassistant', 'turn_off', { entity_id: entityIds });
  }

  subscribeChanges(entityIds: string[], handler: EntityChangeHandler): () => void {
    for (const entityId of entityIds) {
      let set = this.handlers.get(entityId);
      if (!set) {
        set = new Set();
        this.handlers.set(entityId, set);
      }
      set.add(handler);
    }
    return () => {
      for (const entityId of entityIds) {
        const set = this.handlers.get(entityId);
        if (!set) continue;
        set.delete(handler);
        if (set.size === 0) this.handlers.delete(entityId);
      }
    };
  }

  // ---------- custom events ----------

  /**
   * Listen for a Home Assistant event type. Subscribes on the server now when
   * connected, and again after every (re)connect.
   */
  subscribeEvent(eventType: string, handler: HostEventHandler): () => void {
    const existing = this.eventHandlers.get(eventType);
    const handlers = existing ?? new Set<HostEventHandler>();
    if (!existing) {
      this.eventHandlers.set(eventType, handlers);
      if (this.connected) void this.subscribeRemote(eventType);
    }
    handlers.add(handler);

    return () => {
      handlers.delete(handler);
      if (handlers.size === 0 && this.eventHandlers.get(eventType) === handlers) {
        this.eventHandlers.delete(eventType);
      }
    };
  }

  // ---------- connection ----------

  private open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.wsUrl);
      this.ws = ws;

      let settled = false;
      const settle = (err?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        if (err) reject(err);
        else resolve();
      };

      const timeout = setTimeout(() => {
        settle(new Error('Connection timeout'));
        ws.close();
      }, this.connectTimeoutMs);

      ws.on('message', (data: WebSocket.RawData) => {
        const frame = this.parseFrame(data);
        if (!frame) return;

        switch (frame.type) {
          case 'auth_required':
            ws.send(JSON.stringify({ type: 'auth', access_token: this.token }));
            break;

          case 'auth_ok':
            void this.bootstrap().then(
              () => {
                this.connected = true;
                this.hasConnected = true;
                this.attempt = 0;
                settle();
              },
              (err: unknown) => {
                settle(new Error(`Initial fetch failed: ${errorMessage(err)}`));
                ws.close();
              },
            );
            break;

          case 'auth_invalid':
            settle(new Error('Authentication failed: invalid access token'));
            ws.close();
            break;

          default:
            this.handleFrame(frame);
        }
      });

      ws.on('close', () => {
        if (this.ws === ws) {
          this.ws = null;
          this.connected = false;
        }
        this.rejectPending(new Error('Connection closed'));
        settle(new Error('Connection closed before authentication'));
        if (!this.disconnecting && this.hasConnected) {
          this.scheduleReconnect();
        }
      });

      ws.on('error', (err: Error) => {
        this.log.error('WebSocket error', { error: err.message });
        settle(new Error(`WebSocket error: ${err.message}`));
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.disconnecting || this.reconnectTimer) return;
    const delay = nextDelay(this.attempt);
    this.attempt++;
    this.log.warn('Connection lost, reconnecting', { attempt: this.attempt, delay_ms: Math.round(delay) });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.disconnecting) return;
      void this.open().then(
        () => this.log.info('Reconnected to Home Assistant', { entities: this.states.size }),
        (err: unknown) => this.log.warn('Reconnect failed', { error: errorMessage(err) }),
      );
    }, delay);
  }

  /** Subscribe first so no change between the snapshot and the subscription is lost. */
  private async bootstrap(): Promise<void> {
    await this.command('websocket', 'subscribe_events', { type: 'subscribe_events', event_type: 'state_changed' });
    for (const eventType of this.eventHandlers.keys()) {
      await this.subscribeRemote(eventType);
    }
    const states = await this.command('websocket', 'get_states', { type: 'get_states' });
    this.replaceStates(states);
    await this.loadRegistries();
  }

  /** Never rejects: a refused subscription only costs that event type. */
  private async subscribeRemote(eventType: string): Promise<void> {
    try {
      await this.command('websocket', 'subscribe_events', { type: 'subscribe_events', event_type: eventType });
      this.log.debug('Subscribed to event', { event_type: eventType });
    } catch (err) {
      this.log.warn('Event subscription failed', { event_type: eventType, error: errorMessage(err) });
    }
  }

  private replaceStates(raw: unknown): void {
    const list = z.array(z.unknown()).safeParse(raw);
    if (!list.success) {
      throw new Error('get_states returned no list');
    }

    const previous = new Map(this.states);
    this.states.clear();
    for (const item of list.data) {
      const parsed = HaStateSchema.safeParse(item);
      if (!parsed.success) continue;
      this.states.set(parsed.data.entity_id, toObservation(parsed.data));
    }

    // After a reconnect, replay what changed while we were away.
    for (const [entityId, old] of previous) {
      const next = this.states.get(entityId);
      if (!next) continue;
      if (old.state !== next.state || old.last_updated !== next.last_updated) {
        this.dispatch(entityId, old, next);
      }
    }
  }

  /** Registries only feed area names; a token without access to them is not fatal. */
  private async loadRegistries(): Promise<void> {
    try {
      const [areas, entities, devices] = await Promise.all([
        this.command('websocket', 'config/area_registry/list', { type: 'config/area_registry/list' }),
        this.command('websocket', 'config/entity_registry/list', { type: 'config/entity_registry/list' }),
        this.command('websocket', 'config/device_registry/list', { type: 'config/device_registry/list' }),
      ]);

      this.areas = new Map(AreaRegistrySchema.parse(areas).map((a) => [a.area_id, a.name]));
      this.entityAreas = new Map(
        EntityRegistrySchema.parse(entities).map((e) => [
          e.entity_id,
          { areaId: e.area_id ?? null, deviceId: e.device_id ?? null },
        ]),
      );
      this.deviceAreas = new Map(DeviceRegistrySchema.parse(devices).map((d) => [d.id, d.area_id ?? null]));
    } catch (err) {
      this.log.warn('Registries unavailable, area lookup disabled', { error: errorMessage(err) });
    }
  }

  // ---------- frames ----------

  private parseFrame(data: WebSocket.RawData): z.infer<typeof FrameSchema> | null {
    let json: unknown;
    try {
      json = JSON.parse(String(data));
    } catch {
      this.log.debug('Ignoring non-JSON frame');
      return null;
    }
    const frame = FrameSchema.safeParse(json);
    return frame.success ? frame.data : null;
  }

  private handleFrame(frame: z.infer<typeof FrameSchema>): void {
    if (frame.type === 'result') {
      const result = ResultFrameSchema.safeParse(frame);
      if (result.success) this.handleResult(result.data);
      return;
    }

    if (frame.type === 'event') {
      const event = EventFrameSchema.safeParse(frame);
      if (!event.success) return;

      if (event.data.event.event_type === 'state_changed') {
        const changed = StateChangedFrameSchema.safeParse(frame);
        if (changed.success) this.handleStateChanged(changed.data.event.data);
        return;
      }
      this.dispatchEvent(event.data.event.event_type, event.data.event.data);
    }
  }

  private dispatchEvent(eventType: string, data: unknown): void {
    const handlers = this.eventHandlers.get(eventType);
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(data);
      } catch (err) {
        this.log.error('Event handler failed', { event_type: eventType, error: errorMessage(err) });
      }
    }
  }

  private handleResult(result: z.infer<typeof ResultFrameSchema>): void {
    const pending = this.pending.get(result.id);
    if (!pending) return;
    this.pending.delete(result.id);
    clearTimeout(pending.timer);

    if (result.success) {
      pending.resolve(result.result);
    } else {
      pending.reject(new HostCommandError(pending.domain, pending.service, result.error?.message ?? 'unknown error'));
    }
  }

  private handleStateChanged(data: z.infer<typeof StateChangedFrameSchema>['event']['data']): void {
    const cached = this.states.get(data.entity_id) ?? null;

    if (!data.new_state) {
      this.states.delete(data.entity_id);
      return;
    }

    const next = toObservation(data.new_state);
    const old = data.old_state ? toObservation(data.old_state) : cached;
    this.states.set(data.entity_id, next);
    this.dispatch(data.entity_id, old, next);
  }

  private dispatch(entityId: string, old: EntityObservation | null, next: EntityObservation): void {
    const set = this.handlers.get(entityId);
    if (!set) return;
    for (const handler of set) {
      try {
        handler(entityId, old, next);
      } catch (err) {
        this.log.error('State change handler failed', { entity_id: entityId, error: errorMessage(err) });
      }
    }
  }

  // ---------- commands ----------

  private async callService(domain: string, service: string, serviceData: Record<string, unknown>): Promise<void> {
    this.log.debug('Calling service', { domain, service, service_data: serviceData });
    await this.command(domain, service, { type: 'call_service', domain, service, service_data: serviceData });
  }

  private command(domain: string, service: string, payload: Record<string, unknown>): Promise<unknown> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new HostCommandError(domain, service, 'not connected'));
    }

    const id = ++this.msgId;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new HostCommandError(domain, service, `no reply within ${this.commandTimeoutMs} ms`));
      }, this.commandTimeoutMs);
      this.pending.set(id, { domain, service, resolve, reject, timer });
      ws.send(JSON.stringify({ id, ...payload }));
    });
  }

  private rejectPending(err: Error): void {
    for (const [id, pending] of this.pending) {
      this.pending.delete(id);
      clearTimeout(pending.timer);
      pending.reject(err);
    }
  }
}
