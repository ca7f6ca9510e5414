/**
 * WebSocket client for the Home Assistant control-plane API.
 *
 * One client wraps one authenticated socket. Requests are strictly
 * sequential: each {@link HAWebSocketClient.sendCommand} writes a frame and
 * reads until the matching `result` arrives.
 *
 * @module client
 */

import WebSocket from 'ws';
import { AuthenticationError, CommandError, errorMessage, HAClientError } from './errors.js';
import type {
  AreaEntry,
  DeviceEntry,
  EntityEntry,
  HAEventMessage,
  HAMessage,
  HAState,
  HelperResult,
  TraceDetail,
  TraceSummary,
} from './types.js';
import { HELPER_DOMAINS } from './types.js';

// =============================================================================
// URL Handling
// =============================================================================

/**
 * Convert the server's HTTP URL to its WebSocket form.
 * `http` becomes `ws`, `https` becomes `wss`; a trailing slash is dropped.
 *
 * @throws {HAClientError} For an unparseable URL or any other scheme
 *
 * @example
 * ```typescript
 * httpToWS('https://ha.example.com/'); // 'wss://ha.example.com'
 * ```
 */
export function httpToWS(httpUrl: string): string {
  let url: URL;
  try {
    url = new URL(httpUrl);
  } catch (err) {
    const reason = errorMessage(err);
    throw new HAClientError(`invalid URL: ${reason}`, undefined, { cause: err });
  }

  switch (url.protocol) {
    case 'http:':
      url.protocol = 'ws:';
      break;
    case 'https:':
      url.protocol = 'wss:';
      break;
    default:
      throw new HAClientError(`unsupported scheme: ${url.protocol.replace(/:$/, '')}`);
  }

  return url.toString().replace(/\/$/, '');
}

/** Path of the WebSocket endpoint on the server. */
export const WEBSOCKET_PATH = '/api/websocket' as const;

// =============================================================================
// Frame Queue
// =============================================================================

interface FrameWaiter {
  readonly resolve: (frame: string) => void;
  readonly reject: (err: Error) => void;
}

function parseFrame(frame: string): HAMessage | null {
  try {
    return JSON.parse(frame) as HAMessage;
  } catch {
    return null;
  }
}

// =============================================================================
// Client
// =============================================================================

/**
 * Authenticated WebSocket connection to Home Assistant.
 *
 * @example
 * ```typescript
 * const client = await HAWebSocketClient.connect(url, token, 30_000);
 * try {
 *   const devices = await client.getDevices();
 * } finally {
 *   client.close();
 * }
 * ```
 */
export class HAWebSocketClient {
  /** Last message ID handed out; the first request uses 1. */
  private messageId = 0;
  private readonly frames: string[] = [];
  private waiter: FrameWaiter | null = null;
  private failure: Error | null = null;

  private constructor(
    private readonly ws: WebSocket,
    private readonly timeoutMs: number
  ) {
    ws.on('message', (data: WebSocket.RawData) => this.push(data.toString()));
    ws.on('error', (err: Error) => this.fail(err));
    ws.on('close', () => this.fail(new HAClientError('connection closed')));
  }

  /**
   * Dial the server and complete the auth handshake.
   *
   * @param baseUrl - Server HTTP URL, e.g. `http://homeassistant.local:8123`
   * @param token - Long-lived access token
   * @param timeoutMs - Handshake and per-request read timeout
   * @throws {AuthenticationError} If the server rejects the token
   */
  static async connect(
    baseUrl: string,
    token: string,
    timeoutMs: number
  ): Promise<HAWebSocketClient> {
    const url = `${httpToWS(baseUrl)}${WEBSOCKET_PATH}`;
    const ws = new WebSocket(url, { handshakeTimeout: timeoutMs });
    const client = new HAWebSocketClient(ws, timeoutMs);

    try {
      await client.opened();
      await client.authenticate(token);
    } catch (err) {
      client.close();
      throw err;
    }
    return client;
  }

  private opened(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.once('open', () => resolve());
      this.ws.once('error', (err: Error) =>
        reject(new HAClientError(`failed to connect: ${err.message}`, undefined, { cause: err }))
      );
    });
  }

  private async authenticate(token: string): Promise<void> {
    const required = await this.readAuthFrame('auth_required');
    if (required.type !== 'auth_required') {
      throw new HAClientError(`expected auth_required, got ${required.type}`);
    }

    await this.write({ type: 'auth', access_token: token }, 'failed to send auth');

    const reply = await this.readAuthFrame('auth response');
    switch (reply.type) {
      case 'auth_ok':
        return;
      case 'auth_invalid':
        throw new AuthenticationError(`authentication failed: ${reply.message ?? ''}`);
      default:
        throw new HAClientError(`unexpected auth response: ${reply.type}`);
    }
  }

  private async readAuthFrame(what: string): Promise<HAMessage> {
    let frame: string;
    try {
      frame = await this.readFrame(this.timeoutMs);
    } catch (err) {
      const reason = errorMessage(err);
      throw new HAClientError(`failed to read ${what}: ${reason}`, undefined, { cause: err });
    }
    const msg = parseFrame(frame);
    if (!msg) {
      throw new HAClientError(`failed to parse ${what}`);
    }
    return msg;
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private push(frame: string): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(frame);
    } else {
      this.frames.push(frame);
    }
  }

  private fail(err: Error): void {
    this.failure ??= err;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(this.failure);
    }
  }

  /**
   * Take the next frame off the socket.
   * Without a timeout this waits until a frame arrives or the socket closes.
   */
  private readFrame(timeoutMs?: number): Promise<string> {
    const queued = this.frames.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiter = null;
          reject(new HAClientError(`timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.waiter = {
        resolve: (frame) => {
          clearTimeout(timer);
          resolve(frame);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
    });
  }

  private write(message: Record<string, unknown>, context: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(JSON.stringify(message), (err) => {
        if (err) {
          reject(new HAClientError(`${context}: ${err.message}`, undefined, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Send a command and wait for its result.
   * Frames that do not parse, or belong to another ID, are dropped.
   *
   * @typeParam T - The expected result type
   * @param type - Message type (e.g., 'config/device_registry/list')
   * @param payload - Fields merged into the request frame
   * @throws {CommandError} If Home Assistant reports `success: false`
   *
   * @example
   * ```typescript
   * const areas = await client.sendCommand<AreaEntry[]>('config/area_registry/list');
   * ```
   */
  async sendCommand<T = unknown>(
    type: string,
    payload: Record<string, unknown> = {}
  ): Promise<T> {
    const id = ++this.messageId;
    await this.write({ id, type, ...payload }, 'failed to send command');

    const deadline = Date.now() + this.timeoutMs;
    for (;;) {
      let frame: string;
      try {
        frame = await this.readFrame(Math.max(0, deadline - Date.now()));
      } catch (err) {
        const reason = errorMessage(err);
        throw new HAClientError(`failed to read response: ${reason}`, undefined, { cause: err });
      }

      const msg = parseFrame(frame);
      if (!msg || msg.id !== id || msg.type !== 'result') continue;
      if (!msg.success) throw new CommandError(msg.error);
      return msg.result as T;
    }
  }

  /**
   * Wait for the next subscription event. Other frames are dropped.
   */
  async readEvent(): Promise<HAEventMessage> {
    for (;;) {
      const msg = parseFrame(await this.readFrame());
      if (msg?.type === 'event' && msg.event) {
        return { id: msg.id ?? 0, type: 'event', event: msg.event };
      }
    }
  }

  /** Close the socket. Safe to call more than once. */
  close(): void {
    this.ws.close();
  }

  // ===========================================================================
  // Registries
  // ===========================================================================

  async getDevices(): Promise<DeviceEntry[]> {
    return this.sendCommand<DeviceEntry[]>('config/device_registry/list');
  }

  async getAreas(): Promise<AreaEntry[]> {
    return this.sendCommand<AreaEntry[]>('config/area_registry/list');
  }

  async getEntities(): Promise<EntityEntry[]> {
    return this.sendCommand<EntityEntry[]>('config/entity_registry/list');
  }

  async getStates(): Promise<HAState[]> {
    return this.sendCommand<HAState[]>('get_states');
  }

  async updateDevice(deviceId: string, updates: Record<string, unknown>): Promise<DeviceEntry> {
    return this.sendCommand<DeviceEntry>('config/device_registry/update', {
      ...updates,
      device_id: deviceId,
    });
  }

  async disableDevice(deviceId: string): Promise<DeviceEntry> {
    return this.updateDevice(deviceId, { disabled_by: 'user' });
  }

  async enableDevice(deviceId: string): Promise<DeviceEntry> {
    return this.updateDevice(deviceId, { disabled_by: null });
  }

  /**
   * Detach a config entry from a device. Home Assistant deletes the device
   * once its last entry is gone.
   */
  async removeConfigEntryFromDevice(deviceId: string, configEntryId: string): Promise<void> {
    await this.sendCommand('config/device_registry/remove_config_entry', {
      device_id: deviceId,
      config_entry_id: configEntryId,
    });
  }

  /**
   * Update an entity registry entry. The server wraps the entry in
   * `entity_entry`; the unwrapped entry is returned.
   */
  async updateEntity(entityId: string, updates: Record<string, unknown>): Promise<EntityEntry> {
    const result = await this.sendCommand<{ entity_entry?: EntityEntry } & Partial<EntityEntry>>(
      'config/entity_registry/update',
      { ...updates, entity_id: entityId }
    );
    if (result.entity_entry) return result.entity_entry;
    return {
      entity_id: result.entity_id ?? entityId,
      area_id: result.area_id ?? null,
      device_id: result.device_id ?? null,
      disabled_by: result.disabled_by ?? null,
      hidden_by: result.hidden_by ?? null,
      name: result.name ?? null,
      platform: result.platform ?? '',
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  async createInputSelect(
    name: string,
    options: readonly string[],
    icon?: string
  ): Promise<HelperResult> {
    return this.sendCommand<HelperResult>('input_select/create', {
      name,
      options,
      ...(icon ? { icon } : {}),
    });
  }

  async createInputBoolean(name: string, icon?: string): Promise<HelperResult> {
    return this.sendCommand<HelperResult>('input_boolean/create', {
      name,
      ...(icon ? { icon } : {}),
    });
  }

  async createInputButton(name: string, icon?: string): Promise<HelperResult> {
    return this.sendCommand<HelperResult>('input_button/create', {
      name,
      ...(icon ? { icon } : {}),
    });
  }

  async createInputNumber(options: {
    readonly name: string;
    readonly min: number;
    readonly max: number;
    readonly step: number;
    readonly mode: string;
    readonly icon?: string;
    readonly initial?: number;
  }): Promise<HelperResult> {
    const { name, min, max, step, mode, icon, initial } = options;
    return this.sendCommand<HelperResult>('input_number/create', {
      name,
      min,
      max,
      step,
      mode,
      ...(icon ? { icon } : {}),
      ...(initial !== undefined ? { initial } : {}),
    });
  }

  async createInputText(options: {
    readonly name: string;
    readonly min: number;
    readonly max: number;
    readonly mode: string;
    readonly pattern?: string;
    readonly icon?: string;
  }): Promise<HelperResult> {
    const { name, min, max, mode, pattern, icon } = options;
    return this.sendCommand<HelperResult>('input_text/create', {
      name,
      min,
      max,
      mode,
      ...(pattern ? { pattern } : {}),
      ...(icon ? { icon } : {}),
    });
  }

  /**
   * Delete a helper created through the UI or API.
   *
   * @throws {HAClientError} For a domain that is not one of the `input_*` kinds
   */
  async deleteHelper(domain: string, objectId: string): Promise<void> {
    if (!HELPER_DOMAINS.some((d) => d === domain)) {
      throw new HAClientError(`unsupported helper domain: ${domain}`);
    }
    await this.sendCommand(`${domain}/delete`, { [`${domain}_id`]: objectId });
  }

  // ===========================================================================
  // Traces and Events
  // ===========================================================================

  async listTraces(domain: string, itemId: string): Promise<TraceSummary[]> {
    return this.sendCommand<TraceSummary[]>('trace/list', { domain, item_id: itemId });
  }

  async getTrace(domain: string, itemId: string, runId: string): Promise<TraceDetail> {
    return this.sendCommand<TraceDetail>('trace/get', {
      domain,
      item_id: itemId,
      run_id: runId,
    });
  }

  /**
   * Subscribe to an event type. Events then arrive through {@link readEvent}.
   */
  async subscribeEvents(eventType: string): Promise<void> {
    await this.sendCommand('subscribe_events', { event_type: eventType });
  }
}
