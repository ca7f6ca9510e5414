/**
 * In-process Home Assistant WebSocket server for tests.
 * @module testing/ws-mock
 */

import { WebSocketServer, type WebSocket } from 'ws';
import { isRecord } from '../utils.js';

/** Token the mock server accepts. */
export const TEST_TOKEN = 'test-secret';

/** A command failure the handler wants reported as `success: false`. */
export class MockCommandFailure extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
  }
}

/** Produces the `result` of a command, or throws {@link MockCommandFailure}. */
export type CommandHandler = (msg: Record<string, unknown>) => unknown;

/** Raw frames for exercising the client's handshake and read loop. */
export interface MockServerOptions {
  /** First frame sent on connect; `null` sends nothing. Defaults to `auth_required`. */
  readonly greeting?: string | null;
  /** Sent in answer to any `auth` frame instead of the usual verdict. */
  readonly authReply?: string;
  /** Command types that are recorded but never answered. */
  readonly unanswered?: readonly string[];
}

/**
 * WebSocket server speaking the auth handshake and result frames.
 *
 * @example
 * ```typescript
 * const server = await MockHAServer.start({
 *   'config/area_registry/list': () => [{ area_id: 'kitchen', name: 'Kitchen' }],
 * });
 * ```
 */
export class MockHAServer {
  /** Every command frame received after authentication. */
  readonly received: Record<string, unknown>[] = [];
  private readonly clients = new Set<WebSocket>();
  private readonly preface: string[] = [];
  private closed = false;

  private constructor(
    private readonly wss: WebSocketServer,
    private readonly handlers: Record<string, CommandHandler>,
    private readonly options: MockServerOptions
  ) {
    wss.on('connection', (socket) => this.accept(socket));
  }

  static async start(
    handlers: Record<string, CommandHandler> = {},
    options: MockServerOptions = {}
  ): Promise<MockHAServer> {
    const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
    return new MockHAServer(wss, handlers, options);
  }

  /** HTTP form of the server address, as a user would configure it. */
  get url(): string {
    const address = this.wss.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    return `http://127.0.0.1:${port}`;
  }

  /** Push an event frame to every connected client. */
  sendEvent(event: Record<string, unknown>, id = 1): void {
    const frame = JSON.stringify({ id, type: 'event', event });
    for (const socket of this.clients) {
      socket.send(frame);
    }
  }

  /** Send these frames, verbatim, ahead of the next command's reply. */
  queueFrames(...frames: string[]): void {
    this.preface.push(...frames);
  }

  /** Drop every client and stop listening. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const socket of this.clients) {
      socket.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private accept(socket: WebSocket): void {
    this.clients.add(socket);
    socket.on('close', () => this.clients.delete(socket));
    const { greeting = JSON.stringify({ type: 'auth_required', ha_version: '2024.6.0' }) } =
      this.options;
    if (greeting !== null) socket.send(greeting);

    let authenticated = false;
    socket.on('message', (data) => {
      const msg: unknown = JSON.parse(data.toString());
      if (!isRecord(msg)) return;

      if (!authenticated) {
        if (this.options.authReply !== undefined) {
          socket.send(this.options.authReply);
        } else if (msg.type === 'auth' && msg.access_token === TEST_TOKEN) {
          authenticated = true;
          socket.send(JSON.stringify({ type: 'auth_ok', ha_version: '2024.6.0' }));
        } else {
          socket.send(
            JSON.stringify({ type: 'auth_invalid', message: 'Invalid access token or password' })
          );
        }
        return;
      }

      this.received.push(msg);
      if (typeof msg.type === 'string' && this.options.unanswered?.includes(msg.type)) return;
      for (const frame of this.preface.splice(0)) {
        socket.send(frame);
      }
      socket.send(JSON.stringify(this.reply(msg)));
    });
  }

  private reply(msg: Record<string, unknown>): Record<string, unknown> {
    const id = msg.id;
    const handler = typeof msg.type === 'string' ? this.handlers[msg.type] : undefined;
    if (!handler) {
      return {
        id,
        type: 'result',
        success: false,
        error: { code: 'unknown_command', message: 'Unknown command.' },
      };
    }
    try {
      return { id, type: 'result', success: true, result: handler(msg) ?? null };
    } catch (err) {
      if (!(err instanceof MockCommandFailure)) throw err;
      return {
        id,
        type: 'result',
        success: false,
        error: { code: err.code, message: err.message },
      };
    }
  }
}
