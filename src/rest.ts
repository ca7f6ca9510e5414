/**
 * REST client for the Home Assistant HTTP API.
 * @module rest
 */

import { APIError, errorMessage, HAClientError } from './errors.js';
import type {
  AutomationConfig,
  HAConfig,
  HAState,
  SceneConfig,
  ScriptConfig,
  ServiceDomain,
  ServiceMap,
} from './types.js';

/** Stored configuration kinds served under `/api/config/<kind>/config/<id>`. */
type ConfigKind = 'scene' | 'script' | 'automation';

/**
 * Thin wrapper over `fetch` that adds the bearer token, a per-request
 * timeout and Home Assistant's status code conventions.
 *
 * @example
 * ```typescript
 * const client = new RestClient('http://homeassistant.local:8123', token, 30);
 * const states = await client.getStates();
 * ```
 */
export class RestClient {
  private readonly baseUrl: string;

  /**
   * @param baseUrl - Server URL; a trailing slash is ignored
   * @param token - Long-lived access token
   * @param timeoutSeconds - Abort each request after this many seconds
   */
  constructor(
    baseUrl: string,
    private readonly token: string,
    private readonly timeoutSeconds: number
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  /**
   * Send a request and read its body. The timeout covers both the exchange
   * and the body read.
   *
   * @returns The response body as text
   */
  private async request(method: string, path: string, body?: unknown): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutSeconds * 1000);

    let status: number;
    let text: string;
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new HAClientError(`request timed out after ${this.timeoutSeconds}s`, 'TIMEOUT', {
          cause: err,
        });
      }
      throw new HAClientError(`request failed: ${errorMessage(err)}`, undefined, { cause: err });
    } finally {
      clearTimeout(timeoutId);
    }

    if (status === 401) throw APIError.unauthorized();
    if (status === 404) throw APIError.notFound();
    if (status < 200 || status >= 300) {
      throw new APIError(status, text);
    }
    return text;
  }

  private async getJson<T>(path: string): Promise<T> {
    return JSON.parse(await this.request('GET', path)) as T;
  }

  private async postJson<T>(path: string, body: unknown): Promise<T> {
    return JSON.parse(await this.request('POST', path, body)) as T;
  }

  // ===========================================================================
  // Core API
  // ===========================================================================

  /** Verify the server is reachable and the token is accepted. */
  async checkConnection(): Promise<void> {
    await this.request('GET', '/api/');
  }

  async getConfig(): Promise<HAConfig> {
    return this.getJson<HAConfig>('/api/config');
  }

  async getStates(): Promise<HAState[]> {
    return this.getJson<HAState[]>('/api/states');
  }

  async getState(entityId: string): Promise<HAState> {
    return this.getJson<HAState>(`/api/states/${entityId}`);
  }

  /**
   * Overwrite an entity's state representation. This does not talk to the
   * underlying device.
   */
  async setState(
    entityId: string,
    state: string,
    attributes?: Record<string, unknown>
  ): Promise<HAState> {
    const body = attributes ? { state, attributes } : { state };
    return this.postJson<HAState>(`/api/states/${entityId}`, body);
  }

  /**
   * Call a service and return the states it changed.
   */
  async callService(
    domain: string,
    service: string,
    data: Record<string, unknown> = {}
  ): Promise<HAState[]> {
    return this.postJson<HAState[]>(`/api/services/${domain}/${service}`, data);
  }

  /**
   * List services, keyed by domain and then by service name.
   */
  async getServices(): Promise<ServiceMap> {
    const domains = await this.getJson<ServiceDomain[]>('/api/services');
    const services: ServiceMap = {};
    for (const { domain, services: byName } of domains) {
      services[domain] = byName;
    }
    return services;
  }

  // ===========================================================================
  // Stored Configurations
  // ===========================================================================

  private configPath(kind: ConfigKind, id: string): string {
    return `/api/config/${kind}/config/${id}`;
  }

  private async saveConfig(kind: ConfigKind, id: string, config: object): Promise<void> {
    await this.request('POST', this.configPath(kind, id), config);
  }

  private async deleteConfig(kind: ConfigKind, id: string): Promise<void> {
    await this.request('DELETE', this.configPath(kind, id));
  }

  async getSceneConfig(id: string): Promise<SceneConfig> {
    return this.getJson<SceneConfig>(this.configPath('scene', id));
  }

  async createScene(id: string, config: SceneConfig): Promise<void> {
    await this.saveConfig('scene', id, config);
  }

  async updateScene(id: string, config: SceneConfig): Promise<void> {
    await this.saveConfig('scene', id, config);
  }

  async deleteScene(id: string): Promise<void> {
    await this.deleteConfig('scene', id);
  }

  async getScriptConfig(id: string): Promise<ScriptConfig> {
    return this.getJson<ScriptConfig>(this.configPath('script', id));
  }

  async createScript(id: string, config: ScriptConfig): Promise<void> {
    await this.saveConfig('script', id, config);
  }

  async updateScript(id: string, config: ScriptConfig): Promise<void> {
    await this.saveConfig('script', id, config);
  }

  async deleteScript(id: string): Promise<void> {
    await this.deleteConfig('script', id);
  }

  async getAutomationConfig(id: string): Promise<AutomationConfig> {
    return this.getJson<AutomationConfig>(this.configPath('automation', id));
  }

  async createAutomation(id: string, config: AutomationConfig): Promise<void> {
    await this.saveConfig('automation', id, config);
  }

  async updateAutomation(id: string, config: AutomationConfig): Promise<void> {
    await this.saveConfig('automation', id, config);
  }

  async deleteAutomation(id: string): Promise<void> {
    await this.deleteConfig('automation', id);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /** Replace the options of an `input_select` helper. */
  async setInputSelectOptions(entityId: string, options: readonly string[]): Promise<void> {
    await this.callService('input_select', 'set_options', { entity_id: entityId, options });
  }
}
