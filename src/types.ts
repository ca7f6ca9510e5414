/**
 * Type definitions for the Home Assistant CLI.
 * @module types
 */

// =============================================================================
// WebSocket Message Types
// =============================================================================

/**
 * A frame received from the Home Assistant WebSocket API.
 * The structure varies based on the message type.
 */
export interface HAMessage {
  readonly id?: number;
  readonly type: string;
  readonly success?: boolean;
  readonly result?: unknown;
  readonly error?: { readonly message?: string; readonly code?: string };
  readonly message?: string;
  readonly ha_version?: string;
  readonly event?: HAEvent;
}

/**
 * Context attached to states and events.
 */
export interface HAContext {
  readonly id: string;
  readonly parent_id?: string | null;
  readonly user_id?: string | null;
}

/**
 * An event pushed by a `subscribe_events` subscription.
 */
export interface HAEvent {
  readonly event_type: string;
  readonly data: {
    readonly entity_id?: string;
    readonly old_state?: HAState | null;
    readonly new_state?: HAState | null;
  };
  readonly origin?: string;
  readonly time_fired: string;
  readonly context?: HAContext;
}

/**
 * An `event` frame carrying a subscription event.
 */
export interface HAEventMessage {
  readonly id: number;
  readonly type: 'event';
  readonly event: HAEvent;
}

// =============================================================================
// Entity and State Types
// =============================================================================

/**
 * A Home Assistant entity state.
 * Represents the current state and attributes of an entity.
 */
export interface HAState {
  readonly entity_id: string;
  readonly state: string;
  readonly attributes: Record<string, unknown>;
  readonly last_changed?: string;
  readonly last_updated?: string;
  readonly context?: HAContext;
}

/**
 * Home Assistant configuration returned by `GET /api/config`.
 */
export interface HAConfig {
  readonly version: string;
  readonly location_name: string;
  readonly time_zone: string;
  readonly unit_system?: Record<string, string>;
  readonly state?: string;
  readonly country?: string | null;
  readonly language?: string;
  readonly components: readonly string[];
}

// =============================================================================
// Service Types
// =============================================================================

export interface ServiceField {
  readonly name?: string;
  readonly description?: string;
  readonly required?: boolean;
  readonly example?: unknown;
  readonly selector?: Record<string, unknown>;
}

export interface ServiceTarget {
  readonly entity?: readonly Record<string, unknown>[];
  readonly device?: readonly Record<string, unknown>[];
  readonly area?: readonly Record<string, unknown>[];
}

export interface ServiceInfo {
  readonly name?: string;
  readonly description?: string;
  readonly fields?: Record<string, ServiceField>;
  readonly target?: ServiceTarget;
}

/** One element of the `GET /api/services` response. */
export interface ServiceDomain {
  readonly domain: string;
  readonly services: Record<string, ServiceInfo>;
}

/** Services keyed by domain, then by service name. */
export type ServiceMap = Record<string, Record<string, ServiceInfo>>;

// =============================================================================
// Stored Configuration Types (scenes, scripts, automations)
// =============================================================================

/** Captured state of one entity inside a scene. */
export type SceneEntityState = Record<string, unknown>;

export interface SceneConfig {
  readonly id: string;
  readonly name: string;
  readonly entities?: Record<string, SceneEntityState>;
  readonly icon?: string;
  readonly [key: string]: unknown;
}

export interface ScriptConfig {
  readonly alias: string;
  readonly description?: string;
  readonly icon?: string;
  readonly mode?: string;
  readonly sequence: readonly Record<string, unknown>[];
  readonly [key: string]: unknown;
}

export interface AutomationConfig {
  readonly id: string;
  readonly alias: string;
  readonly description?: string;
  readonly mode?: string;
  readonly triggers: readonly Record<string, unknown>[];
  readonly conditions: readonly Record<string, unknown>[];
  readonly actions: readonly Record<string, unknown>[];
  readonly [key: string]: unknown;
}

// =============================================================================
// Trace Types
// =============================================================================

/**
 * Summary information about a script or automation run.
 * Returned by `trace/list`.
 */
export interface TraceSummary {
  readonly run_id: string;
  readonly state: string;
  readonly script_execution?: string | null;
  readonly timestamp: { readonly start: string; readonly finish?: string | null };
  readonly domain?: string;
  readonly item_id?: string;
  readonly last_step?: string | null;
  readonly error?: string;
}

/**
 * Full trace for one run, returned by `trace/get`.
 */
export interface TraceDetail extends TraceSummary {
  readonly trace?: Record<string, unknown>;
  readonly config?: Record<string, unknown>;
  readonly context?: HAContext;
  readonly [key: string]: unknown;
}

// =============================================================================
// Registry Types
// =============================================================================

/**
 * Device registry entry.
 */
export interface DeviceEntry {
  readonly id: string;
  readonly area_id: string | null;
  readonly config_entries: readonly string[];
  readonly disabled_by: string | null;
  readonly manufacturer: string | null;
  readonly model: string | null;
  readonly name: string | null;
  readonly name_by_user: string | null;
  readonly sw_version?: string | null;
  readonly hw_version?: string | null;
  readonly serial_number?: string | null;
  readonly via_device_id?: string | null;
  readonly entry_type?: string | null;
  readonly identifiers?: readonly (readonly string[])[];
  readonly connections?: readonly (readonly string[])[];
  readonly labels?: readonly string[];
  readonly [key: string]: unknown;
}

/**
 * Area registry entry.
 */
export interface AreaEntry {
  readonly area_id: string;
  readonly name: string;
  readonly aliases: readonly string[];
  readonly floor_id: string | null;
  readonly icon: string | null;
  readonly labels?: readonly string[];
  readonly picture?: string | null;
}

/**
 * Entity registry entry.
 */
export interface EntityEntry {
  readonly entity_id: string;
  readonly id?: string;
  readonly area_id: string | null;
  readonly device_id: string | null;
  readonly config_entry_id?: string | null;
  readonly disabled_by: string | null;
  readonly hidden_by: string | null;
  readonly entity_category?: string | null;
  readonly icon?: string | null;
  readonly name: string | null;
  readonly original_name?: string | null;
  readonly platform: string;
  readonly labels?: readonly string[];
}

/** Helper record returned by the `input_*` create commands. */
export interface HelperResult {
  readonly id: string;
  readonly name: string;
  readonly [key: string]: unknown;
}

/** Helper domains accepted by the create and delete commands. */
export const HELPER_DOMAINS = [
  'input_select',
  'input_boolean',
  'input_button',
  'input_number',
  'input_text',
] as const;

export type HelperDomain = (typeof HELPER_DOMAINS)[number];

// =============================================================================
// Command Types
// =============================================================================

/**
 * Flags accepted by every command.
 */
export interface GlobalOptions {
  readonly json?: boolean;
  readonly config?: string;
  readonly url?: string;
  readonly token?: string;
  readonly timeout: number;
  readonly verbose?: boolean;
}

/**
 * Context passed to all command handlers.
 * Contains positional arguments, command options, and global flags.
 */
export interface CommandContext<O extends object = Record<string, never>> {
  /** Positional arguments of the command */
  readonly args: readonly string[];
  /** Options declared on the command itself */
  readonly options: O;
  /** Global flags */
  readonly globals: GlobalOptions;
}

/**
 * Command handler function signature.
 * All command handlers must conform to this type.
 */
export type CommandHandler<O extends object = Record<string, never>> = (
  ctx: CommandContext<O>
) => Promise<void>;
