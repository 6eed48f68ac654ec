import { z } from 'zod';

// ─── Defaults ────────────────────────────────────────────────────────────

export const DEFAULT_HOSTNAME = 'meshnode';
export const DEFAULT_COUNTRY_CODE = 'US';
export const DEFAULT_LED_MODE = 'enable';

export const LED_MODES = ['enable', 'disable', 'heartbeat'] as const;
export type LedMode = (typeof LED_MODES)[number];

// ─── Zod Schemas (decoding) ──────────────────────────────────────────────
//
// These schemas check value TYPES and fill defaults. Semantic invariants
// (DNS labels, unique SSIDs, known peripherals...) live in validate.ts so
// that every violation is reported together.

export const WifiNetworkSchema = z.object({
  ssid: z.string(),
  /** Empty for an open network */
  psk: z.string().default(''),
});

export const NetworkingSchema = z.object({
  hostname: z.string().default(DEFAULT_HOSTNAME),
  wifi_enabled: z.boolean().default(false),
  country_code: z.string().default(DEFAULT_COUNTRY_CODE),
  wifi: z.array(WifiNetworkSchema).default([]),
  /** Preferred wireless interface; auto-detected when unset */
  wifi_interface: z.string().optional(),
  /** Preferred wired interface; auto-detected when unset */
  ethernet_interface: z.string().optional(),
});

/** `running` follows `enabled` unless given explicitly. */
export const ServiceSchema = z
  .object({
    enabled: z.boolean().default(false),
    running: z.boolean().optional(),
  })
  .transform((s) => ({ enabled: s.enabled, running: s.running ?? s.enabled }));

export const LedSettingsSchema = z
  .object({
    mode: z.enum(LED_MODES).default(DEFAULT_LED_MODE),
  })
  .transform((s) => ({ family: 'led' as const, mode: s.mode }));

export const BusSettingsSchema = z
  .object({
    enabled: z.boolean().default(false),
    speed: z.number().optional(),
  })
  .transform((s) =>
    s.speed === undefined
      ? { family: 'bus' as const, enabled: s.enabled }
      : { family: 'bus' as const, enabled: s.enabled, speed: s.speed },
  );

/** Top-level shape; hardware entries are decoded per family afterwards. */
export const RawConfigSchema = z.object({
  networking: NetworkingSchema.default({}),
  services: z.record(z.string(), ServiceSchema).default({}),
  hardware: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
});

// ─── Model Types ─────────────────────────────────────────────────────────

export interface WifiNetwork {
  readonly ssid: string;
  readonly psk: string;
}

export interface NetworkingConfig {
  readonly hostname: string;
  readonly wifi_enabled: boolean;
  readonly country_code: string;
  readonly wifi: readonly WifiNetwork[];
  readonly wifi_interface?: string;
  readonly ethernet_interface?: string;
}

export interface ServiceState {
  readonly enabled: boolean;
  readonly running: boolean;
}

export interface LedSettings {
  readonly family: 'led';
  readonly mode: LedMode;
}

export interface BusSettings {
  readonly family: 'bus';
  readonly enabled: boolean;
  /** Bus clock in Hz; absent means the board default */
  readonly speed?: number;
}

export type PeripheralSettings = LedSettings | BusSettings;

/**
 * Canonical model of the device's desired (or observed) configuration.
 * Instances are deep-frozen; use mergeModel() to derive a changed copy.
 */
export interface ConfigModel {
  readonly networking: NetworkingConfig;
  /** Services absent from the map are not managed */
  readonly services: Readonly<Record<string, ServiceState>>;
  /** Peripherals absent from the map are not managed */
  readonly hardware: Readonly<Record<string, PeripheralSettings>>;
}

/** Subset of the model owned by one adapter. */
export interface PartialConfigModel {
  readonly networking?: NetworkingConfig;
  readonly services?: Readonly<Record<string, ServiceState>>;
  readonly hardware?: Readonly<Record<string, PeripheralSettings>>;
}

/** Deep partial used to derive a new model from an existing one. */
export interface ModelPatch {
  networking?: Partial<NetworkingConfig>;
  /** `null` removes the service from management */
  services?: Record<string, Partial<ServiceState> | null>;
  /** `null` removes the peripheral from management */
  hardware?: Record<string, PeripheralSettings | null>;
}
