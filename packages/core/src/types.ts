import { z } from 'zod';

/**
 * Store types reachable through a Redis-protocol client.
 */
export const StoreTypes = {
  REDIS: 'redis',
  MEMCACHED: 'memcached',
  DRAGONFLY: 'dragonfly',
  VALKEY: 'valkey',
} as const;

/**
 * Store type tag
 */
export type StoreType = (typeof StoreTypes)[keyof typeof StoreTypes];

/**
 * Connection mode value that selects sentinel master discovery.
 * Any other mode connects directly.
 */
export const SENTINEL_MODE = 'sentinel';

/**
 * Default socket timeout for sentinel connections, in seconds
 */
export const DEFAULT_CONNECT_TIMEOUT_SECONDS = 30;

/**
 * Port used when a sentinel URI carries none
 */
export const DEFAULT_SENTINEL_PORT = 26379;

/**
 * Resolved store configuration. Built once and never mutated.
 */
export interface ResolvedConfig {
  /** Connection URI, `<scheme>://[:password@]host:port[/path]` */
  readonly uri: string;
  /** Explicit or inferred from the URI scheme */
  readonly storeType: StoreType;
  /** `"sentinel"` to discover the master through a sentinel */
  readonly sentinelConnectionMode?: string;
  /** Logical master service the sentinel resolves */
  readonly sentinelMasterServiceName?: string;
  /** Sentinel socket timeout in seconds */
  readonly connectTimeoutSeconds: number;
}

/**
 * Raw configuration input, before resolution
 */
export interface ConfigInput {
  uri?: string;
  storeType?: string;
  sentinelConnectionMode?: string;
  sentinelMasterServiceName?: string;
  connectTimeoutSeconds?: number;
}

const optionalName = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Zod schema for configuration input. The URI is checked separately so that
 * its absence surfaces as MissingURIError.
 */
export const ConfigInputSchema = z.object({
  uri: z.string().optional(),
  storeType: z.nativeEnum(StoreTypes).optional(),
  sentinelConnectionMode: optionalName,
  sentinelMasterServiceName: optionalName,
  connectTimeoutSeconds: z
    .number()
    .int('connectTimeoutSeconds must be an integer')
    .positive('connectTimeoutSeconds must be positive')
    .default(DEFAULT_CONNECT_TIMEOUT_SECONDS),
});

/**
 * Per-instance topology overrides
 */
export interface ConnectorOverrides {
  /** Replaces `sentinelConnectionMode` for Redis stores */
  connectionMode?: string;
  /** Replaces `sentinelMasterServiceName` for Redis stores */
  masterServiceName?: string;
}

/**
 * Options for a single connect call
 */
export interface ConnectOptions {
  /** Logical database index (default: 0) */
  db?: number;
  /** Return replies as strings (`true`, default) or as Buffers (`false`) */
  decodeResponses?: boolean;
  /** Sentinel socket timeout in seconds; falls back to the configured one */
  timeoutSeconds?: number;
}

/**
 * Zod schema for connect options
 */
export const ConnectOptionsSchema = z.object({
  db: z.number().int('db must be an integer').min(0, 'db must not be negative').default(0),
  decodeResponses: z.boolean().default(true),
  timeoutSeconds: z
    .number()
    .int('timeoutSeconds must be an integer')
    .positive('timeoutSeconds must be positive')
    .optional(),
});

/**
 * A sentinel node address
 */
export interface SentinelEndpoint {
  host: string;
  port: number;
}

/**
 * Phase of a single connect call
 */
export type ConnectPhase =
  | 'unresolved'
  | 'direct-connecting'
  | 'sentinel-discovering'
  | 'sentinel-selecting'
  | 'connected'
  | 'failed';

/**
 * Phase transition reported to an `onPhase` listener
 */
export interface ConnectPhaseEvent {
  /** Previous phase */
  previousPhase: ConnectPhase;
  /** New phase */
  phase: ConnectPhase;
  /** Database index the call targets */
  db: number;
  /** Timestamp of the change */
  timestamp: Date;
  /** Error if transitioning to failed */
  error?: unknown;
}

/**
 * Listener for connect phase changes
 */
export type ConnectPhaseListener = (event: ConnectPhaseEvent) => void;
