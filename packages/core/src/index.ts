/**
 * @memdb/core - Connection factory for Redis-protocol key-value stores
 *
 * This package provides:
 * - Configuration resolution with store type inference from the URI scheme
 * - Direct connections and sentinel master discovery
 * - A connector that returns handles at once and one that awaits readiness
 *
 * @example
 * ```typescript
 * import { AsyncConnector, resolveConfig } from '@memdb/core';
 *
 * const config = resolveConfig({
 *   uri: 'redis://:secret@sentinel.internal:26379/0',
 *   sentinelConnectionMode: 'sentinel',
 *   sentinelMasterServiceName: 'mymaster',
 * });
 *
 * const connector = new AsyncConnector(config);
 * const client = await connector.connect({ db: 3 });
 * try {
 *   await client.set('key', 'value');
 * } finally {
 *   await client.quit();
 * }
 * ```
 *
 * @packageDocumentation
 */

// Configuration
export { resolveConfig, resolveStoreType, loadConfigFromEnv } from './config.js';

// Connectors
export { BaseConnector, type ConnectorDeps, type PhaseTracker } from './base-connector.js';
export { Connector } from './connector.js';
export { AsyncConnector } from './async-connector.js';
export { createConnector, createAsyncConnector } from './factory.js';

// Connection planning
export {
  planConnection,
  parseUri,
  redactUri,
  type ConnectionPlan,
  type DirectPlan,
  type SentinelPlan,
  type PlanInput,
  type ParsedUri,
} from './plan.js';

// Transport
export {
  IoredisTransport,
  holdUntil,
  withRawReplies,
  type ClientHandle,
  type MemDbTransport,
  type SentinelClient,
  type DirectConnectRequest,
  type SentinelRequest,
} from './transport.js';

// Types
export type {
  StoreType,
  ResolvedConfig,
  ConfigInput,
  ConnectorOverrides,
  ConnectOptions,
  SentinelEndpoint,
  ConnectPhase,
  ConnectPhaseEvent,
  ConnectPhaseListener,
} from './types.js';

export {
  StoreTypes,
  SENTINEL_MODE,
  DEFAULT_CONNECT_TIMEOUT_SECONDS,
  DEFAULT_SENTINEL_PORT,
  ConfigInputSchema,
  ConnectOptionsSchema,
} from './types.js';

// Errors raised by this package
export {
  ConfigurationError,
  MissingURIError,
  UnsupportedProtocolError,
  MissingMasterServiceError,
  ValidationError,
  isConfigurationError,
} from '@memdb/errors';
