import { AsyncConnector } from './async-connector.js';
import type { ConnectorDeps } from './base-connector.js';
import { loadConfigFromEnv } from './config.js';
import { Connector } from './connector.js';
import type { ConnectorOverrides } from './types.js';

/**
 * Creates a connector configured from environment variables.
 * See loadConfigFromEnv for the variables read.
 *
 * @param overrides - Sentinel mode and master service overrides
 * @param deps - Transport, logger and phase listener
 */
export function createConnector(overrides?: ConnectorOverrides, deps?: ConnectorDeps): Connector {
  return new Connector(loadConfigFromEnv(), overrides, deps);
}

/**
 * Creates a suspending connector configured from environment variables.
 *
 * @param overrides - Sentinel mode and master service overrides
 * @param deps - Transport, logger and phase listener
 */
export function createAsyncConnector(
  overrides?: ConnectorOverrides,
  deps?: ConnectorDeps,
): AsyncConnector {
  return new AsyncConnector(loadConfigFromEnv(), overrides, deps);
}
