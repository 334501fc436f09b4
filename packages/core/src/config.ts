import {
  MissingURIError,
  UnsupportedProtocolError,
  ValidationError,
  assertMemDb,
  fromZodError,
} from '@memdb/errors';
import {
  ConfigInputSchema,
  StoreTypes,
  type ConfigInput,
  type ResolvedConfig,
  type StoreType,
} from './types.js';

const SCHEMES: Record<string, StoreType> = {
  redis: StoreTypes.REDIS,
  memcached: StoreTypes.MEMCACHED,
  dragonfly: StoreTypes.DRAGONFLY,
  valkey: StoreTypes.VALKEY,
};

/**
 * Determine the store type for a URI.
 *
 * An explicit type is returned as given, even when it disagrees with the
 * scheme. Otherwise the scheme (text before the first `://`) is mapped.
 *
 * @throws MissingURIError if the URI is absent or empty
 * @throws UnsupportedProtocolError if the scheme maps to no store type
 */
export function resolveStoreType(uri: string | undefined, explicitStoreType?: StoreType): StoreType {
  assertMemDb(Boolean(uri), () => new MissingURIError());

  if (explicitStoreType) {
    return explicitStoreType;
  }

  const scheme = (uri ?? '').split('://')[0] ?? '';
  if (!Object.prototype.hasOwnProperty.call(SCHEMES, scheme)) {
    throw new UnsupportedProtocolError(scheme);
  }
  return SCHEMES[scheme];
}

/**
 * Validate configuration input and resolve it into an immutable config.
 *
 * @param input - URI, optional store type and sentinel settings
 * @returns Frozen resolved configuration
 * @throws MissingURIError, UnsupportedProtocolError or ValidationError
 */
export function resolveConfig(input: ConfigInput): ResolvedConfig {
  const parsed = ConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid store configuration');
  }

  const { uri, storeType, sentinelConnectionMode, sentinelMasterServiceName, connectTimeoutSeconds } =
    parsed.data;

  const resolvedStoreType = resolveStoreType(uri, storeType);

  return Object.freeze({
    uri: uri ?? '',
    storeType: resolvedStoreType,
    sentinelConnectionMode,
    sentinelMasterServiceName,
    connectTimeoutSeconds,
  });
}

/**
 * Resolve configuration from environment variables.
 *
 * Expected environment variables:
 * - DB_URL: Connection URI (required)
 * - DB_TYPE: redis | memcached | dragonfly | valkey (inferred from DB_URL when unset)
 * - REDIS_CONNECTION_TYPE: `sentinel` for master discovery
 * - REDIS_MASTER_SERVICE: Sentinel master service name
 * - DB_TIMEOUT: Sentinel socket timeout in seconds (default: 30)
 *
 * Loading a `.env` file into the environment is left to the caller.
 *
 * @param env - Environment to read (default: process.env)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const timeout = env.DB_TIMEOUT;
  let connectTimeoutSeconds: number | undefined;

  if (timeout) {
    if (!/^\d+$/.test(timeout.trim())) {
      throw new ValidationError('Invalid store configuration', {
        DB_TIMEOUT: ['DB_TIMEOUT must be an integer number of seconds'],
      });
    }
    connectTimeoutSeconds = parseInt(timeout, 10);
  }

  return resolveConfig({
    uri: env.DB_URL,
    storeType: env.DB_TYPE || undefined,
    sentinelConnectionMode: env.REDIS_CONNECTION_TYPE,
    sentinelMasterServiceName: env.REDIS_MASTER_SERVICE,
    connectTimeoutSeconds,
  });
}
