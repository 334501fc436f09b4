import { MissingMasterServiceError, ValidationError, fromZodError } from '@memdb/errors';
import {
  ConnectOptionsSchema,
  DEFAULT_SENTINEL_PORT,
  SENTINEL_MODE,
  type ConnectOptions,
  type SentinelEndpoint,
} from './types.js';

/**
 * Connector state a plan is derived from
 */
export interface PlanInput {
  uri: string;
  connectionMode?: string;
  masterServiceName?: string;
  connectTimeoutSeconds: number;
}

/**
 * Connect straight to the URI
 */
export interface DirectPlan {
  kind: 'direct';
  url: string;
  db: number;
  decodeResponses: boolean;
}

/**
 * Ask a sentinel for the current master, then select the database on it
 */
export interface SentinelPlan {
  kind: 'sentinel';
  endpoints: [SentinelEndpoint];
  password?: string;
  timeoutSeconds: number;
  serviceName: string;
  db: number;
  decodeResponses: boolean;
}

export type ConnectionPlan = DirectPlan | SentinelPlan;

/**
 * Parsed network location and credential of a URI
 */
export interface ParsedUri {
  host: string;
  port: number;
  password?: string;
}

function invalidUri(reason: string): ValidationError {
  return new ValidationError('Invalid connection URI', { uri: [reason] });
}

function decodePassword(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    if (error instanceof URIError) {
      throw invalidUri('password is not valid percent-encoding');
    }
    throw error;
  }
}

/**
 * Split a URI into host, port and password.
 * The password is percent-decoded; an empty one counts as absent.
 *
 * @throws ValidationError if the URI or its password cannot be parsed
 */
export function parseUri(uri: string, defaultPort: number = DEFAULT_SENTINEL_PORT): ParsedUri {
  let url: URL;
  try {
    url = new URL(uri);
  } catch (error) {
    if (error instanceof TypeError) {
      throw invalidUri('not a valid URL');
    }
    throw error;
  }
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  const port = url.port ? parseInt(url.port, 10) : defaultPort;
  const password = url.password ? decodePassword(url.password) : undefined;

  return password === undefined ? { host, port } : { host, port, password };
}

/**
 * Mask the password of a URI so it can be logged.
 */
export function redactUri(uri: string): string {
  return uri.replace(/^([^:/]*:\/\/[^:@/]*:)[^@/]*@/, '$1***@');
}

/**
 * Decide how a connect call reaches the store. Pure; performs no I/O, so
 * both connectors take the same branch and raise the same configuration
 * errors for the same input.
 *
 * @throws ValidationError for malformed options
 * @throws MissingMasterServiceError in sentinel mode without a service name
 * @throws ValidationError for a sentinel URI that cannot be parsed
 */
export function planConnection(input: PlanInput, options: ConnectOptions = {}): ConnectionPlan {
  const parsed = ConnectOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid connect options');
  }
  const { db, decodeResponses, timeoutSeconds } = parsed.data;

  if (input.connectionMode !== SENTINEL_MODE) {
    return { kind: 'direct', url: input.uri, db, decodeResponses };
  }

  if (!input.masterServiceName) {
    throw new MissingMasterServiceError();
  }

  const { host, port, password } = parseUri(input.uri);

  return {
    kind: 'sentinel',
    endpoints: [{ host, port }],
    password,
    timeoutSeconds: timeoutSeconds ?? input.connectTimeoutSeconds,
    serviceName: input.masterServiceName,
    db,
    decodeResponses,
  };
}
