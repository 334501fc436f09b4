import { Redis, type RedisOptions } from 'ioredis';
import type { SentinelEndpoint } from './types.js';

/**
 * Connected client handle. Owned by the caller, who must close it.
 */
export type ClientHandle = Redis;

/**
 * Request for a client connected straight to a URL
 */
export interface DirectConnectRequest {
  url: string;
  db: number;
  decodeResponses: boolean;
}

/**
 * Request for a sentinel client
 */
export interface SentinelRequest {
  endpoints: SentinelEndpoint[];
  /** Socket timeout in seconds */
  timeoutSeconds: number;
  /** Password for the master */
  password?: string;
}

/**
 * Client that resolves master handles through sentinel nodes
 */
export interface SentinelClient {
  /**
   * Create a handle bound to the current master of a service. The lookup
   * happens when the handle is opened.
   */
  masterFor(serviceName: string, options: { decodeResponses: boolean }): ClientHandle;
}

/**
 * The client library seen by the connectors. Handle creation does no I/O;
 * `open` and `select` do.
 */
export interface MemDbTransport {
  fromUrl(request: DirectConnectRequest): ClientHandle;
  sentinel(request: SentinelRequest): SentinelClient;
  /** Establish the connection; for a sentinel handle, discover the master */
  open(handle: ClientHandle): Promise<void>;
  /** Issue `SELECT db` */
  select(handle: ClientHandle, db: number): Promise<void>;
  /** Drop the connection without waiting for pending replies */
  close(handle: ClientHandle): void;
}

/** Methods that build transactions or change the connection mode; never rerouted */
const CONTROL_METHODS = new Set([
  'multi',
  'exec',
  'pipeline',
  'discard',
  'subscribe',
  'unsubscribe',
  'psubscribe',
  'punsubscribe',
  'ssubscribe',
  'sunsubscribe',
  'monitor',
]);

function isBuilder(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !(value instanceof Promise);
}

type Method = (...args: unknown[]) => unknown;

/**
 * Proxy whose methods run against `target` and hand the proxy back wherever
 * the target would return itself, so chained calls stay wrapped. `wrap`
 * receives each method already bound, and `bind` to bind another one.
 */
function wrapMethods<T extends object>(
  target: T,
  wrap: (name: string | symbol, method: Method, bind: (fn: Function) => Method) => Method,
): T {
  const proxy: T = new Proxy(target, {
    get(obj, property) {
      const value: unknown = Reflect.get(obj, property);
      if (typeof value !== 'function') {
        return value;
      }
      const bind =
        (fn: Function): Method =>
        (...args) => {
          const result: unknown = Reflect.apply(fn, obj, args);
          return result === obj ? proxy : result;
        };
      return wrap(property, bind(value), bind);
    },
  });
  return proxy;
}

/**
 * Route every data command to its `*Buffer` variant, so replies arrive as
 * raw bytes. Pipelines and transactions built from the handle are routed
 * the same way.
 */
export function withRawReplies<T extends object>(client: T): T {
  return wrapMethods(client, (name, method, bind) => {
    if (typeof name !== 'string') {
      return method;
    }
    if (name === 'pipeline' || name === 'multi') {
      return (...args) => {
        const builder = method(...args);
        return isBuilder(builder) ? withRawReplies(builder) : builder;
      };
    }
    if (name.endsWith('Buffer') || CONTROL_METHODS.has(name)) {
      return method;
    }
    const raw: unknown = Reflect.get(client, `${name}Buffer`);
    return typeof raw === 'function' ? bind(raw) : method;
  });
}

function isCommand(target: object, name: string): boolean {
  return typeof Reflect.get(target, name.endsWith('Buffer') ? name : `${name}Buffer`) === 'function';
}

/**
 * Hold every command sent through the handle until `ready` settles. Held
 * commands run once it resolves and reject with its error once it rejects,
 * so nothing reaches the server before `ready` says the connection may be
 * used. Pipelines and transactions are held at `exec`.
 */
export function holdUntil<T extends object>(client: T, ready: Promise<void>): T {
  return wrapMethods(client, (name, method) => {
    if (name === 'pipeline' || name === 'multi') {
      return (...args) => {
        const builder = method(...args);
        return isBuilder(builder) ? holdExec(builder, ready) : builder;
      };
    }
    if (typeof name === 'string' && isCommand(client, name)) {
      return (...args) => ready.then(() => method(...args));
    }
    return method;
  });
}

function holdExec<T extends object>(builder: T, ready: Promise<void>): T {
  return wrapMethods(builder, (name, method) =>
    name === 'exec' ? (...args) => ready.then(() => method(...args)) : method,
  );
}

/**
 * Drop the database path from a URL so the requested index applies.
 */
function withoutDatabasePath(url: string): string {
  const target = new URL(url);
  target.pathname = '';
  return target.toString();
}

/**
 * MemDbTransport backed by ioredis.
 *
 * Handles are created with `lazyConnect`, so building one never touches the
 * network; the first command or `open` connects.
 */
export class IoredisTransport implements MemDbTransport {
  fromUrl(request: DirectConnectRequest): ClientHandle {
    const client = new Redis(withoutDatabasePath(request.url), {
      db: request.db,
      lazyConnect: true,
    });
    return request.decodeResponses ? client : withRawReplies(client);
  }

  sentinel(request: SentinelRequest): SentinelClient {
    const timeoutMs = request.timeoutSeconds * 1000;
    const base: RedisOptions = {
      sentinels: request.endpoints.map(({ host, port }) => ({ host, port })),
      password: request.password,
      connectTimeout: timeoutMs,
      sentinelCommandTimeout: timeoutMs,
      // A failed lookup ends the connect call instead of cycling the sentinels
      sentinelRetryStrategy: () => null,
      // Only the configured sentinel is asked; the ones it knows of are not learnt
      updateSentinels: false,
      lazyConnect: true,
    };

    return {
      masterFor(serviceName, { decodeResponses }) {
        const client = new Redis({ ...base, name: serviceName, role: 'master' });
        return decodeResponses ? client : withRawReplies(client);
      },
    };
  }

  async open(handle: ClientHandle): Promise<void> {
    await handle.connect();
  }

  async select(handle: ClientHandle, db: number): Promise<void> {
    await handle.select(db);
  }

  close(handle: ClientHandle): void {
    handle.disconnect();
  }
}
