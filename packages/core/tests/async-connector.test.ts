import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Redis } from 'ioredis';
import { MissingMasterServiceError, ValidationError } from '@memdb/errors';
import { configureLogger, getLoggerConfig, type LogEntry } from '@memdb/logger';
import { AsyncConnector } from '../src/async-connector.js';
import { resolveConfig } from '../src/config.js';
import type { ConnectPhaseEvent } from '../src/types.js';
import {
  constructorArgs,
  failNextClient,
  mockClients,
  resetMockRedis,
} from './helpers/ioredis-mock.js';

vi.mock('ioredis', async () => {
  const { Redis: MockRedis } = await import('./helpers/ioredis-mock.js');
  return { Redis: MockRedis };
});

const SENTINEL = { connectionMode: 'sentinel', masterServiceName: 'mymaster' };

describe('AsyncConnector', () => {
  const savedLoggerConfig = getLoggerConfig();
  let entries: LogEntry[];

  beforeEach(() => {
    resetMockRedis();
    entries = [];
    configureLogger({ level: 'debug', output: (entry) => entries.push(entry) });
  });

  afterEach(() => {
    configureLogger({ ...savedLoggerConfig, output: undefined });
  });

  describe('direct mode', () => {
    it('should connect to the URI with the requested database', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379/0' }));

      const handle = await connector.connect({ db: 1 });

      expect(Redis).toHaveBeenCalledTimes(1);
      expect(Redis).toHaveBeenCalledWith('redis://localhost:6379', { db: 1, lazyConnect: true });
      expect(mockClients[0].connect).toHaveBeenCalledTimes(1);
      expect(mockClients[0].select).not.toHaveBeenCalled();
      expect(handle).toBe(mockClients[0]);
    });

    it('should default to database 0', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379/4' }));

      await connector.connect();

      expect(Redis).toHaveBeenCalledWith('redis://localhost:6379', { db: 0, lazyConnect: true });
    });

    it('should return raw replies when decoding is off', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }));

      const handle = await connector.connect({ decodeResponses: false });

      expect(handle).not.toBe(mockClients[0]);
      await expect(handle.get('greeting')).resolves.toEqual(Buffer.from('value'));
      expect(mockClients[0].getBuffer).toHaveBeenCalledWith('greeting');
      expect(mockClients[0].get).not.toHaveBeenCalled();
    });

    it('should stay direct when the mode is not sentinel', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }), {
        connectionMode: 'cluster',
        masterServiceName: 'mymaster',
      });

      await connector.connect({ db: 2 });

      expect(Redis).toHaveBeenCalledWith('redis://localhost:6379', { db: 2, lazyConnect: true });
    });
  });

  describe('sentinel mode', () => {
    it('should resolve the master and select the database once', async () => {
      const connector = new AsyncConnector(
        resolveConfig({ uri: 'redis://:pw@localhost:6379/0' }),
        SENTINEL,
      );

      const handle = await connector.connect({ db: 3 });

      expect(Redis).toHaveBeenCalledTimes(1);
      expect(constructorArgs[0][0]).toMatchObject({
        sentinels: [{ host: 'localhost', port: 6379 }],
        password: 'pw',
        name: 'mymaster',
        role: 'master',
        connectTimeout: 30_000,
        sentinelCommandTimeout: 30_000,
        lazyConnect: true,
      });

      const client = mockClients[0];
      expect(client.select).toHaveBeenCalledTimes(1);
      expect(client.select).toHaveBeenCalledWith(3);
      expect(client.connect.mock.invocationCallOrder[0]).toBeLessThan(
        client.select.mock.invocationCallOrder[0],
      );
      expect(handle).toBe(client);
    });

    it('should use the per-call timeout over the configured one', async () => {
      const connector = new AsyncConnector(
        resolveConfig({ uri: 'redis://localhost:6379', connectTimeoutSeconds: 10 }),
        SENTINEL,
      );

      await connector.connect({ timeoutSeconds: 5 });

      expect(constructorArgs[0][0]).toMatchObject({
        connectTimeout: 5_000,
        sentinelCommandTimeout: 5_000,
      });
    });

    it('should fall back to the configured timeout', async () => {
      const connector = new AsyncConnector(
        resolveConfig({ uri: 'redis://localhost:6379', connectTimeoutSeconds: 10 }),
        SENTINEL,
      );

      await connector.connect();

      expect(constructorArgs[0][0]).toMatchObject({ connectTimeout: 10_000 });
    });

    it('should take the sentinel settings from the configuration', async () => {
      const connector = new AsyncConnector(
        resolveConfig({
          uri: 'redis://sentinel.internal:26380',
          sentinelConnectionMode: 'sentinel',
          sentinelMasterServiceName: 'orders',
        }),
      );

      await connector.connect();

      expect(connector.connectionMode).toBe('sentinel');
      expect(connector.masterServiceName).toBe('orders');
      expect(constructorArgs[0][0]).toMatchObject({
        sentinels: [{ host: 'sentinel.internal', port: 26380 }],
        name: 'orders',
      });
      expect(mockClients[0].select).toHaveBeenCalledWith(0);
    });

    it('should select through the raw command when decoding is off', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }), SENTINEL);

      await connector.connect({ db: 3, decodeResponses: false });

      expect(mockClients[0].selectBuffer).toHaveBeenCalledWith(3);
      expect(mockClients[0].select).not.toHaveBeenCalled();
    });

    it('should fail before any I/O without a master service name', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }), {
        connectionMode: 'sentinel',
      });

      await expect(connector.connect()).rejects.toBeInstanceOf(MissingMasterServiceError);
      expect(Redis).not.toHaveBeenCalled();
    });
  });

  describe('overrides', () => {
    it('should let overrides replace the configured topology for redis', () => {
      const connector = new AsyncConnector(
        resolveConfig({
          uri: 'redis://localhost:6379',
          sentinelConnectionMode: 'sentinel',
          sentinelMasterServiceName: 'orders',
        }),
        { masterServiceName: 'payments' },
      );

      expect(connector.connectionMode).toBe('sentinel');
      expect(connector.masterServiceName).toBe('payments');
    });

    it('should ignore overrides for other store types and warn', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'valkey://localhost:6381' }), SENTINEL);

      expect(connector.connectionMode).toBeUndefined();
      expect(connector.masterServiceName).toBeUndefined();
      expect(entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
        'Sentinel overrides ignored: sentinel topology is only available for redis stores',
      ]);

      await connector.connect();

      expect(Redis).toHaveBeenCalledWith('valkey://localhost:6381', { db: 0, lazyConnect: true });
    });

    it('should not warn when no overrides are given', () => {
      new AsyncConnector(resolveConfig({ uri: 'memcached://localhost:11211' }));

      expect(entries.filter((entry) => entry.level === 'warn')).toEqual([]);
    });
  });

  describe('failures', () => {
    it('should rethrow a connection error unchanged and close the handle', async () => {
      const refused = new Error('connect ECONNREFUSED 127.0.0.1:6379');
      failNextClient('connect', refused);
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }));

      await expect(connector.connect()).rejects.toBe(refused);
      expect(mockClients[0].disconnect).toHaveBeenCalledTimes(1);
    });

    it('should rethrow a failed select unchanged and close the handle', async () => {
      const denied = new Error('ERR DB index is out of range');
      failNextClient('select', denied);
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }), SENTINEL);

      await expect(connector.connect({ db: 99 })).rejects.toBe(denied);
      expect(mockClients[0].select).toHaveBeenCalledTimes(1);
      expect(mockClients[0].disconnect).toHaveBeenCalledTimes(1);
    });

    it('should stay usable after a failed call', async () => {
      failNextClient('connect', new Error('connect ETIMEDOUT'));
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }));

      await expect(connector.connect()).rejects.toThrow('connect ETIMEDOUT');
      const handle = await connector.connect();

      expect(handle).toBe(mockClients[1]);
    });

    it('should log the failure with the password masked', async () => {
      failNextClient('connect', new Error('connect ECONNREFUSED'));
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://:pw@localhost:6379' }));

      await expect(connector.connect({ db: 2 })).rejects.toThrow('connect ECONNREFUSED');

      const failure = entries.find((entry) => entry.level === 'error');
      expect(failure?.message).toBe('Connect failed');
      expect(failure?.context).toMatchObject({
        uri: 'redis://:***@localhost:6379',
        db: 2,
        component: 'mem-db',
        previousPhase: 'direct-connecting',
      });
      expect(failure?.error?.message).toBe('connect ECONNREFUSED');
    });

    it('should reject malformed options before any I/O', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }));

      await expect(connector.connect({ db: -1 })).rejects.toBeInstanceOf(ValidationError);
      expect(Redis).not.toHaveBeenCalled();
    });
  });

  describe('phases', () => {
    it('should report the phases of a sentinel connect', async () => {
      const events: ConnectPhaseEvent[] = [];
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }), SENTINEL, {
        onPhase: (event) => events.push(event),
      });

      await connector.connect({ db: 5 });

      expect(events.map(({ previousPhase, phase }) => [previousPhase, phase])).toEqual([
        ['unresolved', 'sentinel-discovering'],
        ['sentinel-discovering', 'sentinel-selecting'],
        ['sentinel-selecting', 'connected'],
      ]);
      expect(events.every((event) => event.db === 5)).toBe(true);
    });

    it('should report the phases of a failed direct connect', async () => {
      const refused = new Error('connect ECONNREFUSED');
      failNextClient('connect', refused);
      const events: ConnectPhaseEvent[] = [];
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }), {}, {
        onPhase: (event) => events.push(event),
      });

      await expect(connector.connect()).rejects.toBe(refused);

      expect(events.map((event) => event.phase)).toEqual(['direct-connecting', 'failed']);
      expect(events[1].error).toBe(refused);
    });

    it('should keep connecting when the phase listener throws', async () => {
      const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }), {}, {
        onPhase: () => {
          throw new Error('listener broke');
        },
      });

      await expect(connector.connect()).resolves.toBe(mockClients[0]);
      expect(
        entries.filter((entry) => entry.message === 'Error in connect phase listener'),
      ).toHaveLength(2);
    });
  });

  it('should be frozen', () => {
    const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }));

    expect(Object.isFrozen(connector)).toBe(true);
    expect(Reflect.set(connector, 'uri', 'redis://elsewhere:6379')).toBe(false);
    expect(connector.uri).toBe('redis://localhost:6379');
  });

  it('should serve concurrent calls with separate handles', async () => {
    const connector = new AsyncConnector(resolveConfig({ uri: 'redis://localhost:6379' }));

    const [first, second] = await Promise.all([connector.connect({ db: 1 }), connector.connect({ db: 2 })]);

    expect(first).toBe(mockClients[0]);
    expect(second).toBe(mockClients[1]);
    expect(first).not.toBe(second);
  });
});
