import { BaseConnector, type ConnectorDeps } from './base-connector.js';
import type { ConnectionPlan } from './plan.js';
import type { ClientHandle } from './transport.js';
import type { ConnectOptions, ConnectorOverrides, ResolvedConfig } from './types.js';

/**
 * Connector whose connect call suspends until the handle is ready.
 *
 * @example
 * ```typescript
 * const connector = new AsyncConnector(loadConfigFromEnv());
 * const client = await connector.connect({ db: 2 });
 * await client.set('greeting', 'hello');
 * await client.quit();
 * ```
 */
export class AsyncConnector extends BaseConnector {
  constructor(config: ResolvedConfig, overrides?: ConnectorOverrides, deps?: ConnectorDeps) {
    super(config, overrides, deps);
    Object.freeze(this);
  }

  /**
   * Open a new client handle.
   *
   * Direct mode connects to the URI. Sentinel mode asks the sentinel for the
   * master of `masterServiceName`, then selects `db` on it. Transport errors
   * are rethrown as they were raised; the half-open handle is closed first.
   *
   * @param options - Database index, reply decoding and sentinel timeout
   * @returns A connected handle the caller must close
   */
  async connect(options: ConnectOptions = {}): Promise<ClientHandle> {
    const tracker = this.track(options.db ?? 0);

    let plan: ConnectionPlan;
    try {
      plan = this.plan(options);
    } catch (error) {
      tracker.advance('failed', error);
      throw error;
    }

    let handle: ClientHandle | undefined;
    try {
      if (plan.kind === 'direct') {
        tracker.advance('direct-connecting');
        handle = this.transport.fromUrl({
          url: plan.url,
          db: plan.db,
          decodeResponses: plan.decodeResponses,
        });
        await this.transport.open(handle);
      } else {
        tracker.advance('sentinel-discovering');
        const sentinel = this.transport.sentinel({
          endpoints: plan.endpoints,
          timeoutSeconds: plan.timeoutSeconds,
          password: plan.password,
        });
        handle = sentinel.masterFor(plan.serviceName, { decodeResponses: plan.decodeResponses });
        await this.transport.open(handle);

        tracker.advance('sentinel-selecting');
        await this.transport.select(handle, plan.db);
      }

      tracker.advance('connected');
      return handle;
    } catch (error) {
      if (handle) {
        this.transport.close(handle);
      }
      tracker.advance('failed', error);
      throw error;
    }
  }
}
