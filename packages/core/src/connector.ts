import { BaseConnector, type ConnectorDeps, type PhaseTracker } from './base-connector.js';
import type { ConnectionPlan, SentinelPlan } from './plan.js';
import { holdUntil, type ClientHandle } from './transport.js';
import type { ConnectOptions, ConnectorOverrides, ResolvedConfig } from './types.js';

/**
 * Connector whose connect call returns at once.
 *
 * The handle connects in the background and the first command the caller
 * sends is the one that waits. In sentinel mode the returned handle holds
 * every command until the master has been resolved and `SELECT db` has
 * succeeded on it; if either step fails, the held commands reject with that
 * error and the handle is closed.
 *
 * @example
 * ```typescript
 * const connector = new Connector(loadConfigFromEnv());
 * const client = connector.connect({ db: 1 });
 * console.log(await client.get('greeting'));
 * ```
 */
export class Connector extends BaseConnector {
  constructor(config: ResolvedConfig, overrides?: ConnectorOverrides, deps?: ConnectorDeps) {
    super(config, overrides, deps);
    Object.freeze(this);
  }

  /**
   * Create a new client handle.
   *
   * Errors raised while building the handle propagate unchanged. A failed
   * sentinel lookup or `SELECT` rejects the commands held on the handle,
   * is emitted unchanged on its `error` event and closes it.
   *
   * @param options - Database index, reply decoding and sentinel timeout
   * @returns A handle the caller must close
   */
  connect(options: ConnectOptions = {}): ClientHandle {
    const tracker = this.track(options.db ?? 0);

    let plan: ConnectionPlan;
    try {
      plan = this.plan(options);
    } catch (error) {
      tracker.advance('failed', error);
      throw error;
    }

    try {
      if (plan.kind === 'direct') {
        tracker.advance('direct-connecting');
        const handle = this.transport.fromUrl({
          url: plan.url,
          db: plan.db,
          decodeResponses: plan.decodeResponses,
        });
        handle.once('ready', () => tracker.advance('connected'));
        return handle;
      }

      return this.connectThroughSentinel(plan, tracker);
    } catch (error) {
      tracker.advance('failed', error);
      throw error;
    }
  }

  private connectThroughSentinel(plan: SentinelPlan, tracker: PhaseTracker): ClientHandle {
    tracker.advance('sentinel-discovering');
    const sentinel = this.transport.sentinel({
      endpoints: plan.endpoints,
      timeoutSeconds: plan.timeoutSeconds,
      password: plan.password,
    });
    const handle = sentinel.masterFor(plan.serviceName, { decodeResponses: plan.decodeResponses });

    // SELECT goes out only once the master is ready, so the client never queues it for replay
    const ready = this.transport.open(handle).then(() => {
      tracker.advance('sentinel-selecting');
      return this.transport.select(handle, plan.db);
    });

    void ready.then(
      () => tracker.advance('connected'),
      (error: unknown) => this.rejectHandle(handle, tracker, error),
    );

    return holdUntil(handle, ready);
  }

  private rejectHandle(handle: ClientHandle, tracker: PhaseTracker, error: unknown): void {
    tracker.advance('failed', error);
    this.transport.close(handle);

    // Without a listener an 'error' event would throw; the failure is logged above
    if (handle.listenerCount('error') > 0) {
      handle.emit('error', error);
    }
  }
}
