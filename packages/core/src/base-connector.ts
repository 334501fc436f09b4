import { type ILogger, createLogger } from '@memdb/logger';
import { planConnection, redactUri, type ConnectionPlan } from './plan.js';
import { IoredisTransport, type MemDbTransport } from './transport.js';
import {
  StoreTypes,
  type ConnectOptions,
  type ConnectPhase,
  type ConnectPhaseListener,
  type ConnectorOverrides,
  type ResolvedConfig,
  type StoreType,
} from './types.js';

/**
 * Collaborators a connector is built with
 */
export interface ConnectorDeps {
  /** Client library (default: ioredis) */
  transport?: MemDbTransport;
  /** Logger (default: a logger tagged `component: 'mem-db'`) */
  logger?: ILogger;
  /** Notified of every phase change of every connect call */
  onPhase?: ConnectPhaseListener;
}

/**
 * Phase tracker for one connect call
 */
export interface PhaseTracker {
  readonly phase: ConnectPhase;
  advance(phase: ConnectPhase, error?: unknown): void;
}

/**
 * Settings and decision logic shared by the blocking and the suspending
 * connector. Holds no per-call state; one instance may serve any number of
 * concurrent connect calls.
 */
export abstract class BaseConnector {
  readonly uri: string;
  readonly storeType: StoreType;
  readonly connectionMode?: string;
  readonly masterServiceName?: string;

  protected readonly config: ResolvedConfig;
  protected readonly transport: MemDbTransport;
  protected readonly logger: ILogger;
  private readonly onPhase?: ConnectPhaseListener;

  /**
   * @param config - Resolved configuration supplying the defaults
   * @param overrides - Topology overrides, honoured for Redis stores only
   * @param deps - Transport, logger and phase listener
   */
  constructor(config: ResolvedConfig, overrides: ConnectorOverrides = {}, deps: ConnectorDeps = {}) {
    this.config = config;
    this.uri = config.uri;
    this.storeType = config.storeType;
    this.transport = deps.transport ?? new IoredisTransport();
    this.logger = deps.logger ?? createLogger({ component: 'mem-db' });
    this.onPhase = deps.onPhase;

    if (this.storeType === StoreTypes.REDIS) {
      this.connectionMode = overrides.connectionMode ?? config.sentinelConnectionMode;
      this.masterServiceName = overrides.masterServiceName ?? config.sentinelMasterServiceName;
    } else if (overrides.connectionMode !== undefined || overrides.masterServiceName !== undefined) {
      this.logger.warn('Sentinel overrides ignored: sentinel topology is only available for redis stores', {
        storeType: this.storeType,
        connectionMode: overrides.connectionMode,
        masterServiceName: overrides.masterServiceName,
      });
    }
  }

  /**
   * Work out how a connect call reaches the store.
   */
  protected plan(options: ConnectOptions): ConnectionPlan {
    return planConnection(
      {
        uri: this.uri,
        connectionMode: this.connectionMode,
        masterServiceName: this.masterServiceName,
        connectTimeoutSeconds: this.config.connectTimeoutSeconds,
      },
      options,
    );
  }

  /**
   * Start tracking the phases of one connect call.
   */
  protected track(db: number): PhaseTracker {
    const onPhase = this.onPhase;
    const log = this.logger.child({ uri: redactUri(this.uri), db });
    let current: ConnectPhase = 'unresolved';

    return {
      get phase() {
        return current;
      },
      advance(phase, error) {
        const previousPhase = current;
        current = phase;

        if (phase === 'failed') {
          log.error('Connect failed', { previousPhase, error });
        } else {
          log.debug(`Connect phase ${phase}`, { previousPhase });
        }

        try {
          onPhase?.({ previousPhase, phase, db, timestamp: new Date(), error });
        } catch (listenerError) {
          log.error('Error in connect phase listener', { error: listenerError });
        }
      },
    };
  }
}
