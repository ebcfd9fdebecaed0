/**
 * Connection Supervisor: reconnect policy for one connection (the
 * market-data source or the store).
 *
 *   DISCONNECTED → no usable connection
 *   CONNECTING   → a reconnect attempt is in flight
 *   CONNECTED    → last probe succeeded
 *
 * `ensureConnected()` probes even when the state says CONNECTED. A failed
 * probe drops to DISCONNECTED and starts a bounded run of reconnect attempts
 * separated by a fixed delay.
 */

import { errorMessage, isAbortError } from './errors.js';
import { sleepWithAbort, type SleepFn } from './sleep.js';

export type ConnectionState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED';

/** Anything the supervisor can (re)connect and probe. */
export interface ManagedConnection {
  readonly name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** True only if the remote side answered a trivial request just now. */
  probe(): Promise<boolean>;
}

export interface ConnectionSupervisorOptions {
  /** Connect attempts per `ensureConnected()` call. Default 5. */
  maxAttempts?: number;
  /** Fixed wait between attempts. Default 10 000. */
  retryDelayMs?: number;
  onStateChange?: (from: ConnectionState, to: ConnectionState) => void;
  sleep?: SleepFn;
  log?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
}

export class ConnectionSupervisor {
  readonly connection: ManagedConnection;
  private state: ConnectionState = 'DISCONNECTED';
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly onStateChange: ((from: ConnectionState, to: ConnectionState) => void) | null;
  private readonly sleep: SleepFn;
  private readonly log: (message: string) => void;
  private readonly warn: (message: string) => void;
  private readonly error: (message: string) => void;

  constructor(connection: ManagedConnection, options: ConnectionSupervisorOptions = {}) {
    this.connection = connection;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 5));
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 10_000);
    this.onStateChange = options.onStateChange ?? null;
    this.sleep = options.sleep ?? sleepWithAbort;
    this.log = options.log ?? ((message: string) => console.log(message));
    this.warn = options.warn ?? ((message: string) => console.warn(message));
    this.error = options.error ?? ((message: string) => console.error(message));
  }

  get name(): string {
    return this.connection.name;
  }

  getState(): ConnectionState {
    return this.state;
  }

  /** Probe without reconnecting; a failure marks the connection DISCONNECTED. */
  async isConnected(): Promise<boolean> {
    if (this.state !== 'CONNECTED') return false;
    if (await this.safeProbe()) return true;
    this.transition('DISCONNECTED');
    return false;
  }

  /**
   * Return true once the connection answers a probe, reconnecting if needed.
   * Returns false when every attempt failed or `signal` aborted the backoff;
   * callers skip their unit of work, they never exit.
   */
  async ensureConnected(signal?: AbortSignal | null): Promise<boolean> {
    const wasConnected = this.state === 'CONNECTED';
    if (await this.isConnected()) return true;
    if (wasConnected) {
      this.warn(`[${this.name}] connection lost, attempting to reconnect...`);
    }
    return this.reconnect(signal);
  }

  /** Disconnect and move to DISCONNECTED. */
  async close(): Promise<void> {
    await this.safeDisconnect();
    this.transition('DISCONNECTED');
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async reconnect(signal?: AbortSignal | null): Promise<boolean> {
    await this.safeDisconnect();

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (signal?.aborted) break;
      this.transition('CONNECTING');
      this.log(`[${this.name}] connection attempt ${attempt}/${this.maxAttempts}`);
      try {
        await this.connection.connect();
        if (await this.safeProbe()) {
          this.transition('CONNECTED');
          this.log(`[${this.name}] connected`);
          return true;
        }
        this.warn(`[${this.name}] connected but probe failed (attempt ${attempt}/${this.maxAttempts})`);
        await this.safeDisconnect();
      } catch (err: unknown) {
        this.warn(`[${this.name}] connection attempt ${attempt}/${this.maxAttempts} failed: ${errorMessage(err)}`);
      }
      this.transition('DISCONNECTED');

      if (attempt < this.maxAttempts) {
        try {
          await this.sleep(this.retryDelayMs, signal);
        } catch (err: unknown) {
          if (isAbortError(err)) break;
          throw err;
        }
      }
    }

    this.transition('DISCONNECTED');
    this.error(`[${this.name}] failed to connect after ${this.maxAttempts} attempts`);
    return false;
  }

  private async safeProbe(): Promise<boolean> {
    try {
      return await this.connection.probe();
    } catch (err: unknown) {
      this.warn(`[${this.name}] probe failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private async safeDisconnect(): Promise<void> {
    try {
      await this.connection.disconnect();
    } catch (err: unknown) {
      this.warn(`[${this.name}] disconnect failed: ${errorMessage(err)}`);
    }
  }

  private transition(next: ConnectionState): void {
    const prev = this.state;
    if (prev === next) return;
    this.state = next;
    this.onStateChange?.(prev, next);
  }
}

export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StartupError';
  }
}

/**
 * Connect once at startup. Resolves false when `signal` was aborted during the
 * attempts, and throws StartupError when they ran out.
 */
export async function connectForStartup(
  supervisor: Pick<ConnectionSupervisor, 'ensureConnected'>,
  signal: AbortSignal,
  failureMessage: string,
): Promise<boolean> {
  if (await supervisor.ensureConnected(signal)) return true;
  if (signal.aborted) return false;
  throw new StartupError(failureMessage);
}
