/**
 * Operational event logging: every message goes to pino, and INFO / WARNING /
 * ERROR messages are also appended to the store's `collection_events` table
 * once a sink is attached.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../lib/errors.js';
import type { CollectionEvent, EventLevel } from './barStore.js';

export interface EventSink {
  logEvent(event: CollectionEvent): Promise<void>;
}

export interface EventContext {
  instrument?: string;
  timeframe?: string;
  details?: Record<string, unknown>;
}

export class EventLogger {
  private readonly logger: Logger;
  private sink: EventSink | null;
  private readonly pending = new Set<Promise<void>>();

  constructor(logger: Logger, sink: EventSink | null = null) {
    this.logger = logger;
    this.sink = sink;
  }

  attach(sink: EventSink): void {
    this.sink = sink;
  }

  detach(): void {
    this.sink = null;
  }

  debug(message: string, context: EventContext = {}): void {
    this.logger.debug(this.fields(context), message);
  }

  info(message: string, context: EventContext = {}): void {
    this.logger.info(this.fields(context), message);
    this.persist('INFO', message, context);
  }

  warning(message: string, context: EventContext = {}): void {
    this.logger.warn(this.fields(context), message);
    this.persist('WARNING', message, context);
  }

  error(message: string, context: EventContext = {}): void {
    this.logger.error(this.fields(context), message);
    this.persist('ERROR', message, context);
  }

  /** Wait for every event-log write started so far. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private fields(context: EventContext): Record<string, unknown> {
    const fields: Record<string, unknown> = {};
    if (context.instrument) fields.instrument = context.instrument;
    if (context.timeframe) fields.timeframe = context.timeframe;
    if (context.details) fields.details = context.details;
    return fields;
  }

  private persist(level: EventLevel, message: string, context: EventContext): void {
    const sink = this.sink;
    if (!sink) return;
    const event: CollectionEvent = {
      level,
      message,
      instrument: context.instrument ?? null,
      timeframe: context.timeframe ?? null,
      details: context.details ?? null,
    };
    // Write failures are reported on pino only; they never reach the caller.
    const write: Promise<void> = sink.logEvent(event).then(
      () => {
        this.pending.delete(write);
      },
      (err: unknown) => {
        this.pending.delete(write);
        this.logger.warn({ eventLevel: level }, `[event-log] write failed: ${errorMessage(err)}`);
      },
    );
    this.pending.add(write);
  }
}
