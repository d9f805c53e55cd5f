/**
 * @mirrorchain/ledger/bus - In-process Event Bus
 *
 * Topic-based publish/subscribe used to tell collaborators (API layer,
 * dashboards) about ledger changes without coupling them to the ledger.
 *
 * @module
 */

import { randomUUID } from 'node:crypto';

/**
 * Event levels
 */
export type EventLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Bus event structure
 */
export interface BusEvent<T = unknown> {
  /** Event ID (UUID) */
  id: string;
  /** Topic for routing (e.g., 'ledger.record.appended') */
  topic: string;
  level: EventLevel;
  /** Actor emitting the event */
  actor: string;
  /** Timestamp in milliseconds */
  timestamp: number;
  /** Event payload */
  data: T;
  /** Correlation ID for request/response chains */
  correlationId?: string;
}

export type EmitOptions = Partial<Pick<BusEvent, 'level' | 'correlationId'>>;

/**
 * Topic subscription handler
 */
export type TopicHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;

export type TopicFilter = (topic: string) => boolean;

/**
 * Subscription handle for cleanup
 */
export interface Subscription {
  unsubscribe: () => void;
  /** Topic pattern subscribed to */
  pattern: string;
}

export interface BusConfig {
  /** Actor name stamped on emitted events */
  actor: string;
  /** Called when a subscriber throws; the error never reaches the emitter */
  onHandlerError?: (error: unknown, event: BusEvent, pattern: string) => void;
  /** Events kept for getEvents/query; the oldest are dropped first (default 1000) */
  maxEvents?: number;
}

export const DEFAULT_MAX_EVENTS = 1000;

/**
 * Create a topic matcher for glob patterns ('ledger.*', 'ledger.record.?ppended')
 */
export function createTopicMatcher(pattern: string): TopicFilter {
  const regexPattern = pattern
    .replace(/\./g, '\\.')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');

  const regex = new RegExp(`^${regexPattern}$`);
  return (topic: string) => regex.test(topic);
}

interface Registered {
  matcher: TopicFilter;
  handler: TopicHandler;
  subscription: Subscription;
}

/**
 * Abstract Bus class
 */
export abstract class Bus {
  protected readonly config: BusConfig;
  protected subscriptions: Map<string, Set<Registered>> = new Map();

  constructor(config: BusConfig) {
    this.config = config;
  }

  /**
   * Emit an event to the bus
   */
  abstract emit<T>(topic: string, data: T, options?: EmitOptions): Promise<BusEvent<T>>;

  /**
   * Subscribe to a topic pattern
   */
  subscribe<T = unknown>(pattern: string, handler: TopicHandler<T>): Subscription {
    let subs = this.subscriptions.get(pattern);
    if (!subs) {
      subs = new Set();
      this.subscriptions.set(pattern, subs);
    }

    const registered: Registered = {
      matcher: createTopicMatcher(pattern),
      handler: (event) => handler(event as BusEvent<T>),
      subscription: {
        pattern,
        unsubscribe: () => {
          const current = this.subscriptions.get(pattern);
          if (current) {
            current.delete(registered);
            if (current.size === 0) {
              this.subscriptions.delete(pattern);
            }
          }
        },
      },
    };

    subs.add(registered);
    return registered.subscription;
  }

  /**
   * Dispatch event to matching subscribers
   */
  protected async dispatch(event: BusEvent): Promise<void> {
    for (const [pattern, subs] of this.subscriptions) {
      for (const registered of subs) {
        if (!registered.matcher(event.topic)) {
          continue;
        }
        try {
          await registered.handler(event);
        } catch (error) {
          this.config.onHandlerError?.(error, event, pattern);
        }
      }
    }
  }

  protected createEvent<T>(topic: string, data: T, options?: EmitOptions): BusEvent<T> {
    return {
      id: randomUUID(),
      topic,
      level: options?.level ?? 'info',
      actor: this.config.actor,
      timestamp: Date.now(),
      data,
      correlationId: options?.correlationId,
    };
  }
}

/**
 * In-memory bus implementation
 */
export class MemoryBus extends Bus {
  private events: BusEvent[] = [];
  private readonly maxEvents: number;

  constructor(config: BusConfig) {
    super(config);
    const maxEvents = config.maxEvents ?? DEFAULT_MAX_EVENTS;
    if (!Number.isInteger(maxEvents) || maxEvents < 0) {
      throw new RangeError(`maxEvents must be a non-negative integer, got ${maxEvents}`);
    }
    this.maxEvents = maxEvents;
  }

  async emit<T>(topic: string, data: T, options?: EmitOptions): Promise<BusEvent<T>> {
    const event = this.createEvent(topic, data, options);
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }
    await this.dispatch(event);
    return event;
  }

  /**
   * Get all events (for testing/debugging)
   */
  getEvents(): BusEvent[] {
    return [...this.events];
  }

  /**
   * Query events by topic pattern
   */
  query(pattern: string, limit?: number): BusEvent[] {
    const matcher = createTopicMatcher(pattern);
    const matching = this.events.filter((e) => matcher(e.topic));
    return limit ? matching.slice(-limit) : matching;
  }

  clear(): void {
    this.events = [];
  }
}

export function createBus(config: BusConfig): MemoryBus {
  return new MemoryBus(config);
}
