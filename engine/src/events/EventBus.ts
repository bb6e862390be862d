import {
  EngineEventType,
  isEventOfType,
  type AnyEngineEvent,
} from './EngineEvents.js';
import { createSilentLogger, type EngineLogger } from '../logging/EngineLogger.js';

export type EventListener<T extends EngineEventType> = (
  event: Extract<AnyEngineEvent, { type: T }>,
) => void | Promise<void>;

export type WildcardListener = (event: AnyEngineEvent) => void | Promise<void>;

interface Subscription {
  readonly invoke: WildcardListener;
}

/**
 * EventBus - pub/sub between the executor and its observers
 *
 * - Listeners run in registration order, wildcard listeners last
 * - Emission is synchronous; a listener's promise is not awaited
 * - A throwing or rejecting listener is logged and never affects the run
 *   or the other listeners
 *
 * @example
 * ```ts
 * const bus = new EventBus(logger);
 * bus.on(EngineEventType.STEP_FAILED, (event) => {
 *   report(event.stepId, event.payload.result.error);
 * });
 * bus.onAny((event) => trace(event));
 * ```
 */
export class EventBus {
  private readonly listeners = new Map<EngineEventType, Subscription[]>();
  private readonly wildcardListeners: Subscription[] = [];

  constructor(private readonly logger: EngineLogger = createSilentLogger()) {}

  /**
   * @returns Unsubscribe function
   */
  on<T extends EngineEventType>(eventType: T, listener: EventListener<T>): () => void {
    const subscription: Subscription = {
      invoke: (event) => (isEventOfType(event, eventType) ? listener(event) : undefined),
    };
    const list = this.listeners.get(eventType) ?? [];
    list.push(subscription);
    this.listeners.set(eventType, list);

    return () => removeSubscription(list, subscription);
  }

  /**
   * Subscribe to every event type
   */
  onAny(listener: WildcardListener): () => void {
    const subscription: Subscription = { invoke: listener };
    this.wildcardListeners.push(subscription);
    return () => removeSubscription(this.wildcardListeners, subscription);
  }

  /**
   * Subscribe for a single delivery
   */
  once<T extends EngineEventType>(eventType: T, listener: EventListener<T>): void {
    const unsubscribe = this.on(eventType, (event) => {
      unsubscribe();
      return listener(event);
    });
  }

  emit(event: AnyEngineEvent): void {
    const subscriptions = [...(this.listeners.get(event.type) ?? []), ...this.wildcardListeners];

    for (const subscription of subscriptions) {
      try {
        const outcome = subscription.invoke(event);
        if (outcome instanceof Promise) {
          outcome.catch((error: unknown) => this.reportListenerError(event, error));
        }
      } catch (error) {
        this.reportListenerError(event, error);
      }
    }
  }

  off(eventType: EngineEventType): void {
    this.listeners.delete(eventType);
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.length = 0;
  }

  listenerCount(eventType: EngineEventType): number {
    return (this.listeners.get(eventType)?.length ?? 0) + this.wildcardListeners.length;
  }

  private reportListenerError(event: AnyEngineEvent, error: unknown): void {
    this.logger.error(`Listener for "${event.type}" failed`, error, { runId: event.runId });
  }
}

function removeSubscription(list: Subscription[], subscription: Subscription): void {
  const index = list.indexOf(subscription);
  if (index !== -1) {
    list.splice(index, 1);
  }
}
