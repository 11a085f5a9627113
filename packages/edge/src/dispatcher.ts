/**
 * doorsync Dispatcher
 *
 * Keyed publish/subscribe. Listeners registered under a key receive every
 * value published to that key after they subscribe; nothing is replayed.
 * Publishing from inside a listener queues the value behind the current
 * delivery, so every listener sees values in publish order.
 */

import { createLogger, errorMessage, type Logger } from './edge-logger.js';

export type Listener<T> = (value: T, key: string) => void;

export type Unsubscribe = () => void;

/** Key helpers for the entities the runtime publishes. */
export const entityKey = {
  door: (doorId: number): string => `door:${doorId}`,
  tempCodes: (doorId: number): string => `temp-codes:${doorId}`,
  otrSchedules: (): string => 'otr-schedules',
  connection: (): string => 'connection',
} as const;

interface Subscription<T> {
  listener: Listener<T>;
  active: boolean;
}

export class Dispatcher<T> {
  private readonly subscriptions = new Map<string, Subscription<T>[]>();
  private readonly queue: Array<{ key: string; value: T; targets: Subscription<T>[] }> = [];
  private draining = false;
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('dispatcher');
  }

  subscribe(key: string, listener: Listener<T>): Unsubscribe {
    const subscription: Subscription<T> = { listener, active: true };
    const list = this.subscriptions.get(key) ?? [];
    list.push(subscription);
    this.subscriptions.set(key, list);

    return () => {
      if (!subscription.active) return;
      subscription.active = false;
      const current = this.subscriptions.get(key);
      if (!current) return;
      const remaining = current.filter((s) => s !== subscription);
      if (remaining.length > 0) this.subscriptions.set(key, remaining);
      else this.subscriptions.delete(key);
    };
  }

  /** Deliver to the listeners subscribed right now. */
  publish(key: string, value: T): void {
    const targets = this.subscriptions.get(key);
    if (!targets || targets.length === 0) return;

    this.queue.push({ key, value, targets: [...targets] });
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next) {
        for (const subscription of next.targets) {
          if (!subscription.active) continue;
          try {
            subscription.listener(next.value, next.key);
          } catch (err: unknown) {
            this.log.error({ key: next.key, err: errorMessage(err) }, 'Listener threw');
          }
        }
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  listenerCount(key: string): number {
    return this.subscriptions.get(key)?.length ?? 0;
  }

  clear(): void {
    for (const list of this.subscriptions.values()) {
      for (const subscription of list) subscription.active = false;
    }
    this.subscriptions.clear();
    this.queue.length = 0;
  }
}
