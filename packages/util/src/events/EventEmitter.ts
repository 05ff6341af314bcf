/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Map of event name to the tuple of arguments its listeners receive.
 *
 * @example
 * ```typescript
 * type RegistryEvents = { model_registered: [model: string] };
 * ```
 */
export type EventArgumentMap = Record<string, readonly unknown[]>;

/**
 * A listener function for an event.
 * @template Events - A record of event names and their argument tuples
 * @template Event - The name of the event
 */
export type EventListener<Events extends EventArgumentMap, Event extends keyof Events> = (
  ...args: Events[Event]
) => void;

interface ListenerEntry<Listener> {
  listener: Listener;
  once: boolean;
}

/**
 * A minimal, synchronously dispatching, typed event emitter.
 * @template Events - A record of event names and their argument tuples
 */
export class EventEmitter<Events extends EventArgumentMap> {
  private listeners: {
    [Event in keyof Events]?: ListenerEntry<EventListener<Events, Event>>[];
  } = {};

  /**
   * Adds a listener function for the event
   * @returns this, so that calls can be chained
   */
  on<Event extends keyof Events>(event: Event, listener: EventListener<Events, Event>): this {
    this.entries(event).push({ listener, once: false });
    return this;
  }

  /**
   * Adds a listener that is removed after its first call
   * @returns this, so that calls can be chained
   */
  once<Event extends keyof Events>(event: Event, listener: EventListener<Events, Event>): this {
    this.entries(event).push({ listener, once: true });
    return this;
  }

  /**
   * Removes a listener function for the event
   * @returns this, so that calls can be chained
   */
  off<Event extends keyof Events>(event: Event, listener: EventListener<Events, Event>): this {
    const entries = this.listeners[event];
    if (!entries) return this;
    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index >= 0) {
      entries.splice(index, 1);
    }
    return this;
  }

  /**
   * Remove all listeners for a specific event or all events
   */
  removeAllListeners<Event extends keyof Events>(event?: Event): this {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
    return this;
  }

  /**
   * Subscribes to an event and returns a function to unsubscribe
   */
  subscribe<Event extends keyof Events>(
    event: Event,
    listener: EventListener<Events, Event>
  ): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  /**
   * Calls every listener of the event, in registration order
   */
  emit<Event extends keyof Events>(event: Event, ...args: Events[Event]): void {
    const entries = this.listeners[event];
    if (!entries) return;
    // once listeners are dropped before dispatch
    this.listeners[event] = entries.filter((entry) => !entry.once);
    for (const { listener } of entries) {
      listener(...args);
    }
  }

  private entries<Event extends keyof Events>(
    event: Event
  ): ListenerEntry<EventListener<Events, Event>>[] {
    const existing = this.listeners[event];
    if (existing) return existing;
    const created: ListenerEntry<EventListener<Events, Event>>[] = [];
    this.listeners[event] = created;
    return created;
  }
}
