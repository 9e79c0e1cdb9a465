// events.ts — typed emitters
//
// Every subscription returns an IDisposable. Views report geometry changes,
// leaves report transformer changes and the workspace set reports layout
// passes through these.

import { toDisposable, type IDisposable } from './lifecycle.js';

// ─── Event Type ──────────────────────────────────────────────────────────────

/**
 * Subscribe a listener; dispose the result to unsubscribe.
 */
export type Event<T> = (listener: (e: T) => void) => IDisposable;

// ─── Emitter ─────────────────────────────────────────────────────────────────

/**
 * A typed event emitter. Exposes `event` for subscription and `fire` for dispatch.
 */
export class Emitter<T> implements IDisposable {
  private _listeners = new Set<(e: T) => void>();
  private _disposed = false;
  private _event: Event<T> | undefined;

  get event(): Event<T> {
    if (!this._event) {
      this._event = (listener: (e: T) => void): IDisposable => {
        if (this._disposed) {
          return toDisposable(() => {});
        }
        this._listeners.add(listener);
        return toDisposable(() => {
          this._listeners.delete(listener);
        });
      };
    }
    return this._event;
  }

  /**
   * Notify all listeners. Listeners added during dispatch are not called.
   */
  fire(event: T): void {
    if (this._disposed) {
      return;
    }
    for (const listener of [...this._listeners]) {
      listener(event);
    }
  }

  get hasListeners(): boolean {
    return this._listeners.size > 0;
  }

  get listenerCount(): number {
    return this._listeners.size;
  }

  dispose(): void {
    this._disposed = true;
    this._listeners.clear();
    this._event = undefined;
  }
}

// ─── Event Composition Utilities ─────────────────────────────────────────────

export namespace EventUtils {

  /**
   * An event that delivers at most one notification, then unsubscribes.
   */
  export function once<T>(event: Event<T>): Event<T> {
    return (listener: (e: T) => void): IDisposable => {
      let didFire = false;
      const subscription = event((e) => {
        if (!didFire) {
          didFire = true;
          subscription.dispose();
          listener(e);
        }
      });
      if (didFire) {
        subscription.dispose();
      }
      return subscription;
    };
  }

  /**
   * Only forward events for which the predicate holds.
   */
  export function filter<T>(event: Event<T>, predicate: (value: T) => boolean): Event<T> {
    return (listener: (e: T) => void): IDisposable => {
      return event((value) => {
        if (predicate(value)) {
          listener(value);
        }
      });
    };
  }
}
