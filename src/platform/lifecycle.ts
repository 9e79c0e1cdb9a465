// lifecycle.ts — IDisposable pattern shared by nodes, registries and services
//
// Tree nodes hold event subscriptions (view geometry changes, transformer
// completion) that must be released when a node leaves the tree.

// ─── IDisposable ─────────────────────────────────────────────────────────────

/**
 * An object that can release resources when no longer needed.
 */
export interface IDisposable {
  dispose(): void;
}

// ─── Simple Helpers ──────────────────────────────────────────────────────────

/**
 * Wraps a cleanup function into an IDisposable. The function runs at most once.
 */
export function toDisposable(fn: () => void): IDisposable {
  let disposed = false;
  return {
    dispose() {
      if (!disposed) {
        disposed = true;
        fn();
      }
    },
  };
}

// ─── DisposableStore ─────────────────────────────────────────────────────────

/**
 * Collection of disposables released together.
 * Adding to a disposed store disposes the item immediately.
 */
export class DisposableStore implements IDisposable {
  private readonly _disposables = new Set<IDisposable>();
  private _isDisposed = false;

  get isDisposed(): boolean {
    return this._isDisposed;
  }

  get size(): number {
    return this._disposables.size;
  }

  add<T extends IDisposable>(disposable: T): T {
    if (this._isDisposed) {
      disposable.dispose();
      return disposable;
    }
    this._disposables.add(disposable);
    return disposable;
  }

  dispose(): void {
    if (this._isDisposed) {
      return;
    }
    this._isDisposed = true;

    const errors: unknown[] = [];
    for (const d of this._disposables) {
      try {
        d.dispose();
      } catch (e) {
        errors.push(e);
      }
    }
    this._disposables.clear();
    if (errors.length > 0) {
      console.error(`[DisposableStore] ${errors.length} error(s) during dispose:`, errors);
    }
  }
}

// ─── MutableDisposable ───────────────────────────────────────────────────────

/**
 * Holds at most one disposable; replacing the value disposes the old one.
 */
export class MutableDisposable<T extends IDisposable> implements IDisposable {
  private _value: T | undefined;
  private _isDisposed = false;

  get value(): T | undefined {
    return this._isDisposed ? undefined : this._value;
  }

  set value(value: T | undefined) {
    if (this._isDisposed) {
      value?.dispose();
      return;
    }
    if (this._value !== value) {
      this._value?.dispose();
      this._value = value;
    }
  }

  clear(): void {
    this.value = undefined;
  }

  dispose(): void {
    this._isDisposed = true;
    this._value?.dispose();
    this._value = undefined;
  }
}

// ─── Disposable Base Class ───────────────────────────────────────────────────

/**
 * Base class for objects owning other disposables.
 * Subclasses register them via `_register()`; `dispose()` releases all of them.
 */
export abstract class Disposable implements IDisposable {
  private readonly _store = new DisposableStore();
  private _isDisposed = false;

  get isDisposed(): boolean {
    return this._isDisposed;
  }

  protected _register<T extends IDisposable>(disposable: T): T {
    return this._store.add(disposable);
  }

  dispose(): void {
    if (this._isDisposed) {
      return;
    }
    this._isDisposed = true;
    this._store.dispose();
  }
}
