import { EventEmitter } from "node:events";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn = (...args: any[]) => void;

export interface TypedEmitterOptions {
  /**
   * Called when a listener throws. Without it the error propagates out of
   * `emit`, as with a plain EventEmitter.
   */
  onListenerError?: (err: unknown, event: string) => void;
}

export class TypedEventEmitter<
  T extends { [K in keyof T]: Fn },
> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly options: TypedEmitterOptions = {}) {}

  on<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.on(event, listener as Fn);
    return this;
  }

  off<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.off(event, listener as Fn);
    return this;
  }

  once<K extends string & keyof T>(event: K, listener: T[K]): this {
    this.emitter.once(event, listener as Fn);
    return this;
  }

  /** Every listener runs even if an earlier one threw, when `onListenerError` is set. */
  emit<K extends string & keyof T>(
    event: K,
    ...args: Parameters<T[K]>
  ): boolean {
    const onError = this.options.onListenerError;
    if (!onError) return this.emitter.emit(event, ...args);

    const listeners = this.emitter.rawListeners(event);
    for (const listener of listeners) {
      try {
        Reflect.apply(listener, undefined, args);
      } catch (err) {
        onError(err, event);
      }
    }
    return listeners.length > 0;
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    if (event === undefined) this.emitter.removeAllListeners();
    else this.emitter.removeAllListeners(event);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
