import { EventEmitter } from "node:events";

// eslint-disable-next-line @typescript-eslint/no-explicit-any
type Fn = (...args: any[]) => void;

export type EventMap<T> = { [K in keyof T]: Fn };

export class TypedEventEmitter<T extends EventMap<T>> {
  private readonly emitter = new EventEmitter();

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

  emit<K extends string & keyof T>(event: K, ...args: Parameters<T[K]>): boolean {
    return this.emitter.emit(event, ...args);
  }

  removeAllListeners<K extends string & keyof T>(event?: K): this {
    this.emitter.removeAllListeners(event);
    return this;
  }

  listenerCount<K extends string & keyof T>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}

interface Pending<T extends EventMap<T>> {
  readonly event: string & keyof T;
  readonly emit: (target: TypedEventEmitter<T>) => void;
}

export type ListenerErrorHandler<T> = (err: unknown, event: string & keyof T) => void;

/**
 * Holds events raised inside a transaction until it commits.
 * `flush` delivers them in raise order; `discard` drops them after a rollback.
 * A throwing listener is reported to `onError` and the remaining events are
 * still delivered.
 */
export class EventBuffer<T extends EventMap<T>> {
  private pending: Pending<T>[] = [];

  push<K extends string & keyof T>(event: K, ...args: Parameters<T[K]>): void {
    this.pending.push({ event, emit: (target) => target.emit(event, ...args) });
  }

  get size(): number {
    return this.pending.length;
  }

  flush(target: TypedEventEmitter<T>, onError: ListenerErrorHandler<T>): void {
    const batch = this.pending;
    this.pending = [];
    for (const item of batch) {
      try {
        item.emit(target);
      } catch (err) {
        onError(err, item.event);
      }
    }
  }

  discard(): void {
    this.pending = [];
  }
}
