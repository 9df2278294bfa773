import { EventEmitter } from "node:events";

export type ListenerArgs<T> = T extends void ? [] : [T];
export type TypedListener<T> = (...args: ListenerArgs<T>) => void;

export class TypedEventEmitter<
  Events extends { [K in keyof Events]: unknown },
> extends EventEmitter {
  declare on: EventEmitter["on"] &
    (<K extends keyof Events>(
      event: K,
      listener: TypedListener<Events[K]>,
    ) => this);
  declare once: EventEmitter["once"] &
    (<K extends keyof Events>(
      event: K,
      listener: TypedListener<Events[K]>,
    ) => this);
  declare off: EventEmitter["off"] &
    (<K extends keyof Events>(
      event: K,
      listener: TypedListener<Events[K]>,
    ) => this);
  declare emit: EventEmitter["emit"] &
    (<K extends keyof Events>(
      event: K,
      ...args: ListenerArgs<Events[K]>
    ) => boolean);

  /**
   * Resolves with the listener arguments of the next `event`; rejects after
   * `timeoutMs` when one is given.
   */
  next<K extends keyof Events>(
    event: K,
    timeoutMs?: number,
  ): Promise<ListenerArgs<Events[K]>> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const listener = (...args: ListenerArgs<Events[K]>) => {
        if (timer) clearTimeout(timer);
        resolve(args);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.off(event, listener);
          reject(new Error(`Timed out waiting ${timeoutMs}ms for '${String(event)}'`));
        }, timeoutMs);
      }
      this.once(event, listener);
    });
  }
}
