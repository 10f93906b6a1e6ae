// event-bus.ts: Typed pub/sub event bus for renderer diagnostics

type Listener<T> = (data: T) => void;

type ListenerTable<Events> = { [K in keyof Events]?: Listener<Events[K]>[] };

export class EventBus<Events extends object> {
  private listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(event: K, fn: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (list) { list.push(fn); }
    else { this.listeners[event] = [fn]; }
  }

  off<K extends keyof Events>(event: K, fn: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    const idx = list.indexOf(fn);
    if (idx !== -1) list.splice(idx, 1);
  }

  once<K extends keyof Events>(event: K, fn: Listener<Events[K]>): void {
    const wrapper: Listener<Events[K]> = (data) => {
      this.off(event, wrapper);
      fn(data);
    };
    this.on(event, wrapper);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const list = this.listeners[event];
    if (!list) return;
    for (const fn of [...list]) fn(data);
  }

  /** Whether anything is subscribed to `event`. */
  hasListeners(event: keyof Events): boolean {
    return (this.listeners[event]?.length ?? 0) > 0;
  }

  destroy(): void {
    this.listeners = {};
  }
}
