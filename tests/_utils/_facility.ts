import type {
  BroadcastFacility,
  NotificationObserver,
  ObserverHandle,
} from "../../_types.ts";

interface FakeRegistration {
  readonly name: string;
  readonly source: object | null;
  readonly observer: NotificationObserver<unknown>;
}

/**
 * Test double for a broadcast facility. Tracks live registrations and can be
 * told to fail on registration or removal.
 */
export class FakeFacility implements BroadcastFacility {
  #registrations = new Map<ObserverHandle, FakeRegistration>();

  /** Number of successful `addObserver` calls */
  added = 0;
  /** Number of `removeObserver` calls that found a live registration */
  removed = 0;

  /** Thrown from the next `addObserver` calls when set */
  failAdd: Error | null = null;
  /** Thrown from `removeObserver` (after removing) when set */
  failRemove: Error | null = null;

  /** Registrations that have not been removed */
  get live(): number {
    return this.#registrations.size;
  }

  addObserver(name: string, source: object | null, observer: NotificationObserver<unknown>): ObserverHandle {
    if (this.failAdd) throw this.failAdd;

    const handle = { id: ++this.added };
    this.#registrations.set(handle, { name, source, observer });
    return handle;
  }

  removeObserver(handle: ObserverHandle): void {
    if (this.#registrations.delete(handle)) this.removed++;
    if (this.failRemove) throw this.failRemove;
  }

  /**
   * Invokes every matching observer; returns how many were invoked.
   */
  fire(name: string, payload: unknown, source: object | null = null): number {
    let delivered = 0;
    for (const registration of Array.from(this.#registrations.values())) {
      if (registration.name !== name) continue;
      if (registration.source !== null && registration.source !== source) continue;

      registration.observer.next({ name, source, payload });
      delivered++;
    }
    return delivered;
  }

  /**
   * Signals teardown to every observer. Registrations stay live until the
   * observers remove themselves.
   */
  complete(): void {
    for (const registration of Array.from(this.#registrations.values())) {
      registration.observer.complete?.();
    }
  }
}
