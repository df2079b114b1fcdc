// This module tracks outstanding calls by request id until their response, cancellation, or shutdown.

import { RpcError } from './errors.js';
import { type RequestId, formatRequestId, requestIdKey } from './id.js';
import type { ResponseOutcome } from './message.js';

type PendingSlot = (outcome: ResponseOutcome) => void;

// Each slot settles exactly once: whichever of deliver, cancel or rejectAll removes it first wins.
export class CorrelationTable {
  private readonly slots = new Map<string, PendingSlot>();

  // This method creates the delivery slot for one id; it must run before the request is sent.
  public register(id: RequestId): Promise<ResponseOutcome> {
    const key = requestIdKey(id);
    if (key === null) {
      throw RpcError.invalidRequest('Cannot correlate a request with a null id.');
    }

    if (this.slots.has(key)) {
      throw RpcError.invalidRequest(`Request id ${formatRequestId(id)} is already pending.`);
    }

    // Slots resolve with a failed outcome instead of rejecting, so nothing is left unhandled while a send is in flight.
    return new Promise<ResponseOutcome>((resolve) => {
      this.slots.set(key, resolve);
    });
  }

  // Returns false for orphans: responses whose id is unknown, already answered, or abandoned.
  public deliver(id: RequestId, outcome: ResponseOutcome): boolean {
    const slot = this.take(id);
    if (!slot) {
      return false;
    }

    slot(outcome);
    return true;
  }

  // This method removes a slot without fulfilling it; the abandoned waiter is settled by its own caller.
  public cancel(id: RequestId): boolean {
    return this.take(id) !== undefined;
  }

  // This method fails every outstanding slot, used when the connection shuts down.
  public rejectAll(error: Error): number {
    const slots = [...this.slots.values()];
    this.slots.clear();

    for (const slot of slots) {
      slot({ ok: false, error });
    }

    return slots.length;
  }

  public has(id: RequestId): boolean {
    const key = requestIdKey(id);
    return key !== null && this.slots.has(key);
  }

  public get size(): number {
    return this.slots.size;
  }

  private take(id: RequestId): PendingSlot | undefined {
    const key = requestIdKey(id);
    if (key === null) {
      return undefined;
    }

    const slot = this.slots.get(key);
    if (slot) {
      this.slots.delete(key);
    }

    return slot;
  }
}
