// In-memory sessions for tests and for embedding a client and server in one process.

import { AsyncQueue } from './queue.js';
import { type Session, SessionClosedError } from './transport.js';

class MemorySession implements Session {
  public readonly inbound = new AsyncQueue<string>();
  public peer: MemorySession | null = null;
  private closed = false;

  public async send(message: string): Promise<void> {
    const peer = this.peer;
    if (this.closed || !peer || !peer.inbound.push(message)) {
      throw new SessionClosedError();
    }
  }

  public receive(): AsyncIterable<string> {
    return this.inbound;
  }

  // Closing either end ends both directions, like a socket pair.
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.inbound.close();
    this.peer?.inbound.close();
  }
}

export function createPipe(): [Session, Session] {
  const left = new MemorySession();
  const right = new MemorySession();
  left.peer = right;
  right.peer = left;
  return [left, right];
}
