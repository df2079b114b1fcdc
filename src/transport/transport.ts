// This module defines the message channel contract that every transport implements.

// One message is the JSON text of a single object or a batch array.
export interface Session {
  send(message: string): Promise<void>;
  // The sequence ends when the peer or the local side closes the channel.
  receive(): AsyncIterable<string>;
  // Closing twice resolves without error.
  close(): Promise<void>;
}

export type SessionHandler = (session: Session, sessionId: string) => Promise<void>;

export class SessionClosedError extends Error {
  public constructor(message = 'session closed') {
    super(message);
    this.name = 'SessionClosedError';
  }
}
