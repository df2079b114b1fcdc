import type { Session } from './transport.js';

// Accepts and drops every message and never receives one.
export const discardSession: Session = {
  send: async () => undefined,
  receive: () => ({
    [Symbol.asyncIterator]: () => ({
      next: async (): Promise<IteratorResult<string, undefined>> => ({ done: true, value: undefined })
    })
  }),
  close: async () => undefined
};
