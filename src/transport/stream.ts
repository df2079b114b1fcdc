// Newline-delimited JSON over a readable and writable stream pair, as used by stdio servers.

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { AsyncQueue } from './queue.js';
import { type Session, SessionClosedError } from './transport.js';

export interface StreamSessionOptions {
  // When false the underlying streams stay open after close, as for the process's own stdio.
  closeStreams?: boolean;
}

export class StreamSession implements Session {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly closeStreams: boolean;
  private readonly lines: Interface;
  private readonly inbound = new AsyncQueue<string>();
  private closed = false;

  public constructor(input: Readable, output: Writable, options: StreamSessionOptions = {}) {
    this.input = input;
    this.output = output;
    this.closeStreams = options.closeStreams ?? true;
    this.lines = createInterface({ input, crlfDelay: Infinity });

    this.lines.on('line', (line) => {
      const trimmed = line.trim();
      if (trimmed !== '') {
        this.inbound.push(trimmed);
      }
    });
    this.lines.on('close', () => {
      this.inbound.close();
    });
    // readline re-emits input errors on the interface itself.
    this.lines.on('error', (error: Error) => {
      this.inbound.fail(error);
    });
    input.on('error', (error: Error) => {
      this.inbound.fail(error);
    });
  }

  public send(message: string): Promise<void> {
    if (this.closed || this.output.writableEnded) {
      return Promise.reject(new SessionClosedError());
    }

    return new Promise<void>((resolve, reject) => {
      this.output.write(`${message}\n`, (error) => {
        if (error) {
          reject(error);
          return;
        }

        resolve();
      });
    });
  }

  public receive(): AsyncIterable<string> {
    return this.inbound;
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.lines.close();
    this.inbound.close();

    if (!this.closeStreams) {
      return;
    }

    this.input.destroy();
    if (this.output.writableEnded) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.output.end(resolve);
    });
  }
}

export function createStdioSession(): StreamSession {
  return new StreamSession(process.stdin, process.stdout, { closeStreams: false });
}
