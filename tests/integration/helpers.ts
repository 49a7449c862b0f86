// Shared in-memory streams for the REPL and CLI specs.

import { PassThrough, Writable } from 'node:stream';

export function inputOf(text: string): PassThrough {
  const input = new PassThrough();
  input.end(text);
  return input;
}

export interface Capture {
  stream: Writable;
  text(): string;
}

export function capture(): Capture {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}
