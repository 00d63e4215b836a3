/**
 * Reusable async test helpers.
 */

import type { Duplex } from 'node:stream';

/** Create a deferred promise with external resolve/reject */
export function createDeferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (reason?: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Write `text` and collect bytes until as many have come back, with timeout */
export function echoRoundTrip(stream: Duplex, text: string, timeoutMs = 5000): Promise<string> {
  return new Promise((resolve, reject) => {
    const expected = Buffer.byteLength(text);
    const chunks: Buffer[] = [];
    let received = 0;
    const timer = setTimeout(() => reject(new Error(`No echo after ${timeoutMs}ms`)), timeoutMs);
    stream.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      received += chunk.length;
      if (received >= expected) {
        clearTimeout(timer);
        resolve(Buffer.concat(chunks).toString('utf-8'));
      }
    });
    stream.once('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
    stream.write(text);
  });
}
