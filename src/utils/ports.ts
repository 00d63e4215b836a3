/**
 * @fileoverview Local port allocation and loopback connections.
 *
 * @module utils/ports
 */

import { connect, createServer } from 'node:net';
import type { Duplex } from 'node:stream';

/**
 * Ask the OS for a free port on 127.0.0.1 and release it again.
 * Another process may grab the port between this call and the caller's bind.
 */
export function getFreePort(host = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.unref();
    server.once('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        server.close();
        reject(new Error(`Unexpected listen address: ${String(address)}`));
        return;
      }
      const { port } = address;
      server.close((err) => (err ? reject(err) : resolve(port)));
    });
  });
}

/** Open a TCP connection to 127.0.0.1:port, resolving once connected */
export function connectLoopback(port: number): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host: '127.0.0.1', port });
    socket.once('connect', () => {
      socket.off('error', reject);
      resolve(socket);
    });
    socket.once('error', reject);
  });
}
