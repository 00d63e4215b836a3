/**
 * @fileoverview Client-side connection to a deployed listener.
 *
 * The wire protocol spoken over the stream belongs to the caller. This module
 * only pairs the raw stream with the service the caller presents and a
 * per-call configuration value.
 *
 * @module connection
 */

import type { Duplex } from 'node:stream';

/** Free-form connection options; a fresh object is made for every call */
export type ConnectionConfig = Record<string, unknown>;

/** Local side of a connection; notified when the connection opens and closes */
export interface Service {
  onConnect(conn: DeploymentConnection): void;
  onDisconnect(conn: DeploymentConnection): void;
}

export type ServiceFactory = new () => Service;

/** Presents nothing to the peer */
export class VoidService implements Service {
  onConnect(): void {}
  onDisconnect(): void {}
}

/** Marks the connection as a classic-mode connection */
export class ClassicService implements Service {
  onConnect(conn: DeploymentConnection): void {
    conn.config.classic = true;
  }
  onDisconnect(): void {}
}

export interface ConnectOptions {
  service?: ServiceFactory;
  config?: ConnectionConfig;
}

export class DeploymentConnection {
  readonly stream: Duplex;
  readonly service: Service;
  readonly config: ConnectionConfig;
  private _closed = false;

  constructor(stream: Duplex, options: ConnectOptions = {}) {
    this.stream = stream;
    this.config = { ...(options.config ?? {}) };
    const ServiceCls = options.service ?? VoidService;
    this.service = new ServiceCls();
    this.service.onConnect(this);
  }

  get closed(): boolean {
    return this._closed;
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    try {
      this.service.onDisconnect(this);
    } finally {
      this.stream.destroy();
    }
  }
}
