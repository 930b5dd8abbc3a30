import { Server, createServer } from 'net';

export const LOCK_HOST = '127.0.0.1';

/**
 * Process-wide lock held by listening on a loopback port. The OS releases
 * the port when the process dies, so a crashed run never leaves a stale
 * lock behind.
 */
export class SingleInstanceLock {
  private server?: Server;

  constructor(private readonly port: number) {}

  get held(): boolean {
    return this.server !== undefined;
  }

  /** Resolves `false` when another process holds the port. */
  acquire(): Promise<boolean> {
    if (this.server) {
      return Promise.resolve(true);
    }

    return new Promise((resolve, reject) => {
      const server = createServer();
      server.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          resolve(false);
        } else {
          reject(error);
        }
      });
      server.listen({ port: this.port, host: LOCK_HOST, exclusive: true }, () => {
        server.unref();
        this.server = server;
        resolve(true);
      });
    });
  }

  release(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = undefined;
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
