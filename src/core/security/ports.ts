import { createConnection } from 'node:net';

/** Resolves `true` when something accepts connections on `port`. */
export type PortCheck = (port: number) => Promise<boolean>;

/** Connect to 127.0.0.1:`port`; a refused or silent port counts as free. */
export function isLocalPortInUse(port: number, timeoutMs = 200): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ host: '127.0.0.1', port });
    const settle = (inUse: boolean) => {
      socket.destroy();
      resolve(inUse);
    };
    socket.setTimeout(timeoutMs, () => settle(false));
    socket.once('connect', () => settle(true));
    // ECONNREFUSED and friends: nobody is listening.
    socket.once('error', () => settle(false));
  });
}
