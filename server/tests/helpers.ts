/**
 * In-process stand-ins for the storage backend and the broker
 */

import https from 'https';
import net from 'net';
import path from 'path';
import { readFileSync } from 'fs';
import type { IncomingMessage, ServerResponse } from 'http';
import { getLogger } from '../bootstrap/logger';

const fixtureDir = path.join(__dirname, 'fixtures', 'tls');

export const tlsFixtures = {
  caPath: path.join(fixtureDir, 'ca.pem'),
  certPath: path.join(fixtureDir, 'server.pem'),
  keyPath: path.join(fixtureDir, 'server.key'),
  ca: readFileSync(path.join(fixtureDir, 'ca.pem')),
  cert: readFileSync(path.join(fixtureDir, 'server.pem')),
  key: readFileSync(path.join(fixtureDir, 'server.key'))
};

export const silentLogger = getLogger('silent', false);

function portOf(server: net.Server): number {
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address.port;
}

export interface StubServer {
  port: number;
  url: string;
  close(): Promise<void>;
}

export async function startHttpsStub(
  handler: (req: IncomingMessage, res: ServerResponse) => void
): Promise<StubServer> {
  const server = https.createServer({ cert: tlsFixtures.cert, key: tlsFixtures.key }, handler);
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const port = portOf(server);
  return {
    port,
    url: `https://127.0.0.1:${port}`,
    close: () => new Promise<void>(resolve => {
      server.closeAllConnections();
      server.close(() => resolve());
    })
  };
}

export async function startTcpListener(): Promise<{ port: number; server: net.Server; close(): Promise<void> }> {
  const server = net.createServer(socket => socket.destroy());
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  return {
    port: portOf(server),
    server,
    close: () => new Promise<void>(resolve => server.close(() => resolve()))
  };
}

/** A port nothing is listening on. */
export async function getFreePort(): Promise<number> {
  const listener = await startTcpListener();
  await listener.close();
  return listener.port;
}
