import http from 'http';
import type { Socket } from 'net';
import { createApp, AppDependencies } from '../../src/app';
import type { MessageStore } from '../../src/repositories/message.repository';
import type { IncomingMessage } from '../../src/types/message.types';

/**
 * In-memory stand-in for the sms_messages table.
 */
export class InMemoryMessageStore implements MessageStore {
  readonly saved: IncomingMessage[] = [];

  async save(message: IncomingMessage): Promise<void> {
    this.saved.push(message);
  }
}

/**
 * Store whose writes stay pending until `release()` is called.
 */
export class DeferredMessageStore implements MessageStore {
  readonly saved: IncomingMessage[] = [];
  readonly started: Promise<void>;
  private markStarted: () => void = () => undefined;
  private openGate: () => void = () => undefined;
  private readonly gate: Promise<void>;

  constructor() {
    this.started = new Promise<void>((resolve) => {
      this.markStarted = resolve;
    });
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate();
  }

  async save(message: IncomingMessage): Promise<void> {
    this.markStarted();
    await this.gate;
    this.saved.push(message);
  }
}

export interface TestServer {
  url: string;
  /** Server-side sockets accepted so far. */
  sockets: Socket[];
  close: () => Promise<void>;
}

/**
 * Serve the app on an ephemeral local port.
 */
export async function startTestServer(deps: AppDependencies): Promise<TestServer> {
  const server = http.createServer(createApp(deps));
  const sockets: Socket[] = [];
  server.on('connection', (socket) => sockets.push(socket));
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    sockets,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * POST a form-encoded body exactly as given.
 */
export function postForm(url: string, body: string, signal?: AbortSignal): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body,
    signal,
  });
}
