import { createServer as createHttpServer } from 'http';
import type { RequestListener, Server } from 'http';
import { createServer as createHttpsServer } from 'https';
import type { AddressInfo, Socket } from 'net';
import type { TLSSocket } from 'tls';
import type { TlsCredentials } from './config.js';
import { normalizeAddress } from './format.js';

/**
 * Per-connection lifecycle:
 *
 *   accepted ──ready──────────────────────▶ serving ──close──▶ closed
 *   accepted ──tls──▶ handshaking ──handshake-ok──▶ serving
 *                     handshaking ──handshake-failed──▶ closed
 *
 * A failed handshake never produces a response: there is no channel yet.
 */
export type ConnectionState = 'accepted' | 'handshaking' | 'serving' | 'closed';
export type ConnectionEvent = 'tls' | 'ready' | 'handshake-ok' | 'handshake-failed' | 'close';

const TRANSITIONS: Record<ConnectionState, Partial<Record<ConnectionEvent, ConnectionState>>> = {
  accepted: { tls: 'handshaking', ready: 'serving', close: 'closed' },
  handshaking: { 'handshake-ok': 'serving', 'handshake-failed': 'closed', close: 'closed' },
  serving: { close: 'closed' },
  closed: {},
};

/** Next state, or the current one when the event doesn't apply */
export function transition(state: ConnectionState, event: ConnectionEvent): ConnectionState {
  return TRANSITIONS[state][event] ?? state;
}

/**
 * Client addresses seen since startup. Only feeds the `[connect]` log line;
 * nothing about request handling depends on it.
 */
export class SeenClients {
  private readonly addresses = new Set<string>();

  /** Record an address; true the first time it is seen */
  add(address: string): boolean {
    if (this.addresses.has(address)) return false;
    this.addresses.add(address);
    return true;
  }

  has(address: string): boolean {
    return this.addresses.has(address);
  }

  get size(): number {
    return this.addresses.size;
  }
}

export interface ConnectionServerOptions {
  tls?: TlsCredentials | null;
  /** Called once per new client address (default: a `[connect]` log line) */
  onNewClient?: (address: string) => void;
  /** Called whenever a connection (keyed `address:port`) changes state */
  onStateChange?: (connection: string, state: ConnectionState) => void;
}

function connectionKey(socket: Socket): string {
  return `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
}

/**
 * HTTP(S) listener. Node accepts connections on the event loop and every
 * request runs as its own async task, so one slow upload or archive never
 * holds up new connections.
 */
export class ConnectionServer {
  readonly seenClients = new SeenClients();
  private readonly server: Server;
  private readonly states = new Map<string, ConnectionState>();
  private readonly onNewClient: (address: string) => void;
  private readonly onStateChange: ((connection: string, state: ConnectionState) => void) | undefined;
  readonly secure: boolean;

  constructor(handler: RequestListener, options: ConnectionServerOptions = {}) {
    this.onNewClient = options.onNewClient ?? ((address) => console.log(`[connect] ${address}`));
    this.onStateChange = options.onStateChange;
    this.secure = Boolean(options.tls);

    if (options.tls) {
      const server = createHttpsServer({ cert: options.tls.cert, key: options.tls.key }, handler);
      server.on('secureConnection', (tlsSocket: TLSSocket) => {
        this.advance(connectionKey(tlsSocket), 'handshake-ok');
      });
      server.on('tlsClientError', (_err: Error, tlsSocket: TLSSocket) => {
        // handshake failures are dropped without a response
        this.advance(connectionKey(tlsSocket), 'handshake-failed');
      });
      this.server = server;
    } else {
      this.server = createHttpServer(handler);
    }

    this.server.on('connection', (socket: Socket) => this.accept(socket));
  }

  private accept(socket: Socket): void {
    const key = connectionKey(socket);
    this.states.set(key, 'accepted');
    this.advance(key, this.secure ? 'tls' : 'ready');

    const address = normalizeAddress(socket.remoteAddress);
    if (this.seenClients.add(address)) this.onNewClient(address);

    socket.once('close', () => {
      this.advance(key, 'close');
      this.states.delete(key);
    });
  }

  private advance(key: string, event: ConnectionEvent): void {
    const current = this.states.get(key);
    if (!current) return;
    const next = transition(current, event);
    if (next === current) return;
    this.states.set(key, next);
    this.onStateChange?.(key, next);
  }

  /** Snapshot of live connections by state */
  connectionStates(): Record<ConnectionState, number> {
    const counts: Record<ConnectionState, number> = { accepted: 0, handshaking: 0, serving: 0, closed: 0 };
    for (const state of this.states.values()) counts[state]++;
    return counts;
  }

  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (address && typeof address === 'object') resolve(address);
        else reject(new Error('server is not listening on a TCP port'));
      });
    });
  }

  /** Stop accepting, then drop idle keep-alive connections */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeIdleConnections();
    });
  }
}
