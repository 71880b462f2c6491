import type { IncomingMessage, Server as HttpServer } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import type { Log } from '../../infrastructure/logging.js';
import type { ConfigUpdatePayload } from '../../infrastructure/redis/index.js';
import { Opcode, acceptKey, decodeFrame, encodeFrame, encodeText } from './frames.js';
import type { DecodedFrame } from './frames.js';

interface Client {
  id: number;
  socket: Duplex;
  alive: boolean;
  pending: Buffer;
}

export interface ConfigUpdateSocketOptions {
  path?: string;
  heartbeatMs?: number;
}

/**
 * Pushes config updates to browsers over a raw RFC 6455 upgrade on /ws.
 *
 * Server → client text frames only; client frames are read for
 * ping/pong/close handling and otherwise ignored.
 */
export class ConfigUpdateSocketServer {
  private readonly clients = new Set<Client>();
  private readonly path: string;
  private readonly heartbeatMs: number;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private nextId = 1;

  constructor(
    private readonly log: Log,
    options: ConfigUpdateSocketOptions = {},
  ) {
    this.path = options.path ?? '/ws';
    this.heartbeatMs = options.heartbeatMs ?? 30_000;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  attach(server: HttpServer): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    this.heartbeat = setInterval(() => this.sweep(), this.heartbeatMs);
    this.log.info({ path: this.path }, 'WebSocket server attached');
  }

  /** Returns the number of clients the message was written to. */
  broadcast(payload: ConfigUpdatePayload): number {
    const frame = encodeText(JSON.stringify({
      type: 'config_update',
      case_id: payload.case_id,
      source: payload.source,
    }));

    let sent = 0;
    for (const client of this.clients) {
      if (this.write(client, frame)) sent++;
    }
    this.log.debug({ case_id: payload.case_id, sent, clientCount: this.clients.size }, 'Broadcast config update');
    return sent;
  }

  close(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    for (const client of [...this.clients]) this.drop(client, 'server_shutdown');
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const key = req.headers['sec-websocket-key'];
    if (req.url !== this.path || typeof key !== 'string') {
      socket.destroy();
      return;
    }

    socket.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${acceptKey(key)}\r\n\r\n`,
    );

    // After the upgrade the HTTP parser ends the readable side; keep the
    // writable side open until the peer really disconnects.
    socket.allowHalfOpen = true;
    if (socket instanceof Socket) {
      socket.setTimeout(0);
      socket.setNoDelay(true);
      socket.setKeepAlive(true, this.heartbeatMs);
    }

    const client: Client = { id: this.nextId++, socket, alive: true, pending: Buffer.from(head) };
    this.clients.add(client);
    this.log.info({ clientId: client.id, clientCount: this.clients.size }, 'WebSocket client connected');

    socket.on('data', (chunk: Buffer) => this.receive(client, chunk));
    socket.on('close', () => this.drop(client, 'close'));
    socket.on('error', (err: Error) => {
      this.log.debug({ clientId: client.id, err: err.message }, 'WebSocket socket error');
      this.drop(client, 'error');
    });
    socket.resume();
  }

  private receive(client: Client, chunk: Buffer): void {
    client.pending = Buffer.concat([client.pending, chunk]);

    for (;;) {
      let frame: DecodedFrame | null;
      try {
        frame = decodeFrame(client.pending);
      } catch (err: unknown) {
        this.log.warn({ clientId: client.id, err }, 'Invalid WebSocket frame');
        this.drop(client, 'protocol_error');
        return;
      }
      if (!frame) return;

      client.pending = client.pending.subarray(frame.length);
      client.alive = true;

      if (frame.opcode === Opcode.Ping) {
        this.write(client, encodeFrame(Opcode.Pong, frame.payload));
      } else if (frame.opcode === Opcode.Close) {
        this.write(client, encodeFrame(Opcode.Close, frame.payload.subarray(0, 2)));
        this.drop(client, 'close_frame');
        return;
      }
    }
  }

  private sweep(): void {
    for (const client of [...this.clients]) {
      if (!client.alive) {
        this.drop(client, 'heartbeat_timeout');
        continue;
      }
      client.alive = false;
      this.write(client, encodeFrame(Opcode.Ping, Buffer.alloc(0)));
    }
  }

  private write(client: Client, data: Buffer): boolean {
    if (client.socket.destroyed) return false;
    client.socket.write(data);
    return true;
  }

  private drop(client: Client, reason: string): void {
    if (!this.clients.delete(client)) return;
    if (!client.socket.destroyed) client.socket.destroy();
    this.log.info({ clientId: client.id, reason, clientCount: this.clients.size }, 'WebSocket client disconnected');
  }
}
