import {
  createServer as createHttpServer,
  type Server as HttpServer,
  type IncomingMessage,
} from 'node:http';
import { type AddressInfo, createServer as createTcpServer, type Server, type Socket } from 'node:net';
import { type WebSocket, WebSocketServer } from 'ws';
import type { ServerConfig } from './config/serverConfig.js';
import { LineConnection, TcpConnection } from './connection/LineConnection.js';
import { WebSocketConnection } from './connection/WebSocketConnection.js';
import { GameServer } from './game/GameServer.js';
import { LEGACY_LINE_CODEC, LegacyRoom } from './legacy/LegacyRoom.js';
import { createStatusApp } from './status/statusApp.js';
import { logger } from './utils/logger.js';

export type ListenerName = 'tcp' | 'websocket' | 'status' | 'legacy';

/**
 * Wires the game server to its network listeners.
 */
export class BroadsideServer {
  readonly game: GameServer;
  readonly legacyRoom: LegacyRoom;
  private readonly tcpServer: Server;
  private readonly httpServer: HttpServer | null;
  private readonly wss: WebSocketServer | null;
  private readonly statusServer: HttpServer | null;
  private readonly legacyServer: Server | null;
  private readonly boundPorts = new Map<ListenerName, number>();

  constructor(private readonly config: ServerConfig) {
    this.game = new GameServer({
      maxNameLength: config.names.maxLength,
      heartbeat: config.heartbeat,
    });
    this.legacyRoom = new LegacyRoom();

    this.tcpServer = createTcpServer((socket) => this.acceptTcp(socket));

    if (config.websocket.enabled) {
      this.httpServer = createHttpServer();
      this.wss = new WebSocketServer({
        server: this.httpServer,
        maxPayload: config.connection.maxFrameBytes,
      });
      this.wss.on('connection', (ws: WebSocket, request: IncomingMessage) =>
        this.acceptWebSocket(ws, request)
      );
    } else {
      this.httpServer = null;
      this.wss = null;
    }

    this.statusServer = config.status.enabled
      ? createHttpServer(createStatusApp(this.game))
      : null;

    this.legacyServer = config.legacy.enabled
      ? createTcpServer((socket) => this.acceptLegacy(socket))
      : null;
  }

  // ============ Lifecycle ============

  async start(): Promise<void> {
    const { host } = this.config.tcp;
    await this.listen('tcp', this.tcpServer, this.config.tcp.port, host);
    if (this.httpServer) {
      await this.listen('websocket', this.httpServer, this.config.websocket.port, host);
    }
    if (this.statusServer) {
      await this.listen('status', this.statusServer, this.config.status.port, host);
    }
    if (this.legacyServer) {
      await this.listen('legacy', this.legacyServer, this.config.legacy.port, host);
    }
    this.game.start();
    logger.info('Server started', Object.fromEntries(this.boundPorts));
  }

  /**
   * Port a listener is bound to, once started.
   */
  port(name: ListenerName): number | undefined {
    return this.boundPorts.get(name);
  }

  /**
   * End every session, close every connection, then every listener.
   */
  async close(): Promise<void> {
    this.game.shutdown();
    this.legacyRoom.closeAll();
    this.wss?.close();

    const servers = [this.tcpServer, this.httpServer, this.statusServer, this.legacyServer];
    await Promise.all(servers.map((server) => (server ? closeServer(server) : undefined)));
    logger.info('Server closed');
  }

  // ============ Accepting Connections ============

  private acceptTcp(socket: Socket): void {
    const handle = new TcpConnection(socket, describePeer(socket), this.config.connection);
    socket.setNoDelay(true);
    void this.game.handleConnection(handle);
  }

  private acceptWebSocket(ws: WebSocket, request: IncomingMessage): void {
    const remote = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
    const { maxBufferedBytes, closeGraceMs } = this.config.connection;
    const handle = new WebSocketConnection(ws, remote, maxBufferedBytes, closeGraceMs);
    void this.game.handleConnection(handle);
  }

  private acceptLegacy(socket: Socket): void {
    const handle = new LineConnection(
      socket,
      describePeer(socket),
      LEGACY_LINE_CODEC,
      this.config.connection,
      'legacy'
    );
    void this.legacyRoom.handleConnection(handle);
  }

  private listen(
    name: ListenerName,
    server: Server,
    port: number,
    host: string
  ): Promise<void> {
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        const address = server.address();
        this.boundPorts.set(name, isAddressInfo(address) ? address.port : port);
        resolve();
      });
    });
  }
}

function describePeer(socket: Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
}

function isAddressInfo(address: AddressInfo | string | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(() => resolve());
  });
}
