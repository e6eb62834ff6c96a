/**
 * WebSocket Publish Channel
 * Fans telemetry frames out to WebSocket subscribers, one conflating slot per subscriber
 */

import { IncomingMessage, OutgoingHttpHeaders } from 'http';
import { WebSocketServer, WebSocket, RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { PublishChannel, parseBindAddress } from './PublishChannel';
import { ChannelCredentials, isAuthorized } from './ChannelAuth';
import { ConflatingSubscriber, SubscriberStats } from './ConflatingSubscriber';
import { BridgeError, BRIDGE_ERROR_CODES, errorMessage } from '../shared/BridgeErrors';
import { FRAME_PROTOCOL } from '../frame-protocol/TelemetryFrameProtocol';
import { Logger, createLogger } from '../shared/Logger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PublishChannelConfig {
  maxSubscribers: number;
  heartbeatInterval: number;
  credentials: ChannelCredentials | null;
}

export interface PublishChannelStats {
  subscribers: number;
  framesOffered: number;
  framesSent: number;
  framesDropped: number;
  sendErrors: number;
}

interface SubscriberConnection {
  socket: WebSocket;
  slot: ConflatingSubscriber;
  alive: boolean;
  connectedAt: number;
}

type VerifyCallback = (result: boolean, code?: number, message?: string, headers?: OutgoingHttpHeaders) => void;

const DEFAULT_CONFIG: PublishChannelConfig = {
  maxSubscribers: 32,
  heartbeatInterval: 30000,
  credentials: null,
} as const;

const AUTH_REALM = 'telemetry';

// ─────────────────────────────────────────────────────────────────────────────
// Channel
// ─────────────────────────────────────────────────────────────────────────────

export class WebSocketPublishChannel implements PublishChannel {
  private server: WebSocketServer | null = null;
  private subscribers = new Map<string, SubscriberConnection>();
  private config: PublishChannelConfig;
  private logger: Logger;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private closePromise: Promise<void> | null = null;
  private pendingBind: Promise<WebSocketServer> | null = null;

  private framesOffered = 0;
  // Totals of subscribers that already left
  private retired: SubscriberStats = { sent: 0, dropped: 0, errors: 0 };

  constructor(config: Partial<PublishChannelConfig> = {}, logger: Logger = createLogger('Publisher')) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger;
  }

  async bind(address: string): Promise<void> {
    if (this.closePromise) {
      throw new BridgeError(BRIDGE_ERROR_CODES.BIND_FAILURE, 'Channel is closed', { address });
    }
    if (this.server || this.pendingBind) {
      throw new BridgeError(BRIDGE_ERROR_CODES.BIND_FAILURE, 'Channel is already bound', { address });
    }

    const { host, port } = parseBindAddress(address);

    const listening = this.listen(address, host, port);
    this.pendingBind = listening;
    let server: WebSocketServer;
    try {
      server = await listening;
    } finally {
      this.pendingBind = null;
    }
    this.server = server;

    // close() ran while the socket was opening; shutdown() releases the server
    if (this.closePromise) {
      throw new BridgeError(BRIDGE_ERROR_CODES.BIND_FAILURE, 'Channel closed while binding', { address });
    }

    server.on('connection', (socket: WebSocket, request: IncomingMessage) => this.handleConnection(socket, request));
    server.on('error', (error: Error) => {
      this.logger.error(`Server error: ${error.message}`);
    });
    this.startHeartbeat();

    const authMode = this.config.credentials ? 'basic auth' : 'open';
    this.logger.info(`Publishing on ${host}:${this.getBoundPort() ?? port} (${authMode})`);
  }

  private listen(address: string, host: string, port: number): Promise<WebSocketServer> {
    return new Promise<WebSocketServer>((resolve, reject) => {
      const server = new WebSocketServer({
        host,
        port,
        perMessageDeflate: false,
        maxPayload: FRAME_PROTOCOL.FRAME_SIZE,
        verifyClient: (info: { req: IncomingMessage }, callback: VerifyCallback) => this.verifyClient(info.req, callback),
      });

      server.once('listening', () => {
        server.removeAllListeners('error');
        resolve(server);
      });

      server.once('error', (error: NodeJS.ErrnoException) => {
        server.close();
        reject(new BridgeError(
          BRIDGE_ERROR_CODES.BIND_FAILURE,
          `Cannot bind ${address}: ${describeBindError(error)}`,
          { address, code: error.code },
          { cause: error }
        ));
      });
    });
  }

  send(frame: Buffer): void {
    if (!this.server) return;

    this.framesOffered++;
    this.subscribers.forEach((connection) => connection.slot.offer(frame));
  }

  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.shutdown();
    }
    return this.closePromise;
  }

  getBoundPort(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  getStats(): PublishChannelStats {
    const totals = { ...this.retired };
    this.subscribers.forEach(({ slot }) => {
      const stats = slot.getStats();
      totals.sent += stats.sent;
      totals.dropped += stats.dropped;
      totals.errors += stats.errors;
    });

    return {
      subscribers: this.subscribers.size,
      framesOffered: this.framesOffered,
      framesSent: totals.sent,
      framesDropped: totals.dropped,
      sendErrors: totals.errors,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Subscribers
  // ───────────────────────────────────────────────────────────────────────────

  private verifyClient(request: IncomingMessage, callback: VerifyCallback): void {
    const { credentials } = this.config;
    if (!credentials || isAuthorized(request.headers.authorization, credentials)) {
      callback(true);
      return;
    }

    this.logger.warn(`Rejected unauthenticated subscriber from ${request.socket.remoteAddress ?? 'unknown'}`);
    callback(false, 401, 'Unauthorized', { 'WWW-Authenticate': `Basic realm="${AUTH_REALM}"` });
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    if (this.subscribers.size >= this.config.maxSubscribers) {
      socket.close(1008, 'Publisher at maximum capacity');
      return;
    }

    const subscriberId = uuidv4();
    const slot = new ConflatingSubscriber(subscriberId, socket, (error) => {
      this.logger.debug(`Send to ${subscriberId} failed: ${error.message}`);
    });
    const connection: SubscriberConnection = { socket, slot, alive: true, connectedAt: Date.now() };
    this.subscribers.set(subscriberId, connection);

    this.logger.info(`Subscriber ${subscriberId} connected from ${request.socket.remoteAddress ?? 'unknown'}`);

    socket.on('pong', () => {
      connection.alive = true;
    });

    // Subscribers only listen
    socket.on('message', (data: RawData) => {
      this.logger.debug(`Ignoring ${byteLength(data)} bytes from subscriber ${subscriberId}`);
    });

    socket.on('close', () => this.removeSubscriber(subscriberId));

    socket.on('error', (error: Error) => {
      this.logger.warn(`Subscriber ${subscriberId} error: ${error.message}`);
      this.removeSubscriber(subscriberId);
    });
  }

  private removeSubscriber(subscriberId: string): void {
    const connection = this.subscribers.get(subscriberId);
    if (!connection) return;

    connection.slot.discard();
    const stats = connection.slot.getStats();
    this.retired.sent += stats.sent;
    this.retired.dropped += stats.dropped;
    this.retired.errors += stats.errors;
    this.subscribers.delete(subscriberId);

    const seconds = ((Date.now() - connection.connectedAt) / 1000).toFixed(1);
    this.logger.info(`Subscriber ${subscriberId} disconnected after ${seconds}s (${stats.sent} frames)`);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Heartbeat & shutdown
  // ───────────────────────────────────────────────────────────────────────────

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      this.subscribers.forEach((connection, subscriberId) => {
        if (!connection.alive) {
          this.logger.info(`Subscriber ${subscriberId} stopped answering heartbeats`);
          connection.socket.terminate();
          this.removeSubscriber(subscriberId);
          return;
        }

        connection.alive = false;
        try {
          connection.socket.ping();
        } catch (error) {
          this.logger.debug(`Heartbeat to ${subscriberId} failed: ${errorMessage(error)}`);
        }
      });
    }, this.config.heartbeatInterval);
  }

  private async shutdown(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    // A failed bind is reported to its own caller
    const opened = this.pendingBind ? await this.pendingBind.catch(() => null) : null;

    const server = this.server ?? opened;
    if (!server) return;

    // Unsent frames are not flushed
    this.subscribers.forEach((connection, subscriberId) => {
      connection.socket.terminate();
      this.removeSubscriber(subscriberId);
    });

    await new Promise<void>((resolve) => {
      server.close((error?: Error) => {
        if (error) {
          this.logger.warn(`Server close failed: ${error.message}`);
        }
        resolve();
      });
    });

    this.server = null;
    this.logger.info(`Publisher closed after ${this.framesOffered} frames`);
  }
}

function describeBindError(error: NodeJS.ErrnoException): string {
  switch (error.code) {
    case 'EADDRINUSE':
      return 'address already in use';
    case 'EACCES':
      return 'permission denied';
    case 'EADDRNOTAVAIL':
      return 'address not available';
    default:
      return error.message;
  }
}

function byteLength(data: RawData): number {
  if (Array.isArray(data)) {
    return data.reduce((total, chunk) => total + chunk.length, 0);
  }
  return data.byteLength;
}
