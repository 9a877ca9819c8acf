import type { Server } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { parseClientMessage } from './protocol.ts';
import type { ClientType, CommandMsg, ServerMessage, WelcomeMsg } from './protocol.ts';
import { describeError, silentLogger, type Logger } from './logger.ts';

const DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 4 * 1024 * 1024;

export interface ConnectionState {
  id: number;
  socket: WebSocket;
  clientType: 'unknown' | ClientType;
  lastMessageTime: number;
}

export interface WsHubOptions {
  maxMessageBytes?: number;
  maxBufferedAmount?: number;
  logger?: Logger;
}

export interface WsHubHandlers {
  /** Called after the welcome has been sent. */
  onHello?: (connId: number, clientType: ClientType) => void;
  onCommand?: (connId: number, msg: CommandMsg) => void;
  onDisconnect?: (connId: number) => void;
}

/** Outbound side of the hub, as seen by the simulation loop. */
export interface FrameHub {
  hasFrameRecipients: () => boolean;
  broadcastFrame: (frame: Uint8Array) => void;
  broadcastJson: (payload: ServerMessage) => void;
  sendFrameTo: (connId: number, frame: Uint8Array) => void;
  sendJsonTo: (connId: number, payload: ServerMessage) => void;
}

export class WsHub implements FrameHub {
  private wss: WebSocketServer;
  private connections = new Map<number, ConnectionState>();
  private nextId = 1;
  private getWelcome: () => WelcomeMsg;
  private maxMessageBytes: number;
  private maxBufferedAmount: number;
  private handlers: WsHubHandlers | null;
  private logger: Logger;

  constructor(
    httpServer: Server,
    getWelcome: () => WelcomeMsg,
    options: WsHubOptions = {},
    handlers?: WsHubHandlers
  ) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.maxBufferedAmount = options.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.wss = new WebSocketServer({
      server: httpServer,
      maxPayload: this.maxMessageBytes
    });
    this.getWelcome = getWelcome;
    this.handlers = handlers ?? null;
    this.logger = options.logger ?? silentLogger;
    this.wss.on('connection', (socket) => this.handleConnection(socket));
    this.wss.on('error', (err) => {
      this.logger.error('ws', `server error: ${describeError(err)}`);
    });
  }

  setHandlers(handlers: WsHubHandlers): void {
    this.handlers = handlers;
  }

  getClientCount(): number {
    return this.connections.size;
  }

  hasFrameRecipients(): boolean {
    for (const state of this.connections.values()) {
      if (state.clientType !== 'unknown') return true;
    }
    return false;
  }

  closeAll(): void {
    for (const state of this.connections.values()) {
      state.socket.close();
    }
    this.connections.clear();
    this.wss.close();
  }

  broadcastFrame(frame: Uint8Array): void {
    for (const state of this.connections.values()) {
      if (!this.canSend(state)) continue;
      state.socket.send(frame, { binary: true });
    }
  }

  broadcastJson(payload: ServerMessage): void {
    const text = JSON.stringify(payload);
    for (const state of this.connections.values()) {
      if (!this.canSend(state)) continue;
      state.socket.send(text);
    }
  }

  sendFrameTo(connId: number, frame: Uint8Array): void {
    const state = this.connections.get(connId);
    if (!state || !this.canSend(state)) return;
    state.socket.send(frame, { binary: true });
  }

  sendJsonTo(connId: number, payload: ServerMessage): void {
    const state = this.connections.get(connId);
    if (!state || !this.canSend(state)) return;
    state.socket.send(JSON.stringify(payload));
  }

  /** Slow consumers are skipped until their buffer drains. */
  private canSend(state: ConnectionState): boolean {
    if (state.clientType === 'unknown') return false;
    if (state.socket.readyState !== WebSocket.OPEN) return false;
    return state.socket.bufferedAmount <= this.maxBufferedAmount;
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = {
      id: this.nextId++,
      socket,
      clientType: 'unknown',
      lastMessageTime: Date.now()
    };
    this.connections.set(state.id, state);
    socket.on('message', (data, isBinary) => this.handleMessage(state, data, isBinary));
    // ws closes the socket itself after emitting an error.
    socket.on('error', (err) => {
      this.logger.warn('ws', `connection ${state.id}: ${describeError(err)}`);
    });
    socket.on('close', () => {
      this.connections.delete(state.id);
      this.handlers?.onDisconnect?.(state.id);
    });
  }

  private handleMessage(state: ConnectionState, data: RawData, isBinary: boolean): void {
    const size = payloadSize(data);
    if (size > this.maxMessageBytes) {
      this.protocolError(state, 'message too large');
      return;
    }
    if (isBinary) {
      this.protocolError(state, 'binary messages are not supported');
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(payloadToText(data));
    } catch {
      this.protocolError(state, 'invalid JSON');
      return;
    }
    const msg = parseClientMessage(parsed);
    if (!msg) {
      this.protocolError(state, 'invalid message');
      return;
    }
    state.lastMessageTime = Date.now();
    switch (msg.type) {
      case 'hello':
        if (state.clientType !== 'unknown') {
          this.protocolError(state, 'duplicate hello');
          return;
        }
        state.clientType = msg.clientType;
        state.socket.send(JSON.stringify(this.getWelcome()));
        this.handlers?.onHello?.(state.id, msg.clientType);
        return;
      case 'ping':
        return;
      default:
        if (state.clientType === 'unknown') {
          this.protocolError(state, 'hello required before commands');
          return;
        }
        this.handlers?.onCommand?.(state.id, msg);
    }
  }

  private protocolError(state: ConnectionState, message: string): void {
    if (state.socket.readyState === WebSocket.OPEN) {
      state.socket.send(JSON.stringify({ type: 'error', message }));
    }
    state.socket.close(1008, message);
  }
}

function payloadSize(data: RawData): number {
  if (Array.isArray(data)) {
    return data.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  }
  return data.byteLength;
}

function payloadToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}
