/**
 * @file    remote/server.ts
 * @purpose WebSocket remote-control server: turns JSON frames into zoom
 *          commands and pushes state updates back to every client.
 * @owner   Cursor Zoom Core
 * @depends ws, uuid, remote/protocol.ts, shared/types/zoom.ts
 *
 * Commands are not applied here; they go to the command callback, which
 * normally enqueues them on a ZoomSession.
 */

import WebSocket from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { ZoomCommand, ZoomStateSnapshot } from '../shared/types/zoom';
import {
  OutboundMessage,
  OutboundMessageType,
  encodeOutbound,
  parseInboundFrame,
} from './protocol';

// ─────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────

/** The part of a ws socket the server writes to */
export interface RemoteSocket {
  readonly readyState: number;
  send(data: string): void;
}

interface ConnectedClient {
  id: string;
  socket: RemoteSocket;
  connectedAt: number;
}

export interface RemoteServerConfig {
  host: string;
  port: number;
}

export const DEFAULT_REMOTE_SERVER_CONFIG: RemoteServerConfig = {
  host: '0.0.0.0',
  port: 8765,
};

// ─────────────────────────────────────────────
// Remote Control Server
// ─────────────────────────────────────────────

export class RemoteControlServer {
  private wss: WebSocket.Server | null = null;
  private clients: Map<string, ConnectedClient> = new Map();
  private config: RemoteServerConfig;

  private onCommand: ((command: ZoomCommand, clientId: string) => void) | null = null;
  private stateProvider: (() => ZoomStateSnapshot) | null = null;

  private framesReceived: number = 0;
  private framesRejected: number = 0;

  constructor(config: Partial<RemoteServerConfig> = {}) {
    this.config = { ...DEFAULT_REMOTE_SERVER_CONFIG, ...config };
  }

  setOnCommand(cb: (command: ZoomCommand, clientId: string) => void): void {
    this.onCommand = cb;
  }

  /** Source of the snapshot sent on connect and on get_state */
  setStateProvider(provider: () => ZoomStateSnapshot): void {
    this.stateProvider = provider;
  }

  // ─── Lifecycle ───────────────────────────

  start(): void {
    if (this.wss) return;
    this.wss = new WebSocket.Server({ port: this.config.port, host: this.config.host });

    this.wss.on('connection', (ws: WebSocket) => {
      const clientId = this.addClient(ws);

      ws.on('message', (raw: WebSocket.RawData) => {
        this.handleMessage(clientId, raw.toString());
      });

      ws.on('close', () => {
        this.removeClient(clientId);
      });

      ws.on('error', (err) => {
        console.error(`[RemoteControl] Client ${clientId} error:`, err);
      });
    });

    this.wss.on('error', (err) => {
      console.error('[RemoteControl] Server error:', err);
    });

    console.log(`[RemoteControl] Server started on ${this.config.host}:${this.config.port}`);
  }

  stop(): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) {
      client.terminate();
    }
    this.wss.close();
    this.wss = null;
    this.clients.clear();
    console.log('[RemoteControl] Server stopped');
  }

  isListening(): boolean {
    return this.wss !== null;
  }

  // ─── Clients ─────────────────────────────

  /** Register a connected socket; returns its client id */
  addClient(socket: RemoteSocket): string {
    const clientId = uuidv4();
    this.clients.set(clientId, { id: clientId, socket, connectedAt: Date.now() });

    // Late joiners start from the current state
    if (this.stateProvider) {
      this.send(socket, { type: OutboundMessageType.StateUpdate, ...this.stateProvider() });
    }

    console.log(`[RemoteControl] Client connected: ${clientId}`);
    return clientId;
  }

  removeClient(clientId: string): void {
    if (this.clients.delete(clientId)) {
      console.log(`[RemoteControl] Client disconnected: ${clientId}`);
    }
  }

  // ─── Message Handling ────────────────────

  handleMessage(clientId: string, raw: string): void {
    const client = this.clients.get(clientId);
    if (!client) return;

    this.framesReceived++;
    const frame = parseInboundFrame(raw);

    switch (frame.kind) {
      case 'invalid':
        this.framesRejected++;
        console.warn(`[RemoteControl] Invalid frame from ${clientId}: ${frame.error}`);
        this.send(client.socket, { type: OutboundMessageType.Error, message: frame.error });
        break;

      case 'ping':
        this.send(client.socket, { type: OutboundMessageType.Pong });
        break;

      case 'get_state':
        if (this.stateProvider) {
          this.send(client.socket, {
            type: OutboundMessageType.StateUpdate,
            ...this.stateProvider(),
          });
        } else {
          this.send(client.socket, {
            type: OutboundMessageType.Error,
            message: 'State is not available',
          });
        }
        break;

      case 'command':
        this.onCommand?.(frame.command, clientId);
        break;
    }
  }

  broadcastState(snapshot: ZoomStateSnapshot): void {
    const msg: OutboundMessage = { type: OutboundMessageType.StateUpdate, ...snapshot };
    for (const client of this.clients.values()) {
      this.send(client.socket, msg);
    }
  }

  // ─── Utilities ───────────────────────────

  private send(socket: RemoteSocket, msg: OutboundMessage): void {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(encodeOutbound(msg));
    }
  }

  getStats(): { clients: number; framesReceived: number; framesRejected: number } {
    return {
      clients: this.clients.size,
      framesReceived: this.framesReceived,
      framesRejected: this.framesRejected,
    };
  }
}
