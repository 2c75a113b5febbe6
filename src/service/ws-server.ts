/**
 * WebSocket server for seat views.
 *
 * Thin adapter layer: maps WebSocket connections to the SeatViewService.
 * Uses the `ws` library for WebSocket support.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import type { AddressInfo } from 'net';
import { RenderCancelledError, RenderError, SeatViewError } from '../errors.js';
import { consoleLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { SeatViewService } from './seat-view-service.js';
import { ProtocolError, parseClientMessage } from './types.js';
import type {
  ClientMessage,
  MapSeatMessage,
  ServerMessage,
  ViewSeatMessage,
} from './types.js';

// -- Server State --

interface Connection {
  id: string;
  ws: WebSocket;
  /** requestId → controller for each view still waiting on a render. */
  pending: Map<string, AbortController>;
  send(message: ServerMessage): void;
}

interface ServerState {
  connections: Map<string, Connection>;
}

export interface SeatViewServerConfig {
  /** Port to listen on. 0 picks a free port; read it from `ready`. */
  port: number;
  service: SeatViewService;
  logger?: Logger;
}

export interface SeatViewServer {
  /** The underlying WebSocket server. */
  wss: WebSocketServer;
  /** Resolves with the bound port once the server is listening. */
  ready: Promise<number>;
  /** Cancel pending views and shut down the server. */
  close(): Promise<void>;
  /** Get server state for testing/monitoring. */
  getState(): Readonly<ServerState>;
}

const IMAGE_MIME_TYPE = 'image/png';

/**
 * Create and start a seat view WebSocket server.
 */
export function createSeatViewServer(config: SeatViewServerConfig): SeatViewServer {
  const state: ServerState = { connections: new Map() };
  const logger = config.logger ?? consoleLogger;
  const { service } = config;

  const wss = new WebSocketServer({ port: config.port });

  const ready = new Promise<number>((resolve, reject) => {
    wss.once('listening', () => {
      const address = wss.address();
      resolve(isAddressInfo(address) ? address.port : config.port);
    });
    wss.once('error', reject);
  });

  wss.on('error', (err: Error) => {
    logger.error(`[seat-view] server error: ${err.message}`);
  });

  wss.on('connection', (ws: WebSocket) => {
    const conn: Connection = {
      id: generateConnectionId(),
      ws,
      pending: new Map(),
      send(message: ServerMessage) {
        sendJson(ws, message);
      },
    };
    state.connections.set(conn.id, conn);

    conn.send({ type: 'connected', connectionId: conn.id });

    ws.on('message', (data: RawData) => {
      let message: ClientMessage;
      try {
        message = parseClientMessage(JSON.parse(data.toString()));
      } catch (err) {
        const requestId = err instanceof ProtocolError ? err.requestId : undefined;
        const errorMsg = err instanceof Error ? err.message : 'Invalid message';
        conn.send({ type: 'error', message: errorMsg, requestId });
        return;
      }
      handleMessage(conn, message, service, logger);
    });

    ws.on('close', () => {
      handleClose(state, conn);
    });

    ws.on('error', (err: Error) => {
      logger.warn(`[seat-view] connection ${conn.id} error: ${err.message}`);
      handleClose(state, conn);
    });
  });

  return {
    wss,
    ready,
    close() {
      for (const conn of state.connections.values()) {
        handleClose(state, conn);
        conn.ws.terminate();
      }
      return new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
    getState() {
      return state;
    },
  };
}

// -- Message Handling --

function handleMessage(
  conn: Connection,
  message: ClientMessage,
  service: SeatViewService,
  logger: Logger,
): void {
  switch (message.type) {
    case 'list-venues':
      conn.send({ type: 'venues', venues: service.listVenues() });
      break;

    case 'map-seat':
      handleMapSeat(conn, message, service);
      break;

    case 'view-seat':
      void handleViewSeat(conn, message, service, logger);
      break;

    case 'cancel': {
      const controller = conn.pending.get(message.requestId);
      if (!controller) {
        conn.send({ type: 'error', message: 'No pending request with that id', requestId: message.requestId });
        return;
      }
      controller.abort();
      break;
    }
  }
}

function handleMapSeat(conn: Connection, message: MapSeatMessage, service: SeatViewService): void {
  try {
    const seat = service.mapSeat(message.venueId, { x: message.x, y: message.y });
    conn.send({ type: 'seat-mapped', requestId: message.requestId, ...seat });
  } catch (err) {
    sendRequestError(conn, message.requestId, err);
  }
}

async function handleViewSeat(
  conn: Connection,
  message: ViewSeatMessage,
  service: SeatViewService,
  logger: Logger,
): Promise<void> {
  const { requestId } = message;
  if (conn.pending.has(requestId)) {
    conn.send({ type: 'error', message: 'A request with that id is already pending', requestId });
    return;
  }

  const controller = new AbortController();
  conn.pending.set(requestId, controller);

  try {
    const view = await service.viewSeat(
      message.venueId,
      { x: message.x, y: message.y },
      {
        signal: controller.signal,
        onMapped: (seat) => conn.send({ type: 'seat-mapped', requestId, ...seat }),
      },
    );
    conn.send({
      type: 'view-ready',
      requestId,
      fingerprint: view.fingerprint,
      source: view.source,
      mimeType: IMAGE_MIME_TYPE,
      image: Buffer.from(view.image).toString('base64'),
    });
  } catch (err) {
    if (err instanceof RenderCancelledError) {
      conn.send({ type: 'view-cancelled', requestId });
    } else if (err instanceof RenderError) {
      conn.send({ type: 'view-unavailable', requestId, reason: err.message, retryable: err.retryable });
    } else {
      if (!(err instanceof SeatViewError)) {
        logger.error(`[seat-view] unexpected failure for request ${requestId}: ${describeError(err)}`);
      }
      sendRequestError(conn, requestId, err);
    }
  } finally {
    if (conn.pending.get(requestId) === controller) conn.pending.delete(requestId);
  }
}

// -- Disconnection --

/** Stop waiting on every pending view. Renders keep running and are cached. */
function handleClose(state: ServerState, conn: Connection): void {
  for (const controller of conn.pending.values()) {
    controller.abort();
  }
  conn.pending.clear();
  state.connections.delete(conn.id);
}

// -- Helpers --

function sendRequestError(conn: Connection, requestId: string, err: unknown): void {
  conn.send({ type: 'error', message: describeError(err), requestId });
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : 'Internal error';
}

function isAddressInfo(address: AddressInfo | string | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

function sendJson(ws: WebSocket, data: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

let connectionCounter = 0;
function generateConnectionId(): string {
  return `conn-${++connectionCounter}-${Math.random().toString(36).slice(2, 6)}`;
}
