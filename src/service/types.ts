/**
 * WebSocket message protocol for the seat view server.
 *
 * A client sends clicks in normalized seatmap coordinates and tags each
 * with a requestId of its choosing; every reply to that click carries the
 * same requestId.
 */

import { SeatViewError } from '../errors.js';
import type { RenderSource } from '../cache/render-cache.js';
import type { SeatMapping } from '../mapper/types.js';
import type { VenueSummary } from '../venue/types.js';

// -- Client → Server --

export interface ListVenuesMessage {
  type: 'list-venues';
}

export interface MapSeatMessage {
  type: 'map-seat';
  requestId: string;
  venueId: string;
  x: number;
  y: number;
}

export interface ViewSeatMessage {
  type: 'view-seat';
  requestId: string;
  venueId: string;
  x: number;
  y: number;
}

export interface CancelMessage {
  type: 'cancel';
  requestId: string;
}

export type ClientMessage =
  | ListVenuesMessage
  | MapSeatMessage
  | ViewSeatMessage
  | CancelMessage;

// -- Server → Client --

export interface ConnectedMessage {
  type: 'connected';
  connectionId: string;
}

export interface VenuesMessage {
  type: 'venues';
  venues: VenueSummary[];
}

export interface SeatMappedMessage {
  type: 'seat-mapped';
  requestId: string;
  mapping: SeatMapping;
  fingerprint: string;
}

export interface ViewReadyMessage {
  type: 'view-ready';
  requestId: string;
  fingerprint: string;
  source: RenderSource;
  mimeType: string;
  /** Base64-encoded image bytes. */
  image: string;
}

export interface ViewUnavailableMessage {
  type: 'view-unavailable';
  requestId: string;
  reason: string;
  /** Whether asking again later may succeed. */
  retryable: boolean;
}

export interface ViewCancelledMessage {
  type: 'view-cancelled';
  requestId: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  requestId?: string;
}

export type ServerMessage =
  | ConnectedMessage
  | VenuesMessage
  | SeatMappedMessage
  | ViewReadyMessage
  | ViewUnavailableMessage
  | ViewCancelledMessage
  | ErrorMessage;

// -- Parsing --

/** A client message that could not be understood. */
export class ProtocolError extends SeatViewError {
  constructor(
    message: string,
    readonly requestId?: string,
  ) {
    super(message);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(raw: Record<string, unknown>, key: string, requestId?: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ProtocolError(`${key} must be a non-empty string`, requestId);
  }
  return value;
}

function requireNumber(raw: Record<string, unknown>, key: string, requestId: string): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ProtocolError(`${key} must be a finite number`, requestId);
  }
  return value;
}

function parseSeatClick(raw: Record<string, unknown>): Omit<MapSeatMessage, 'type'> {
  const requestId = requireString(raw, 'requestId');
  return {
    requestId,
    venueId: requireString(raw, 'venueId', requestId),
    x: requireNumber(raw, 'x', requestId),
    y: requireNumber(raw, 'y', requestId),
  };
}

/** Validate a decoded JSON value as a ClientMessage. */
export function parseClientMessage(raw: unknown): ClientMessage {
  if (!isRecord(raw)) throw new ProtocolError('Message must be a JSON object');

  const type = raw['type'];
  switch (type) {
    case 'list-venues':
      return { type: 'list-venues' };

    case 'map-seat':
      return { type: 'map-seat', ...parseSeatClick(raw) };

    case 'view-seat':
      return { type: 'view-seat', ...parseSeatClick(raw) };

    case 'cancel':
      return { type: 'cancel', requestId: requireString(raw, 'requestId') };

    default:
      throw new ProtocolError(`Unknown message type: ${String(type)}`);
  }
}
