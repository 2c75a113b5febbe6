export { SeatViewService } from './seat-view-service.js';
export type {
  MappedSeat,
  MappingStats,
  SeatView,
  SeatViewServiceOptions,
  SeatViewStats,
  ViewSeatOptions,
} from './seat-view-service.js';
export { createSeatViewServer } from './ws-server.js';
export type { SeatViewServer, SeatViewServerConfig } from './ws-server.js';
export { ProtocolError, parseClientMessage } from './types.js';
export type { ClientMessage, ServerMessage } from './types.js';
