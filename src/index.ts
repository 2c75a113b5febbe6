/**
 * Seat View: click-to-view pipeline for venue seatmaps
 *
 * Public API surface for the coordinate mapper, the render cache,
 * and the WebSocket service built on them.
 */

// Venue
export {
  VenueRegistry,
  VENUE_TYPES,
  parseVenue,
  loadVenueFile,
  loadVenueDirectory,
} from "./venue/index.js";
export type {
  Venue,
  DistanceRange,
  Section,
  SeatmapConfig,
  Tier,
  VenueData,
  VenueSummary,
  VenueType,
} from "./venue/index.js";

// Geometry
export {
  pointInPolygon,
  polygonCentroid,
  polygonArea,
  nearestSection,
  interpolateDepth,
  lateralOffset,
  cylindricalToCartesian,
} from "./geometry.js";
export type { Point2D, Point3D, Polygon, DepthAxis } from "./geometry.js";

// Mapper
export {
  map,
  mapClick,
  resolveSection,
  normalizeClick,
  estimateRow,
  fieldOfViewForDistance,
  lookAtRotation,
  fingerprint,
  fingerprintPayload,
  quantize,
  DEFAULT_FINGERPRINT_PRECISION,
  VIEW_PROFILES,
  getViewProfile,
} from "./mapper/index.js";
export type {
  CameraPose,
  CameraRotation,
  ClickPoint,
  FingerprintPrecision,
  FovRange,
  MapOptions,
  SectionResolution,
  SeatMapping,
  ViewProfile,
} from "./mapper/index.js";

// Render cache
export { RenderCache } from "./cache/index.js";
export type {
  RenderCacheEvent,
  RenderCacheOptions,
  RenderCacheStats,
  RenderFn,
  RenderOutcome,
  RenderSource,
  RetryPolicy,
} from "./cache/index.js";

// Render backend
export { HttpRenderClient, buildRenderPayload, RENDER_PRESETS } from "./render/index.js";
export type { RenderClient, RenderPayload, RenderQuality, RenderRequest } from "./render/index.js";

// Service
export { SeatViewService, createSeatViewServer, parseClientMessage } from "./service/index.js";
export type {
  ClientMessage,
  MappedSeat,
  SeatView,
  SeatViewServer,
  SeatViewServerConfig,
  SeatViewServiceOptions,
  ServerMessage,
} from "./service/index.js";

// Errors
export {
  SeatViewError,
  InvalidVenueConfigError,
  UnknownVenueError,
  SectionResolutionError,
  InvalidClickError,
  RenderError,
  RenderTimeoutError,
  RenderTransientError,
  RenderFatalError,
  RenderCancelledError,
  isRetryableRenderError,
} from "./errors.js";

// Config
export { loadConfig, ConfigError } from "./config.js";
export type { SeatViewConfig } from "./config.js";
export type { Logger } from "./logger.js";
