/**
 * Seat view service: the path from a seatmap click to a rendered image.
 *
 *   click -> mapper -> pose -> fingerprint -> cache -> (miss) render backend
 *
 * Mapping is pure and runs per request against whichever Venue object the
 * registry holds at that moment. The cache is the only shared mutable
 * state.
 */

import { RenderCache } from '../cache/render-cache.js';
import type { RenderCacheEvent, RenderCacheOptions, RenderCacheStats, RenderSource } from '../cache/render-cache.js';
import { RenderError } from '../errors.js';
import { consoleLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { fingerprint as computeFingerprint, DEFAULT_FINGERPRINT_PRECISION } from '../mapper/fingerprint.js';
import type { FingerprintPrecision } from '../mapper/fingerprint.js';
import { mapClick } from '../mapper/mapper.js';
import type { MapOptions } from '../mapper/mapper.js';
import type { ClickPoint, SeatMapping, SectionResolution } from '../mapper/types.js';
import type { RenderClient, RenderQuality } from '../render/render-client.js';
import type { VenueRegistry } from '../venue/registry.js';
import type { VenueSummary } from '../venue/types.js';
import type { Venue } from '../venue/venue.js';

export interface SeatViewServiceOptions {
  venues: VenueRegistry;
  renderClient: RenderClient;
  cache?: RenderCacheOptions;
  quality?: RenderQuality;
  precision?: FingerprintPrecision;
  mapOptions?: MapOptions;
  logger?: Logger;
}

export interface MappedSeat {
  mapping: SeatMapping;
  fingerprint: string;
}

export interface SeatView extends MappedSeat {
  image: Uint8Array;
  source: RenderSource;
}

export interface ViewSeatOptions {
  signal?: AbortSignal;
  /** Called once the click is mapped, before any render starts. */
  onMapped?: (seat: MappedSeat) => void;
}

export type MappingStats = Record<SectionResolution, number>;

export interface SeatViewStats {
  mapping: MappingStats;
  cache: RenderCacheStats;
}

export class SeatViewService {
  private readonly venues: VenueRegistry;
  private readonly renderClient: RenderClient;
  private readonly cache: RenderCache;
  private readonly quality: RenderQuality;
  private readonly precision: FingerprintPrecision;
  private readonly mapOptions: MapOptions;
  private readonly logger: Logger;
  private readonly mappingStats: MappingStats = { inside: 0, overlap: 0, nearest: 0 };

  constructor(options: SeatViewServiceOptions) {
    this.venues = options.venues;
    this.renderClient = options.renderClient;
    this.quality = options.quality ?? 'full';
    this.precision = options.precision ?? DEFAULT_FINGERPRINT_PRECISION;
    this.mapOptions = options.mapOptions ?? {};
    this.logger = options.logger ?? consoleLogger;

    const cacheOptions = options.cache ?? {};
    const userHook = cacheOptions.onEvent;
    this.cache = new RenderCache({
      ...cacheOptions,
      onEvent: (event) => {
        this.logCacheEvent(event);
        if (userHook) userHook(event);
      },
    });
  }

  listVenues(): VenueSummary[] {
    return this.venues.list();
  }

  /**
   * Map a click to a seat and its cache fingerprint.
   *
   * @throws UnknownVenueError, InvalidClickError, SectionResolutionError
   */
  mapSeat(venueId: string, click: ClickPoint): MappedSeat {
    return this.mapVenueSeat(this.venues.get(venueId), click);
  }

  /**
   * Map a click and return the rendered view, from cache when possible.
   * Render failures reject with a RenderError; a cancelled wait rejects
   * with RenderCancelledError.
   */
  async viewSeat(venueId: string, click: ClickPoint, options: ViewSeatOptions = {}): Promise<SeatView> {
    const venue = this.venues.get(venueId);
    const seat = this.mapVenueSeat(venue, click);
    options.onMapped?.(seat);

    const { pose } = seat.mapping;
    try {
      const outcome = await this.cache.resolve(
        seat.fingerprint,
        (signal) => this.renderClient.render(
          { venueId: venue.id, templateId: venue.templateId, pose, quality: this.quality },
          signal,
        ),
        { signal: options.signal },
      );
      return { ...seat, image: outcome.image, source: outcome.source };
    } catch (err) {
      if (err instanceof RenderError && !err.retryable) {
        this.logger.error(`[seat-view] render failed for ${venue.id}/${seat.mapping.sectionId}: ${err.message}`);
      }
      throw err;
    }
  }

  getStats(): SeatViewStats {
    return {
      mapping: { ...this.mappingStats },
      cache: this.cache.getStats(),
    };
  }

  /** Mapping and fingerprint both come from `venue`, whatever the registry holds later. */
  private mapVenueSeat(venue: Venue, click: ClickPoint): MappedSeat {
    const mapping = mapClick(click, venue, this.mapOptions);
    this.recordResolution(mapping, click);
    return {
      mapping,
      fingerprint: computeFingerprint(venue.id, venue.templateId, mapping.pose, this.precision),
    };
  }

  private recordResolution(mapping: SeatMapping, click: ClickPoint): void {
    this.mappingStats[mapping.resolution]++;
    const at = `(${click.x.toFixed(4)}, ${click.y.toFixed(4)})`;
    if (mapping.resolution === 'overlap') {
      this.logger.warn(
        `[seat-view] ${mapping.venueId}: click ${at} is inside overlapping sections ` +
        `${mapping.candidates.join(', ')}; using ${mapping.sectionId}`,
      );
    } else if (mapping.resolution === 'nearest') {
      this.logger.info(
        `[seat-view] ${mapping.venueId}: click ${at} is outside every section; ` +
        `using nearest section ${mapping.sectionId}`,
      );
    }
  }

  private logCacheEvent(event: RenderCacheEvent): void {
    switch (event.type) {
      case 'retry':
        this.logger.warn(
          `[seat-view] render ${event.fingerprint.slice(0, 12)} attempt ${event.attempt} ` +
          `retrying in ${event.delayMs}ms: ${describeError(event.error)}`,
        );
        break;
      case 'failed':
        this.logger.warn(`[seat-view] render ${event.fingerprint.slice(0, 12)} failed: ${describeError(event.error)}`);
        break;
      default:
        break;
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
