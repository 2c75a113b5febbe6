import type { DepthOptions } from '../geometry.js';
import type { Section, SeatmapConfig, Tier, VenueData, VenueSummary, VenueType } from './types.js';

/**
 * Venue wraps a validated VenueData definition and provides section and
 * tier lookup. The wrapped data is frozen: reloading a venue means
 * building a new Venue, never editing this one.
 */
export class Venue {
  readonly data: Readonly<VenueData>;
  private readonly _tiers: Map<number, Tier>;
  private readonly _sections: Map<string, Section>;

  /** Internal to the venue module; everything else gets venues from `parseVenue`. */
  constructor(data: VenueData) {
    this.data = deepFreeze(data);
    this._tiers = new Map(data.tiers.map((tier) => [tier.id, tier]));
    this._sections = new Map(data.sections.map((section) => [section.id, section]));
  }

  get id(): string { return this.data.id; }
  get name(): string { return this.data.name; }
  get type(): VenueType { return this.data.type; }
  get templateId(): string { return this.data.templateId; }
  get seatmap(): SeatmapConfig { return this.data.seatmap; }
  get sections(): readonly Section[] { return this.data.sections; }
  get tiers(): readonly Tier[] { return this.data.tiers; }

  getSection(sectionId: string): Section | undefined {
    return this._sections.get(sectionId);
  }

  getTier(tierId: number): Tier | undefined {
    return this._tiers.get(tierId);
  }

  /** Depth options for a section: its explicit axis plus the seatmap field point. */
  depthOptions(section: Section): DepthOptions {
    return { axis: section.depthAxis, fieldPoint: this.data.seatmapFieldPoint };
  }

  summary(): VenueSummary {
    return {
      id: this.id,
      name: this.name,
      type: this.type,
      sectionCount: this.data.sections.length,
    };
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
