import type { Area, BoundingBox, Position } from '../types/geo';
import type { AreaPolygonProvider } from '../types/collaborators';
import { parseGeoJsonArea } from '../data/geoJsonArea';
import { areaBbox, isPointInArea } from './polygon';
import { logger, type ScopedLogger } from './logger';
import { Signal } from './signal';
import type { RandomSource } from '../utils/random';

export type AreaSource = () => Promise<Area>;

const EMPTY_BBOX: BoundingBox = { sw: { lat: 0, lng: 0 }, ne: { lat: 0, lng: 0 } };

function isInsideBbox(p: Position, bbox: BoundingBox): boolean {
  return p.lat >= bbox.sw.lat && p.lat <= bbox.ne.lat && p.lng >= bbox.sw.lng && p.lng <= bbox.ne.lng;
}

/**
 * Event region. Loads once from its source on first use; `reload()` replaces
 * the polygons and notifies listeners so derived caches can be dropped.
 */
export class EventArea implements AreaPolygonProvider {
  private polygons: Area = [];
  private bbox: BoundingBox = EMPTY_BBOX;
  private loaded = false;
  private pending: Promise<void> | null = null;
  private readonly reloaded = new Signal<Area>('area-reloaded');
  private readonly log: ScopedLogger;

  constructor(
    readonly eventId: string,
    private readonly source: AreaSource | null = null,
  ) {
    this.log = logger.scoped('area', { eventId });
  }

  static fromGeoJson(eventId: string, geoJson: unknown): EventArea {
    const area = new EventArea(eventId);
    area.setPolygons(parseGeoJsonArea(geoJson));
    return area;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  async getPolygons(): Promise<Area> {
    await this.ensureLoaded();
    return this.polygons;
  }

  async getBoundingBox(): Promise<BoundingBox> {
    await this.ensureLoaded();
    return this.bbox;
  }

  async isPositionWithin(position: Position): Promise<boolean> {
    await this.ensureLoaded();
    if (!this.loaded || !isInsideBbox(position, this.bbox)) return false;
    return isPointInArea(position, this.polygons);
  }

  /** Replace the polygons and notify reload listeners */
  setPolygons(polygons: Area) {
    const usable = polygons.filter((p) => p.length > 0);
    this.polygons = usable;
    this.bbox = usable.length > 0 ? areaBbox(usable) : EMPTY_BBOX;
    this.loaded = usable.length > 0;
    this.log.debug(`Loaded ${usable.length} polygon(s)`);
    this.reloaded.emit(usable);
  }

  /** Fetch the polygons again from the source; no-op without one */
  async reload(): Promise<void> {
    if (!this.source) return;
    this.loaded = false;
    this.pending = null;
    await this.ensureLoaded();
  }

  /** Rejection-sample a point inside the polygons; null when none is found */
  async generateRandomPositionInArea(random: RandomSource = Math.random, maxAttempts = 1000): Promise<Position | null> {
    await this.ensureLoaded();
    if (!this.loaded) return null;
    const { sw, ne } = this.bbox;
    for (let i = 0; i < maxAttempts; i++) {
      const candidate = {
        lat: sw.lat + random() * (ne.lat - sw.lat),
        lng: sw.lng + random() * (ne.lng - sw.lng),
      };
      if (isPointInArea(candidate, this.polygons)) return candidate;
    }
    this.log.warn(`No random position found after ${maxAttempts} attempts`);
    return null;
  }

  onReload(listener: (polygons: Area) => void): () => void {
    return this.reloaded.subscribe(listener);
  }

  private ensureLoaded(): Promise<void> {
    if (this.loaded || !this.source) return Promise.resolve();
    if (!this.pending) {
      const source = this.source;
      this.pending = source()
        .then((polygons) => this.setPolygons(polygons))
        .catch((err: unknown) => {
          // Left unloaded; the next call retries
          this.log.error('Failed to load area', err);
          this.pending = null;
        });
    }
    return this.pending;
  }
}
