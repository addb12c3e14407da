import type { Area, BoundingBox, Position } from './geo';

/** Event geometry, possibly loaded lazily from GeoJSON */
export interface AreaPolygonProvider {
  /** Empty until loaded */
  getPolygons(): Promise<Area>;
  /** Zero-size box at the origin until loaded */
  getBoundingBox(): Promise<BoundingBox>;
  isLoaded(): boolean;
  isPositionWithin(position: Position): Promise<boolean>;
}

/** Fires whenever simulation parameters change */
export interface SimulationChangeSignal {
  subscribe(listener: () => void): () => void;
}
