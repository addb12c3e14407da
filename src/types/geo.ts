export interface Position {
  lat: number;
  lng: number;
}

export interface Segment {
  start: Position;
  end: Position;
}

/** Ordered ring of positions; closed (first === last) once processed by the kernel */
export type Polygon = Position[];

/** Multi-polygon: an event's region */
export type Area = Polygon[];

export interface BoundingBox {
  /** south-west corner */
  sw: Position;
  /** north-east corner */
  ne: Position;
}

export interface SplitPolygonResult {
  left: Area;
  right: Area;
}
