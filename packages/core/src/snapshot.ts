import type { CoordinateConvention, ObjectTransform, Vec2, Vec3 } from "./coordinates.js";

export const LATEST_SCHEMA_VERSION = 2;

/** Unordered vertex pair, stored with the smaller id first. */
export type EdgeKey = [number, number];

/**
 * How a polygon came to be in the snapshot. Keyhole, non-convex and
 * self-intersecting host polygons are split into triangles on export and
 * cannot be reassembled.
 */
export type PolygonOrigin = "regular" | "triangulatedFromIrregular";

export interface SnapshotPolygon {
  /** Vertex ids, at least three, none repeated. */
  vertices: number[];
  /** Index into `materials`. */
  material: number | null;
  isSubdivisionSurface: boolean;
  origin: PolygonOrigin;
}

export type MorphKind = "relative" | "absolute";

export interface VertexEntry<T> {
  vertex: number;
  value: T;
}

export interface CornerEntry<T> {
  polygon: number;
  corner: number;
  value: T;
}

export interface SnapshotMorph {
  name: string;
  kind: MorphKind;
  /** Deltas for `relative`, target positions for `absolute`. */
  values: VertexEntry<Vec3>[];
}

export interface SnapshotWeightMap {
  name: string;
  values: VertexEntry<number>[];
}

export interface SubdivisionWeight {
  edge: EdgeKey;
  weight: number;
}

export interface SnapshotMaterial {
  name: string;
  diffuse: Vec3;
  texturePath: string | null;
}

export interface SnapshotUVMap {
  name: string;
  primary: boolean;
  values: CornerEntry<Vec2>[];
}

export type ColorKind = "RGB" | "RGBA";

export interface SnapshotColorMap {
  name: string;
  kind: ColorKind;
  /** Three components for RGB, four for RGBA. */
  values: CornerEntry<number[]>[];
}

export type SelectionSet =
  | { name: string; kind: "vertex"; elements: number[] }
  | { name: string; kind: "polygon"; elements: number[] }
  | { name: string; kind: "edge"; edges: EdgeKey[]; primary?: boolean };

export type SelectionKind = SelectionSet["kind"];

export type EdgeSelectionSet = Extract<SelectionSet, { kind: "edge" }>;

export const FREESTYLE_SET_NAME = "_Freestyle";
export const SEAM_SET_NAME = "_Seam";

/** Mesh item the snapshot was taken from; the transform is in the snapshot's convention. */
export interface SnapshotObject {
  name: string;
  transform: ObjectTransform;
}

export interface SnapshotMetadata {
  sourceApp: string;
  timestamp: string;
  /** Host units per exchange unit. Informational; positions are never scaled. */
  unitScale?: number;
  object?: SnapshotObject;
}

/**
 * Application-neutral mesh selection. A plain value: nothing in it refers
 * back to the host mesh it was taken from.
 */
export interface MeshSnapshot {
  schemaVersion: number;
  coordinateConvention: CoordinateConvention;
  metadata?: SnapshotMetadata;
  /** Positions indexed by vertex id. */
  vertices: Vec3[];
  polygons: SnapshotPolygon[];
  materials: SnapshotMaterial[];
  uvMaps: SnapshotUVMap[];
  colorMaps: SnapshotColorMap[];
  weightMaps: SnapshotWeightMap[];
  morphs: SnapshotMorph[];
  subdivisionWeights: SubdivisionWeight[];
  selectionSets: SelectionSet[];
}

export function createEmptySnapshot(coordinateConvention: CoordinateConvention): MeshSnapshot {
  return {
    schemaVersion: LATEST_SCHEMA_VERSION,
    coordinateConvention,
    vertices: [],
    polygons: [],
    materials: [],
    uvMaps: [],
    colorMaps: [],
    weightMaps: [],
    morphs: [],
    subdivisionWeights: [],
    selectionSets: [],
  };
}

/** Pad with opaque alpha or drop alpha so the value matches `kind`. */
export function fitColor(value: number[], kind: ColorKind): number[] {
  const size = kind === "RGBA" ? 4 : 3;
  const out = value.slice(0, size);
  while (out.length < size) out.push(1);
  return out;
}

export function edgeKey(a: number, b: number): EdgeKey {
  return a <= b ? [a, b] : [b, a];
}

export function edgeKeyString(a: number, b: number): string {
  const [lo, hi] = edgeKey(a, b);
  return `${lo}:${hi}`;
}

/**
 * The edge set whose edges are marked as UV seams on import: the one flagged
 * `primary`, otherwise the one named `_Seam`.
 */
export function findSeamSet(snapshot: MeshSnapshot): EdgeSelectionSet | null {
  let named: EdgeSelectionSet | null = null;
  for (const set of snapshot.selectionSets) {
    if (set.kind !== "edge") continue;
    if (set.primary) return set;
    if (!named && set.name === SEAM_SET_NAME) named = set;
  }
  return named;
}

export interface SnapshotElementCounts {
  vertices: number;
  polygons: number;
  /** Polygons produced by splitting irregular host polygons. */
  triangulated: number;
  materials: number;
  uvMaps: number;
  colorMaps: number;
  weightMaps: number;
  morphs: number;
  subdivisionWeights: number;
  selectionSets: number;
}

export function countSnapshotElements(snapshot: MeshSnapshot): SnapshotElementCounts {
  return {
    vertices: snapshot.vertices.length,
    polygons: snapshot.polygons.length,
    triangulated: snapshot.polygons.filter((p) => p.origin === "triangulatedFromIrregular").length,
    materials: snapshot.materials.length,
    uvMaps: snapshot.uvMaps.length,
    colorMaps: snapshot.colorMaps.length,
    weightMaps: snapshot.weightMaps.length,
    morphs: snapshot.morphs.length,
    subdivisionWeights: snapshot.subdivisionWeights.length,
    selectionSets: snapshot.selectionSets.length,
  };
}
