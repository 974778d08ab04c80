import type { CoordinateConvention, ObjectTransform, Vec2, Vec3 } from "./coordinates.js";
import type { ColorKind, MorphKind, SelectionKind } from "./snapshot.js";

/** Host-native element ids. Stable for the lifetime of the element, not dense. */
export type VertexHandle = number;
export type PolygonHandle = number;

/**
 * Host polygon primitive kinds. Only `face` and `subdivision` can be exported;
 * the others are skipped during extraction.
 */
export type HostPolygonType = "face" | "subdivision" | "curve" | "bezier" | "patch" | "text";

export interface HostPolygon {
  handle: PolygonHandle;
  type: HostPolygonType;
  vertices: VertexHandle[];
  /** Material tag, matched against material names. */
  material: string | null;
}

export interface HostMaterial {
  name: string;
  diffuse: Vec3;
  texturePath: string | null;
}

export interface HostObjectInfo {
  name: string;
  transform: ObjectTransform;
}

/** Per-vertex channel keyed by vertex handle. */
export interface VertexChannel<T> {
  readonly name: string;
  get(vertex: VertexHandle): T | undefined;
  set(vertex: VertexHandle, value: T): void;
  entries(): Array<[VertexHandle, T]>;
}

/** Face-corner channel keyed by polygon handle and corner index. */
export interface CornerChannel<T> {
  readonly name: string;
  get(polygon: PolygonHandle, corner: number): T | undefined;
  set(polygon: PolygonHandle, corner: number, value: T): void;
  entries(): Array<{ polygon: PolygonHandle; corner: number; value: T }>;
}

export interface WeightChannel extends VertexChannel<number> {
  readonly kind: "weight";
}

export interface MorphChannel extends VertexChannel<Vec3> {
  readonly kind: "morph";
  readonly morphKind: MorphKind;
}

export interface UVChannel extends CornerChannel<Vec2> {
  readonly kind: "uv";
  primary: boolean;
}

export interface ColorChannel extends CornerChannel<number[]> {
  readonly kind: "color";
  readonly colorKind: ColorKind;
}

export type SelectionElement = number | [VertexHandle, VertexHandle];

export interface SelectionChannel {
  readonly kind: "selection";
  readonly name: string;
  readonly elementKind: SelectionKind;
  /** Polygon or vertex handles; empty for edge sets. */
  elements(): number[];
  /** Vertex handle pairs; empty for vertex and polygon sets. */
  edges(): Array<[VertexHandle, VertexHandle]>;
  add(element: SelectionElement): void;
  clear(): void;
}

export interface ChannelByKind {
  weight: WeightChannel;
  morph: MorphChannel;
  uv: UVChannel;
  color: ColorChannel;
  selection: SelectionChannel;
}

export type ChannelKind = keyof ChannelByKind;
export type VertexOrCornerChannelKind = Exclude<ChannelKind, "selection">;

/** Creation-time settings. For selection sets `elementKind` is also part of the lookup key. */
export interface ChannelOptions {
  weight: Record<string, never>;
  morph: { morphKind: MorphKind };
  uv: { primary: boolean };
  color: { colorKind: ColorKind };
  selection: { elementKind: SelectionKind };
}

/** Read side of a host mesh, consumed by the extractor. */
export interface HostMeshReader {
  readonly convention: CoordinateConvention;
  /** Name and placement of the mesh item, when the host has one. */
  getObjectInfo(): HostObjectInfo | null;
  getPolygons(): HostPolygon[];
  getSelectedPolygons(): HostPolygon[];
  getVertexHandles(): VertexHandle[];
  /** Undefined when the handle does not resolve to a vertex. */
  getVertexPosition(vertex: VertexHandle): Vec3 | undefined;
  getMaterials(): HostMaterial[];
  getChannels<K extends ChannelKind>(kind: K): Array<ChannelByKind[K]>;
  getCreases(): Array<{ edge: [VertexHandle, VertexHandle]; weight: number }>;
  getSeams(): Array<[VertexHandle, VertexHandle]>;
  hasEdge(a: VertexHandle, b: VertexHandle): boolean;
}

/** Write side of a host mesh, used by the merge engine and by Cut. */
export interface HostMeshWriter {
  createVertex(position: Vec3): VertexHandle;
  createPolygon(vertices: VertexHandle[], material: string | null, subdivision: boolean): PolygonHandle;
  deletePolygons(handles: PolygonHandle[]): void;
  /** Drop all geometry, channels and selection sets; materials stay. */
  clear(): void;
  /** Adds or overwrites the material with this exact name. Returns true when it was created. */
  setOrCreateMaterial(material: HostMaterial): boolean;
  findChannel<K extends VertexOrCornerChannelKind>(kind: K, name: string): ChannelByKind[K] | undefined;
  /** Selection sets are keyed by name and element kind together. */
  findSelectionSet(name: string, elementKind: SelectionKind): SelectionChannel | undefined;
  /** Returns the existing channel of that name, or creates one with `options`. */
  setOrCreateChannel<K extends ChannelKind>(kind: K, name: string, options: ChannelOptions[K]): ChannelByKind[K];
  setCrease(a: VertexHandle, b: VertexHandle, weight: number): void;
  markSeam(a: VertexHandle, b: VertexHandle): void;
}

export type HostMesh = HostMeshReader & HostMeshWriter;
