import type { CoordinateConvention, Vec2, Vec3 } from "./coordinates.js";
import type {
  ChannelByKind,
  ChannelKind,
  ChannelOptions,
  ColorChannel,
  HostMaterial,
  HostMesh,
  HostObjectInfo,
  HostPolygon,
  HostPolygonType,
  MorphChannel,
  PolygonHandle,
  SelectionChannel,
  SelectionElement,
  UVChannel,
  VertexHandle,
  VertexOrCornerChannelKind,
  WeightChannel,
} from "./host.js";
import { edgeKeyString } from "./snapshot.js";
import type { ColorKind, MorphKind, SelectionKind } from "./snapshot.js";

interface StoredPolygon {
  type: HostPolygonType;
  vertices: VertexHandle[];
  material: string | null;
  selected: boolean;
}

class MemoryVertexChannel<T> {
  readonly name: string;
  protected readonly values = new Map<VertexHandle, T>();

  constructor(name: string) {
    this.name = name;
  }

  get(vertex: VertexHandle): T | undefined {
    return this.values.get(vertex);
  }

  set(vertex: VertexHandle, value: T): void {
    this.values.set(vertex, value);
  }

  entries(): Array<[VertexHandle, T]> {
    return [...this.values.entries()];
  }
}

class MemoryWeightChannel extends MemoryVertexChannel<number> implements WeightChannel {
  readonly kind = "weight";
}

class MemoryMorphChannel extends MemoryVertexChannel<Vec3> implements MorphChannel {
  readonly kind = "morph";
  readonly morphKind: MorphKind;

  constructor(name: string, morphKind: MorphKind) {
    super(name);
    this.morphKind = morphKind;
  }

  set(vertex: VertexHandle, value: Vec3): void {
    super.set(vertex, [value[0], value[1], value[2]]);
  }
}

class MemoryCornerChannel<T> {
  readonly name: string;
  private readonly values = new Map<PolygonHandle, Map<number, T>>();

  constructor(name: string) {
    this.name = name;
  }

  get(polygon: PolygonHandle, corner: number): T | undefined {
    return this.values.get(polygon)?.get(corner);
  }

  set(polygon: PolygonHandle, corner: number, value: T): void {
    let corners = this.values.get(polygon);
    if (!corners) {
      corners = new Map();
      this.values.set(polygon, corners);
    }
    corners.set(corner, value);
  }

  dropPolygon(polygon: PolygonHandle): void {
    this.values.delete(polygon);
  }

  entries(): Array<{ polygon: PolygonHandle; corner: number; value: T }> {
    const out: Array<{ polygon: PolygonHandle; corner: number; value: T }> = [];
    for (const [polygon, corners] of this.values) {
      for (const [corner, value] of corners) {
        out.push({ polygon, corner, value });
      }
    }
    return out;
  }
}

class MemoryUVChannel extends MemoryCornerChannel<Vec2> implements UVChannel {
  readonly kind = "uv";
  primary: boolean;

  constructor(name: string, primary: boolean) {
    super(name);
    this.primary = primary;
  }
}

class MemoryColorChannel extends MemoryCornerChannel<number[]> implements ColorChannel {
  readonly kind = "color";
  readonly colorKind: ColorKind;

  constructor(name: string, colorKind: ColorKind) {
    super(name);
    this.colorKind = colorKind;
  }
}

class MemorySelectionChannel implements SelectionChannel {
  readonly kind = "selection";
  readonly name: string;
  readonly elementKind: SelectionKind;
  private readonly members = new Set<number>();
  private readonly edgeMembers = new Map<string, [VertexHandle, VertexHandle]>();

  constructor(name: string, elementKind: SelectionKind) {
    this.name = name;
    this.elementKind = elementKind;
  }

  elements(): number[] {
    return [...this.members];
  }

  edges(): Array<[VertexHandle, VertexHandle]> {
    return [...this.edgeMembers.values()].map(([a, b]): [VertexHandle, VertexHandle] => [a, b]);
  }

  add(element: SelectionElement): void {
    if (Array.isArray(element)) {
      if (this.elementKind !== "edge") return;
      const [a, b] = element;
      this.edgeMembers.set(edgeKeyString(a, b), a <= b ? [a, b] : [b, a]);
      return;
    }
    if (this.elementKind === "edge") return;
    this.members.add(element);
  }

  remove(element: number): void {
    this.members.delete(element);
  }

  clear(): void {
    this.members.clear();
    this.edgeMembers.clear();
  }
}

type ChannelRegistry = { [K in ChannelKind]: Map<string, ChannelByKind[K]> };
type ChannelFactories = { [K in ChannelKind]: (name: string, options: ChannelOptions[K]) => ChannelByKind[K] };

const CHANNEL_FACTORIES: ChannelFactories = {
  weight: (name) => new MemoryWeightChannel(name),
  morph: (name, options) => new MemoryMorphChannel(name, options.morphKind),
  uv: (name, options) => new MemoryUVChannel(name, options.primary),
  color: (name, options) => new MemoryColorChannel(name, options.colorKind),
  selection: (name, options) => new MemorySelectionChannel(name, options.elementKind),
};

function registryKey(kind: ChannelKind, name: string, options: object): string {
  if (kind === "selection" && "elementKind" in options && typeof options.elementKind === "string") {
    return `${options.elementKind}/${name}`;
  }
  return name;
}

function createRegistry(): ChannelRegistry {
  return {
    weight: new Map(),
    morph: new Map(),
    uv: new Map(),
    color: new Map(),
    selection: new Map(),
  };
}

/**
 * Host mesh kept entirely in memory. Handles are allocated monotonically and
 * never reused, so they behave like the sparse native ids of a real host.
 */
export class MemoryMesh implements HostMesh {
  readonly convention: CoordinateConvention;
  private nextVertex = 0;
  private nextPolygon = 0;
  private readonly vertices = new Map<VertexHandle, Vec3>();
  private readonly polygons = new Map<PolygonHandle, StoredPolygon>();
  private readonly edgeUse = new Map<string, number>();
  private readonly materials: HostMaterial[] = [];
  private channels: ChannelRegistry = createRegistry();
  private readonly creases = new Map<string, { edge: [VertexHandle, VertexHandle]; weight: number }>();
  private readonly seams = new Map<string, [VertexHandle, VertexHandle]>();
  private objectInfo: HostObjectInfo | null = null;

  constructor(convention: CoordinateConvention) {
    this.convention = convention;
  }

  // ---- reader ----

  getObjectInfo(): HostObjectInfo | null {
    return this.objectInfo ? cloneObjectInfo(this.objectInfo) : null;
  }

  getPolygons(): HostPolygon[] {
    return [...this.polygons.entries()].map(([handle, polygon]) => toHostPolygon(handle, polygon));
  }

  getSelectedPolygons(): HostPolygon[] {
    return this.getPolygons().filter((polygon) => this.polygons.get(polygon.handle)?.selected === true);
  }

  getVertexHandles(): VertexHandle[] {
    return [...this.vertices.keys()];
  }

  getVertexPosition(vertex: VertexHandle): Vec3 | undefined {
    const position = this.vertices.get(vertex);
    return position ? [position[0], position[1], position[2]] : undefined;
  }

  getMaterials(): HostMaterial[] {
    return this.materials.map(cloneMaterial);
  }

  getChannels<K extends ChannelKind>(kind: K): Array<ChannelByKind[K]> {
    const registry: Map<string, ChannelByKind[K]> = this.channels[kind];
    return [...registry.values()];
  }

  getCreases(): Array<{ edge: [VertexHandle, VertexHandle]; weight: number }> {
    return [...this.creases.values()].map(({ edge, weight }): { edge: [VertexHandle, VertexHandle]; weight: number } => ({
      edge: [edge[0], edge[1]],
      weight,
    }));
  }

  getSeams(): Array<[VertexHandle, VertexHandle]> {
    return [...this.seams.values()].map(([a, b]): [VertexHandle, VertexHandle] => [a, b]);
  }

  hasEdge(a: VertexHandle, b: VertexHandle): boolean {
    return (this.edgeUse.get(edgeKeyString(a, b)) ?? 0) > 0;
  }

  // ---- writer ----

  createVertex(position: Vec3): VertexHandle {
    const handle = this.nextVertex;
    this.nextVertex += 1;
    this.vertices.set(handle, [position[0], position[1], position[2]]);
    return handle;
  }

  createPolygon(vertices: VertexHandle[], material: string | null, subdivision: boolean): PolygonHandle {
    return this.addPolygon(vertices, subdivision ? "subdivision" : "face", material);
  }

  /** Like `createPolygon`, but accepts every host primitive type. */
  addPolygon(vertices: VertexHandle[], type: HostPolygonType, material: string | null = null): PolygonHandle {
    for (const vertex of vertices) {
      if (!this.vertices.has(vertex)) {
        throw new Error(`Polygon references unknown vertex ${vertex}.`);
      }
    }
    const handle = this.nextPolygon;
    this.nextPolygon += 1;
    this.polygons.set(handle, { type, vertices: [...vertices], material, selected: false });
    this.updateEdgeUse(vertices, 1);
    return handle;
  }

  deletePolygons(handles: PolygonHandle[]): void {
    for (const handle of handles) {
      const polygon = this.polygons.get(handle);
      if (!polygon) continue;
      this.polygons.delete(handle);
      this.updateEdgeUse(polygon.vertices, -1);
      for (const channel of this.channels.uv.values()) {
        if (channel instanceof MemoryCornerChannel) channel.dropPolygon(handle);
      }
      for (const channel of this.channels.color.values()) {
        if (channel instanceof MemoryCornerChannel) channel.dropPolygon(handle);
      }
      for (const set of this.channels.selection.values()) {
        if (set.elementKind === "polygon" && set instanceof MemorySelectionChannel) set.remove(handle);
      }
    }
  }

  clear(): void {
    this.vertices.clear();
    this.polygons.clear();
    this.edgeUse.clear();
    this.channels = createRegistry();
    this.creases.clear();
    this.seams.clear();
  }

  setOrCreateMaterial(material: HostMaterial): boolean {
    const index = this.materials.findIndex((existing) => existing.name === material.name);
    if (index >= 0) {
      this.materials[index] = cloneMaterial(material);
      return false;
    }
    this.materials.push(cloneMaterial(material));
    return true;
  }

  findChannel<K extends VertexOrCornerChannelKind>(kind: K, name: string): ChannelByKind[K] | undefined {
    const registry: Map<string, ChannelByKind[K]> = this.channels[kind];
    return registry.get(name);
  }

  findSelectionSet(name: string, elementKind: SelectionKind): SelectionChannel | undefined {
    return this.channels.selection.get(`${elementKind}/${name}`);
  }

  setOrCreateChannel<K extends ChannelKind>(kind: K, name: string, options: ChannelOptions[K]): ChannelByKind[K] {
    const registry: Map<string, ChannelByKind[K]> = this.channels[kind];
    const key = registryKey(kind, name, options);
    const existing = registry.get(key);
    if (existing) return existing;
    const created = CHANNEL_FACTORIES[kind](name, options);
    registry.set(key, created);
    return created;
  }

  setCrease(a: VertexHandle, b: VertexHandle, weight: number): void {
    this.creases.set(edgeKeyString(a, b), { edge: a <= b ? [a, b] : [b, a], weight });
  }

  markSeam(a: VertexHandle, b: VertexHandle): void {
    this.seams.set(edgeKeyString(a, b), a <= b ? [a, b] : [b, a]);
  }

  // ---- host-side conveniences ----

  selectPolygons(handles: PolygonHandle[]): void {
    for (const handle of handles) {
      const polygon = this.polygons.get(handle);
      if (polygon) polygon.selected = true;
    }
  }

  setObjectInfo(info: HostObjectInfo | null): void {
    this.objectInfo = info ? cloneObjectInfo(info) : null;
  }

  isPolygonSelected(handle: PolygonHandle): boolean {
    return this.polygons.get(handle)?.selected === true;
  }

  get vertexCount(): number {
    return this.vertices.size;
  }

  get polygonCount(): number {
    return this.polygons.size;
  }

  private updateEdgeUse(vertices: VertexHandle[], delta: number): void {
    for (let i = 0; i < vertices.length; i += 1) {
      const a = vertices[i];
      const b = vertices[(i + 1) % vertices.length];
      if (a === undefined || b === undefined || a === b) continue;
      const key = edgeKeyString(a, b);
      const next = (this.edgeUse.get(key) ?? 0) + delta;
      if (next > 0) {
        this.edgeUse.set(key, next);
      } else {
        this.edgeUse.delete(key);
      }
    }
  }
}

function toHostPolygon(handle: PolygonHandle, polygon: StoredPolygon): HostPolygon {
  return {
    handle,
    type: polygon.type,
    vertices: [...polygon.vertices],
    material: polygon.material,
  };
}

function cloneMaterial(material: HostMaterial): HostMaterial {
  return {
    name: material.name,
    diffuse: [material.diffuse[0], material.diffuse[1], material.diffuse[2]],
    texturePath: material.texturePath,
  };
}

function cloneObjectInfo({ name, transform }: HostObjectInfo): HostObjectInfo {
  const { translation: t, rotation: r, scale: s } = transform;
  return {
    name,
    transform: { translation: [t[0], t[1], t[2]], rotation: [r[0], r[1], r[2], r[3]], scale: [s[0], s[1], s[2]] },
  };
}
