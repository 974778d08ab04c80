import {
  convertObjectTransform,
  createCoordinateTransform,
  type CoordinateConvention,
  type Vec2,
  type Vec3,
} from "./coordinates.js";
import { ExtractionError } from "./errors.js";
import type { HostMaterial, HostMeshReader, HostPolygon, PolygonHandle, VertexHandle } from "./host.js";
import {
  SEAM_SET_NAME,
  createEmptySnapshot,
  edgeKey,
  edgeKeyString,
  fitColor,
  type CornerEntry,
  type EdgeKey,
  type MeshSnapshot,
  type SelectionSet,
  type SnapshotMaterial,
  type SnapshotPolygon,
} from "./snapshot.js";
import { isRegularPolygon, triangulatePolygon } from "./triangulate.js";

export type ExtractionMode = "selected" | "whole";

export interface ExtractOptions {
  mode: ExtractionMode;
  /** Convention the snapshot is written in. Defaults to the host's own. */
  convention?: CoordinateConvention;
  sourceApp?: string;
  now?: () => Date;
}

/** Host elements the snapshot was taken from, indexed by snapshot id. Used by Cut. */
export interface ExtractionSource {
  vertexHandles: VertexHandle[];
  polygonHandles: PolygonHandle[];
}

export interface ExtractionResult {
  snapshot: MeshSnapshot;
  source: ExtractionSource;
  issues: ExtractionError[];
}

export const DEFAULT_DIFFUSE: Vec3 = [0.8, 0.8, 0.8];

const ORIGIN: Vec3 = [0, 0, 0];

const EXPORTABLE_TYPES = new Set(["face", "subdivision"]);

/** Where each snapshot polygon's corners live on the host. */
interface CornerOrigin {
  handle: PolygonHandle;
  corners: number[];
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function acceptPolygons(
  mesh: HostMeshReader,
  polygons: HostPolygon[],
  issues: ExtractionError[],
): HostPolygon[] {
  const accepted: HostPolygon[] = [];
  for (const polygon of polygons) {
    if (!EXPORTABLE_TYPES.has(polygon.type)) {
      issues.push(new ExtractionError(`polygon ${polygon.handle} has unsupported type "${polygon.type}"; skipped`));
      continue;
    }
    if (polygon.vertices.some((vertex) => mesh.getVertexPosition(vertex) === undefined)) {
      issues.push(new ExtractionError(`polygon ${polygon.handle} references a missing vertex; skipped`));
      continue;
    }
    if (new Set(polygon.vertices).size < 3) {
      issues.push(new ExtractionError(`polygon ${polygon.handle} has fewer than 3 distinct vertices; skipped`));
      continue;
    }
    accepted.push(polygon);
  }
  return accepted;
}

/**
 * Read the host's selection into a self-contained snapshot.
 *
 * Vertex ids are renumbered densely in ascending host-handle order. Data that
 * refers to elements outside the extracted subset is dropped, and unsupported
 * host elements are reported in `issues` rather than failing the export.
 */
export function extractSnapshot(mesh: HostMeshReader, options: ExtractOptions): ExtractionResult {
  const issues: ExtractionError[] = [];
  const convention = options.convention ?? mesh.convention;
  const transform = createCoordinateTransform(mesh.convention, convention);

  let candidates = options.mode === "selected" ? mesh.getSelectedPolygons() : mesh.getPolygons();
  let whole = options.mode === "whole";
  if (options.mode === "selected" && candidates.length === 0) {
    candidates = mesh.getPolygons();
    whole = true;
  }
  const polygons = acceptPolygons(mesh, candidates, issues);

  const vertexHandles = whole
    ? mesh.getVertexHandles()
    : [...new Set(polygons.flatMap((polygon) => polygon.vertices))].sort((a, b) => a - b);
  const vertexIds = new Map<VertexHandle, number>();
  vertexHandles.forEach((handle, id) => vertexIds.set(handle, id));

  const snapshot = createEmptySnapshot(convention);
  const object = mesh.getObjectInfo();
  snapshot.metadata = {
    sourceApp: options.sourceApp ?? "meshbridge",
    timestamp: (options.now ?? (() => new Date()))().toISOString(),
    unitScale: 1,
    ...(object
      ? { object: { name: object.name, transform: convertObjectTransform(object.transform, mesh.convention, convention) } }
      : {}),
  };

  const hostPositions = new Map<VertexHandle, Vec3>();
  for (const handle of vertexHandles) {
    const position = mesh.getVertexPosition(handle);
    if (!position) continue;
    hostPositions.set(handle, position);
    snapshot.vertices.push(transform.toExchange(position));
  }

  const materialIndex = new Map<string, number>();
  const hostMaterials = new Map(mesh.getMaterials().map((material): [string, HostMaterial] => [material.name, material]));
  const resolveMaterial = (name: string | null): number | null => {
    if (name === null) return null;
    const known = materialIndex.get(name);
    if (known !== undefined) return known;
    const host = hostMaterials.get(name);
    let material: SnapshotMaterial = { name, diffuse: [...DEFAULT_DIFFUSE], texturePath: null };
    if (host) {
      const diffuse: Vec3 = [clampUnit(host.diffuse[0]), clampUnit(host.diffuse[1]), clampUnit(host.diffuse[2])];
      if (diffuse.some((value, channel) => value !== host.diffuse[channel])) {
        issues.push(new ExtractionError(`material "${name}": diffuse clamped to [0, 1]`));
      }
      material = { name, diffuse, texturePath: host.texturePath };
    }
    snapshot.materials.push(material);
    materialIndex.set(name, snapshot.materials.length - 1);
    return snapshot.materials.length - 1;
  };

  const cornerOrigins: CornerOrigin[] = [];
  const polygonIds = new Map<PolygonHandle, number[]>();
  const exportedHandles: PolygonHandle[] = [];

  for (const polygon of polygons) {
    const ids = polygon.vertices.map((vertex) => vertexIds.get(vertex) ?? -1);
    const points = polygon.vertices.map((vertex) => hostPositions.get(vertex) ?? ORIGIN);
    const base = {
      material: resolveMaterial(polygon.material),
      isSubdivisionSurface: polygon.type === "subdivision",
    };
    const created: number[] = [];

    if (isRegularPolygon(polygon.vertices, points)) {
      const entry: SnapshotPolygon = { ...base, vertices: ids, origin: "regular" };
      snapshot.polygons.push(entry);
      cornerOrigins.push({ handle: polygon.handle, corners: ids.map((_, corner) => corner) });
      created.push(snapshot.polygons.length - 1);
    } else {
      const triangles = triangulatePolygon(polygon.vertices, points);
      if (triangles.length === 0) {
        issues.push(new ExtractionError(`polygon ${polygon.handle} could not be triangulated; skipped`));
        continue;
      }
      for (const corners of triangles) {
        snapshot.polygons.push({
          ...base,
          vertices: corners.map((corner) => ids[corner] ?? -1),
          origin: "triangulatedFromIrregular",
        });
        cornerOrigins.push({ handle: polygon.handle, corners });
        created.push(snapshot.polygons.length - 1);
      }
    }
    polygonIds.set(polygon.handle, created);
    exportedHandles.push(polygon.handle);
  }

  const readCorners = <T>(get: (polygon: PolygonHandle, corner: number) => T | undefined, copy: (value: T) => T) => {
    const values: CornerEntry<T>[] = [];
    cornerOrigins.forEach((origin, polygon) => {
      origin.corners.forEach((hostCorner, corner) => {
        const value = get(origin.handle, hostCorner);
        if (value !== undefined) values.push({ polygon, corner, value: copy(value) });
      });
    });
    return values;
  };

  let primaryTaken = false;
  for (const channel of mesh.getChannels("uv")) {
    const primary: boolean = channel.primary && !primaryTaken;
    primaryTaken ||= primary;
    snapshot.uvMaps.push({
      name: channel.name,
      primary,
      values: readCorners((p, c) => channel.get(p, c), (uv): Vec2 => [uv[0], uv[1]]),
    });
  }
  const firstUV = snapshot.uvMaps[0];
  if (!primaryTaken && firstUV) firstUV.primary = true;

  for (const channel of mesh.getChannels("color")) {
    snapshot.colorMaps.push({
      name: channel.name,
      kind: channel.colorKind,
      values: readCorners((p, c) => channel.get(p, c), (color) => fitColor(color, channel.colorKind)),
    });
  }

  for (const channel of mesh.getChannels("weight")) {
    let clamped = 0;
    const values: Array<{ vertex: number; value: number }> = [];
    for (const [handle, weight] of channel.entries()) {
      const vertex = vertexIds.get(handle);
      if (vertex === undefined) continue;
      const value = clampUnit(weight);
      if (value !== weight) clamped += 1;
      values.push({ vertex, value });
    }
    if (clamped > 0) {
      issues.push(new ExtractionError(`weight map "${channel.name}": ${clamped} weights clamped to [0, 1]`));
    }
    snapshot.weightMaps.push({ name: channel.name, values: values.sort((a, b) => a.vertex - b.vertex) });
  }

  for (const channel of mesh.getChannels("morph")) {
    const values: Array<{ vertex: number; value: Vec3 }> = [];
    for (const [handle, value] of channel.entries()) {
      const vertex = vertexIds.get(handle);
      if (vertex === undefined) continue;
      values.push({ vertex, value: transform.toExchange(value) });
    }
    snapshot.morphs.push({ name: channel.name, kind: channel.morphKind, values: values.sort((a, b) => a.vertex - b.vertex) });
  }

  const mapEdge = ([a, b]: [VertexHandle, VertexHandle]): EdgeKey | null => {
    const ia = vertexIds.get(a);
    const ib = vertexIds.get(b);
    if (ia === undefined || ib === undefined || ia === ib) return null;
    return edgeKey(ia, ib);
  };

  for (const crease of mesh.getCreases()) {
    const edge = mapEdge(crease.edge);
    if (edge) snapshot.subdivisionWeights.push({ edge, weight: clampUnit(crease.weight) });
  }

  for (const channel of mesh.getChannels("selection")) {
    let set: SelectionSet;
    if (channel.elementKind === "edge") {
      set = { name: channel.name, kind: "edge", edges: collectEdges(channel.edges().map(mapEdge)) };
    } else if (channel.elementKind === "vertex") {
      const elements = channel.elements().flatMap((handle) => {
        const id = vertexIds.get(handle);
        return id === undefined ? [] : [id];
      });
      set = { name: channel.name, kind: "vertex", elements: elements.sort((a, b) => a - b) };
    } else {
      const elements = channel.elements().flatMap((handle) => polygonIds.get(handle) ?? []);
      set = { name: channel.name, kind: "polygon", elements: elements.sort((a, b) => a - b) };
    }
    snapshot.selectionSets.push(set);
  }

  const seamEdges = collectEdges(mesh.getSeams().map(mapEdge));
  if (seamEdges.length > 0) {
    const existing = snapshot.selectionSets.find((set) => set.kind === "edge" && set.name === SEAM_SET_NAME);
    if (existing && existing.kind === "edge") {
      existing.edges = collectEdges([...existing.edges, ...seamEdges]);
    } else {
      snapshot.selectionSets.push({ name: SEAM_SET_NAME, kind: "edge", edges: seamEdges });
    }
  }

  return {
    snapshot,
    source: { vertexHandles, polygonHandles: exportedHandles },
    issues,
  };
}

function collectEdges(edges: Array<EdgeKey | null>): EdgeKey[] {
  const seen = new Map<string, EdgeKey>();
  for (const edge of edges) {
    if (edge) seen.set(edgeKeyString(edge[0], edge[1]), edge);
  }
  return [...seen.values()].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
}
