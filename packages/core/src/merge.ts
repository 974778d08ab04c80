import { createCoordinateTransform, type Vec3 } from "./coordinates.js";
import type { HostMesh, PolygonHandle, SelectionChannel, VertexHandle } from "./host.js";
import {
  FREESTYLE_SET_NAME,
  findSeamSet,
  fitColor,
  type EdgeKey,
  type MeshSnapshot,
  type MorphKind,
  type SelectionSet,
} from "./snapshot.js";

/**
 * `existing` appends into the mesh as it is; `replace` empties the mesh first
 * (New Mesh from Clipboard) and then appends.
 */
export type MergeTarget =
  | { kind: "existing"; mesh: HostMesh }
  | { kind: "replace"; mesh: HostMesh };

export interface MergeSummary {
  verticesAdded: number;
  polygonsAdded: number;
  materials: { created: string[]; reused: string[] };
  /** Entries are `kind:name`, e.g. `uv:UVMap` or `selection/edge:_Freestyle`. */
  channels: { created: string[]; merged: string[] };
  creases: { applied: number; skipped: number };
  seams: { marked: number; skipped: number };
  /** Host handles of the appended elements, indexed by snapshot id. */
  vertexHandles: VertexHandle[];
  polygonHandles: PolygonHandle[];
}

function addVec(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

function subVec(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/** Re-express a morph value for a channel of the other kind, against the vertex's base position. */
function convertMorphValue(value: Vec3, from: MorphKind, to: MorphKind, base: Vec3): Vec3 {
  if (from === to) return value;
  return from === "relative" ? addVec(base, value) : subVec(value, base);
}

/**
 * Apply a decoded snapshot to a host mesh.
 *
 * Geometry is always appended, never welded to existing vertices. Materials
 * and channels are matched to existing ones by exact, case-sensitive name;
 * a match is reused and extended, no match creates a new one.
 */
export function mergeSnapshot(snapshot: MeshSnapshot, target: MergeTarget): MergeSummary {
  const mesh = target.mesh;
  if (target.kind === "replace") {
    mesh.clear();
  }
  const transform = createCoordinateTransform(mesh.convention, snapshot.coordinateConvention);
  const summary: MergeSummary = {
    verticesAdded: 0,
    polygonsAdded: 0,
    materials: { created: [], reused: [] },
    channels: { created: [], merged: [] },
    creases: { applied: 0, skipped: 0 },
    seams: { marked: 0, skipped: 0 },
    vertexHandles: [],
    polygonHandles: [],
  };
  const noteChannel = (label: string, created: boolean) => {
    (created ? summary.channels.created : summary.channels.merged).push(label);
  };

  for (const material of snapshot.materials) {
    const created = mesh.setOrCreateMaterial({
      name: material.name,
      diffuse: [material.diffuse[0], material.diffuse[1], material.diffuse[2]],
      texturePath: material.texturePath,
    });
    (created ? summary.materials.created : summary.materials.reused).push(material.name);
  }

  const hostPositions = snapshot.vertices.map((position) => transform.toHost(position));
  const vertexHandles = hostPositions.map((position) => mesh.createVertex(position));
  const polygonHandles = snapshot.polygons.map((polygon) => {
    const material = polygon.material === null ? null : snapshot.materials[polygon.material]?.name ?? null;
    return mesh.createPolygon(
      polygon.vertices.map((id) => vertexHandles[id] ?? -1),
      material,
      polygon.isSubdivisionSurface,
    );
  });
  summary.vertexHandles = vertexHandles;
  summary.polygonHandles = polygonHandles;
  summary.verticesAdded = vertexHandles.length;
  summary.polygonsAdded = polygonHandles.length;

  const targetHasPrimaryUV = mesh.getChannels("uv").some((channel) => channel.primary);
  for (const uvMap of snapshot.uvMaps) {
    const existing = mesh.findChannel("uv", uvMap.name);
    const channel = existing ?? mesh.setOrCreateChannel("uv", uvMap.name, { primary: uvMap.primary && !targetHasPrimaryUV });
    noteChannel(`uv:${uvMap.name}`, !existing);
    for (const entry of uvMap.values) {
      const polygon = polygonHandles[entry.polygon];
      if (polygon !== undefined) channel.set(polygon, entry.corner, [entry.value[0], entry.value[1]]);
    }
  }

  for (const colorMap of snapshot.colorMaps) {
    const existing = mesh.findChannel("color", colorMap.name);
    const channel = existing ?? mesh.setOrCreateChannel("color", colorMap.name, { colorKind: colorMap.kind });
    noteChannel(`color:${colorMap.name}`, !existing);
    for (const entry of colorMap.values) {
      const polygon = polygonHandles[entry.polygon];
      if (polygon !== undefined) channel.set(polygon, entry.corner, fitColor(entry.value, channel.colorKind));
    }
  }

  for (const weightMap of snapshot.weightMaps) {
    const existing = mesh.findChannel("weight", weightMap.name);
    const channel = existing ?? mesh.setOrCreateChannel("weight", weightMap.name, {});
    noteChannel(`weight:${weightMap.name}`, !existing);
    for (const entry of weightMap.values) {
      const vertex = vertexHandles[entry.vertex];
      if (vertex !== undefined) channel.set(vertex, entry.value);
    }
  }

  for (const morph of snapshot.morphs) {
    const existing = mesh.findChannel("morph", morph.name);
    const channel = existing ?? mesh.setOrCreateChannel("morph", morph.name, { morphKind: morph.kind });
    noteChannel(`morph:${morph.name}`, !existing);
    for (const entry of morph.values) {
      const vertex = vertexHandles[entry.vertex];
      const base = hostPositions[entry.vertex];
      if (vertex === undefined || base === undefined) continue;
      channel.set(vertex, convertMorphValue(transform.toHost(entry.value), morph.kind, channel.morphKind, base));
    }
  }

  const toHostEdge = ([a, b]: EdgeKey): [VertexHandle, VertexHandle] | null => {
    const ha = vertexHandles[a];
    const hb = vertexHandles[b];
    if (ha === undefined || hb === undefined || !mesh.hasEdge(ha, hb)) return null;
    return [ha, hb];
  };

  for (const crease of snapshot.subdivisionWeights) {
    const edge = toHostEdge(crease.edge);
    if (!edge) {
      summary.creases.skipped += 1;
      continue;
    }
    mesh.setCrease(edge[0], edge[1], crease.weight);
    summary.creases.applied += 1;
  }

  for (const set of snapshot.selectionSets) {
    const existing = mesh.findSelectionSet(set.name, set.kind);
    const channel = existing ?? mesh.setOrCreateChannel("selection", set.name, { elementKind: set.kind });
    noteChannel(`selection/${set.kind}:${set.name}`, !existing);
    fillSelection(channel, set, vertexHandles, polygonHandles, toHostEdge);
  }

  const seamSet = findSeamSet(snapshot);
  if (seamSet) {
    for (const key of seamSet.edges) {
      const edge = toHostEdge(key);
      if (!edge) {
        summary.seams.skipped += 1;
        continue;
      }
      mesh.markSeam(edge[0], edge[1]);
      summary.seams.marked += 1;
    }
  }

  return summary;
}

function fillSelection(
  channel: SelectionChannel,
  set: SelectionSet,
  vertexHandles: VertexHandle[],
  polygonHandles: PolygonHandle[],
  toHostEdge: (edge: EdgeKey) => [VertexHandle, VertexHandle] | null,
): void {
  if (set.kind === "edge") {
    if (set.name === FREESTYLE_SET_NAME) {
      channel.clear();
    }
    for (const key of set.edges) {
      const edge = toHostEdge(key);
      if (edge) channel.add(edge);
    }
    return;
  }
  const handles = set.kind === "vertex" ? vertexHandles : polygonHandles;
  for (const id of set.elements) {
    const handle = handles[id];
    if (handle !== undefined) channel.add(handle);
  }
}
