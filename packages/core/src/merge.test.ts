import { describe, expect, it } from "vitest";
import { decodeSnapshot, encodeSnapshot } from "./codec.js";
import { extractSnapshot } from "./extract.js";
import { MemoryMesh } from "./memoryMesh.js";
import { mergeSnapshot } from "./merge.js";
import { createEmptySnapshot, type MeshSnapshot } from "./snapshot.js";

function quadSnapshot(): MeshSnapshot {
  const snapshot = createEmptySnapshot("RH_Yup");
  snapshot.vertices = [[0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0]];
  snapshot.polygons = [{ vertices: [0, 1, 2, 3], material: null, isSubdivisionSurface: false, origin: "regular" }];
  return snapshot;
}

function meshWithTriangle(convention: "RH_Yup" | "LH_Zup" = "RH_Yup") {
  const mesh = new MemoryMesh(convention);
  mesh.createVertex([5, 5, 5]);
  mesh.createVertex([6, 5, 5]);
  mesh.createVertex([5, 6, 5]);
  mesh.createPolygon([0, 1, 2], null, false);
  return mesh;
}

describe("mergeSnapshot", () => {
  it("appends geometry after the existing elements", () => {
    const mesh = meshWithTriangle();
    const summary = mergeSnapshot(quadSnapshot(), { kind: "existing", mesh });

    expect(summary.verticesAdded).toBe(4);
    expect(summary.polygonsAdded).toBe(1);
    expect(summary.vertexHandles).toEqual([3, 4, 5, 6]);
    expect(mesh.vertexCount).toBe(7);
    expect(mesh.getPolygons().map((polygon) => polygon.vertices)).toEqual([[0, 1, 2], [3, 4, 5, 6]]);
  });

  it("never welds coincident vertices", () => {
    const mesh = new MemoryMesh("RH_Yup");
    mergeSnapshot(quadSnapshot(), { kind: "existing", mesh });
    mergeSnapshot(quadSnapshot(), { kind: "existing", mesh });
    expect(mesh.vertexCount).toBe(8);
    expect(mesh.polygonCount).toBe(2);
  });

  it("reuses a same-name material and appends a new one once", () => {
    const mesh = meshWithTriangle();
    mesh.setOrCreateMaterial({ name: "Skin", diffuse: [1, 1, 1], texturePath: null });
    const snapshot = quadSnapshot();
    snapshot.materials = [
      { name: "Skin", diffuse: [0.9, 0.7, 0.6], texturePath: "skin.png" },
      { name: "Hair", diffuse: [0.1, 0.1, 0.1], texturePath: null },
    ];
    snapshot.polygons = [{ vertices: [0, 1, 2, 3], material: 1, isSubdivisionSurface: true, origin: "regular" }];

    const summary = mergeSnapshot(snapshot, { kind: "existing", mesh });

    expect(summary.materials).toEqual({ created: ["Hair"], reused: ["Skin"] });
    expect(mesh.getMaterials()).toEqual([
      { name: "Skin", diffuse: [0.9, 0.7, 0.6], texturePath: "skin.png" },
      { name: "Hair", diffuse: [0.1, 0.1, 0.1], texturePath: null },
    ]);
    const added = mesh.getPolygons()[1];
    expect(added?.material).toBe("Hair");
    expect(added?.type).toBe("subdivision");
  });

  it("converts positions into the target convention", () => {
    const mesh = new MemoryMesh("LH_Zup");
    mergeSnapshot(quadSnapshot(), { kind: "existing", mesh });
    expect(mesh.getVertexHandles().map((handle) => mesh.getVertexPosition(handle))).toEqual([
      [0, 0, 0],
      [1, 0, 0],
      [1, 0, 1],
      [0, 0, 1],
    ]);
  });

  it("extends same-name channels and creates missing ones", () => {
    const mesh = meshWithTriangle();
    const weights = mesh.setOrCreateChannel("weight", "Bone", {});
    weights.set(0, 0.2);
    const snapshot = quadSnapshot();
    snapshot.weightMaps = [
      { name: "Bone", values: [{ vertex: 1, value: 0.8 }] },
      { name: "Fresh", values: [{ vertex: 0, value: 1 }] },
    ];

    const summary = mergeSnapshot(snapshot, { kind: "existing", mesh });

    expect(summary.channels).toEqual({ created: ["weight:Fresh"], merged: ["weight:Bone"] });
    expect(weights.entries()).toEqual([[0, 0.2], [4, 0.8]]);
    expect(mesh.findChannel("weight", "Fresh")?.entries()).toEqual([[3, 1]]);
  });

  it("keeps the target's primary uv map and fits colors to the target kind", () => {
    const mesh = meshWithTriangle();
    mesh.setOrCreateChannel("uv", "UVMap", { primary: true });
    mesh.setOrCreateChannel("color", "Col", { colorKind: "RGB" });
    const snapshot = quadSnapshot();
    snapshot.uvMaps = [{ name: "Other", primary: true, values: [{ polygon: 0, corner: 1, value: [0.5, 0.25] }] }];
    snapshot.colorMaps = [
      { name: "Col", kind: "RGBA", values: [{ polygon: 0, corner: 0, value: [1, 0.5, 0, 0.2] }] },
      { name: "Tint", kind: "RGB", values: [{ polygon: 0, corner: 2, value: [0, 0, 1] }] },
    ];

    mergeSnapshot(snapshot, { kind: "existing", mesh });

    const other = mesh.findChannel("uv", "Other");
    expect(other?.primary).toBe(false);
    expect(other?.get(1, 1)).toEqual([0.5, 0.25]);
    expect(mesh.findChannel("color", "Col")?.get(1, 0)).toEqual([1, 0.5, 0]);
    expect(mesh.findChannel("color", "Tint")?.colorKind).toBe("RGB");
  });

  it("marks a new uv map primary when the target has none", () => {
    const mesh = new MemoryMesh("RH_Yup");
    const snapshot = quadSnapshot();
    snapshot.uvMaps = [{ name: "UVMap", primary: true, values: [] }];
    mergeSnapshot(snapshot, { kind: "existing", mesh });
    expect(mesh.findChannel("uv", "UVMap")?.primary).toBe(true);
  });

  it("replaces same-name morph data for the new vertices, converting between kinds", () => {
    const mesh = new MemoryMesh("LH_Zup");
    const existing = mesh.setOrCreateChannel("morph", "Smile", { morphKind: "absolute" });
    const snapshot = quadSnapshot();
    snapshot.morphs = [{ name: "Smile", kind: "relative", values: [{ vertex: 2, value: [0, 0.5, 0] }] }];

    mergeSnapshot(snapshot, { kind: "existing", mesh });

    // vertex 2 lands at (1, 0, 1); the Y-up delta becomes +Z
    expect(existing.entries()).toEqual([[2, [1, 0, 1.5]]]);
  });

  it("applies creases only to edges the target has", () => {
    const mesh = new MemoryMesh("RH_Yup");
    const snapshot = quadSnapshot();
    snapshot.subdivisionWeights = [
      { edge: [0, 1], weight: 0.5 },
      { edge: [0, 2], weight: 0.9 },
    ];
    const summary = mergeSnapshot(snapshot, { kind: "existing", mesh });
    expect(summary.creases).toEqual({ applied: 1, skipped: 1 });
    expect(mesh.getCreases()).toEqual([{ edge: [0, 1], weight: 0.5 }]);
  });

  it("replaces existing freestyle edges and merges other sets", () => {
    const mesh = meshWithTriangle();
    const freestyle = mesh.setOrCreateChannel("selection", "_Freestyle", { elementKind: "edge" });
    freestyle.add([0, 1]);
    const group = mesh.setOrCreateChannel("selection", "Group", { elementKind: "vertex" });
    group.add(2);
    const snapshot = quadSnapshot();
    snapshot.selectionSets = [
      { name: "_Freestyle", kind: "edge", edges: [[2, 3], [0, 2]] },
      { name: "Group", kind: "vertex", elements: [0] },
      { name: "Faces", kind: "polygon", elements: [0] },
    ];

    const summary = mergeSnapshot(snapshot, { kind: "existing", mesh });

    expect(freestyle.edges()).toEqual([[5, 6]]);
    expect(group.elements()).toEqual([2, 3]);
    expect(mesh.findSelectionSet("Faces", "polygon")?.elements()).toEqual([1]);
    expect(summary.channels.merged).toEqual(["selection/edge:_Freestyle", "selection/vertex:Group"]);
    expect(summary.channels.created).toEqual(["selection/polygon:Faces"]);
  });

  it("marks seams from the primary edge set, else from _Seam", () => {
    const mesh = new MemoryMesh("RH_Yup");
    const snapshot = quadSnapshot();
    snapshot.selectionSets = [
      { name: "_Seam", kind: "edge", edges: [[0, 1]] },
      { name: "Cuts", kind: "edge", edges: [[1, 2], [1, 3]], primary: true },
    ];
    const summary = mergeSnapshot(snapshot, { kind: "existing", mesh });
    expect(summary.seams).toEqual({ marked: 1, skipped: 1 });
    expect(mesh.getSeams()).toEqual([[1, 2]]);

    const fallback = new MemoryMesh("RH_Yup");
    const named = quadSnapshot();
    named.selectionSets = [{ name: "_Seam", kind: "edge", edges: [[3, 0]] }];
    mergeSnapshot(named, { kind: "existing", mesh: fallback });
    expect(fallback.getSeams()).toEqual([[0, 3]]);
  });

  it("empties the target first in replace mode", () => {
    const mesh = meshWithTriangle();
    mesh.setOrCreateMaterial({ name: "Skin", diffuse: [1, 1, 1], texturePath: null });
    mesh.setOrCreateChannel("weight", "Old", {}).set(0, 1);

    const summary = mergeSnapshot(quadSnapshot(), { kind: "replace", mesh });

    expect(summary.vertexHandles).toEqual([3, 4, 5, 6]);
    expect(mesh.vertexCount).toBe(4);
    expect(mesh.polygonCount).toBe(1);
    expect(mesh.getChannels("weight")).toEqual([]);
    expect(mesh.getMaterials().map((material) => material.name)).toEqual(["Skin"]);
  });

  it("reproduces copied positions when pasted back through another convention", () => {
    const mesh = new MemoryMesh("RH_Yup");
    const positions: Array<[number, number, number]> = [
      [0.123456, -2.5, 3.75],
      [1.000001, 0.333333, -7],
      [-4.2, 9.99, 0.5],
      [2, 2, 2],
    ];
    for (const position of positions) mesh.createVertex(position);
    const polygon = mesh.createPolygon([0, 1, 2], null, false);
    mesh.createPolygon([1, 3, 2], null, false);
    mesh.selectPolygons([polygon]);

    const { snapshot } = extractSnapshot(mesh, { mode: "selected", convention: "LH_Zup" });
    const summary = mergeSnapshot(decodeSnapshot(encodeSnapshot(snapshot)), { kind: "existing", mesh });

    expect(summary.vertexHandles).toEqual([4, 5, 6]);
    summary.vertexHandles.forEach((handle, id) => {
      const original = positions[id] ?? [0, 0, 0];
      const pasted = mesh.getVertexPosition(handle) ?? [NaN, NaN, NaN];
      pasted.forEach((value, axis) => expect(Math.abs(value - (original[axis] ?? 0))).toBeLessThan(1e-6));
    });
    expect(mesh.getPolygons().at(-1)?.vertices).toEqual([4, 5, 6]);
  });
});
