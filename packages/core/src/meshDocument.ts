import { z } from "zod";
import { InvalidPayloadError } from "./errors.js";
import type { VertexHandle } from "./host.js";
import { MemoryMesh } from "./memoryMesh.js";

const Vec2Schema = z.tuple([z.number().finite(), z.number().finite()]);
const Vec3Schema = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);
const QuatSchema = z.tuple([z.number().finite(), z.number().finite(), z.number().finite(), z.number().finite()]);
const EdgeSchema = z.tuple([z.number().int(), z.number().int()]);
const UnitSchema = z.number().min(0).max(1);

const CornerValueSchema = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    polygon: z.number().int(),
    corner: z.number().int().nonnegative(),
    value,
  });

const VertexValueSchema = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    vertex: z.number().int(),
    value,
  });

export const MeshDocumentSchema = z.object({
  convention: z.enum(["RH_Yup", "LH_Zup"]),
  object: z
    .object({
      name: z.string(),
      transform: z.object({
        translation: Vec3Schema.default([0, 0, 0]),
        rotation: QuatSchema.default([0, 0, 0, 1]),
        scale: Vec3Schema.default([1, 1, 1]),
      }),
    })
    .optional(),
  vertices: z.array(z.object({ id: z.number().int(), position: Vec3Schema })),
  polygons: z.array(
    z.object({
      id: z.number().int(),
      type: z.enum(["face", "subdivision", "curve", "bezier", "patch", "text"]).default("face"),
      vertices: z.array(z.number().int()),
      material: z.string().nullable().default(null),
      selected: z.boolean().default(false),
    }),
  ),
  materials: z
    .array(z.object({ name: z.string(), diffuse: Vec3Schema, texturePath: z.string().nullable().default(null) }))
    .default([]),
  weightMaps: z.array(z.object({ name: z.string(), values: z.array(VertexValueSchema(UnitSchema)) })).default([]),
  morphMaps: z
    .array(
      z.object({
        name: z.string(),
        kind: z.enum(["relative", "absolute"]),
        values: z.array(VertexValueSchema(Vec3Schema)),
      }),
    )
    .default([]),
  uvMaps: z
    .array(z.object({ name: z.string(), primary: z.boolean().default(false), values: z.array(CornerValueSchema(Vec2Schema)) }))
    .default([]),
  colorMaps: z
    .array(
      z.object({
        name: z.string(),
        kind: z.enum(["RGB", "RGBA"]),
        values: z.array(CornerValueSchema(z.array(z.number().finite()).min(3).max(4))),
      }),
    )
    .default([]),
  selectionSets: z
    .array(
      z.object({
        name: z.string(),
        kind: z.enum(["vertex", "edge", "polygon"]),
        elements: z.array(z.number().int()).default([]),
        edges: z.array(EdgeSchema).default([]),
      }),
    )
    .default([]),
  creases: z.array(z.object({ edge: EdgeSchema, weight: UnitSchema })).default([]),
  seams: z.array(EdgeSchema).default([]),
});

export type MeshDocument = z.infer<typeof MeshDocumentSchema>;
export type MeshDocumentInput = z.input<typeof MeshDocumentSchema>;

function describeIssue(error: z.ZodError): { message: string; path: string } {
  const issue = error.issues[0];
  const path = issue ? issue.path.map((part) => (typeof part === "number" ? `[${part}]` : `.${part}`)).join("").replace(/^\./, "") : "";
  return { message: issue ? `${issue.message} at path ${path || "<root>"}` : "invalid mesh document", path };
}

function resolve(map: Map<number, number>, id: number, what: string): number {
  const handle = map.get(id);
  if (handle === undefined) {
    throw new InvalidPayloadError(`${what} references unknown id ${id}`);
  }
  return handle;
}

/** Build a host mesh from a parsed document. Ids in the document are remapped to fresh handles. */
export function loadMeshDocument(input: unknown): MemoryMesh {
  const parsed = MeshDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const { message, path } = describeIssue(parsed.error);
    throw new InvalidPayloadError(message, path);
  }
  const doc = parsed.data;
  const mesh = new MemoryMesh(doc.convention);
  if (doc.object) mesh.setObjectInfo(doc.object);

  const vertexIds = new Map<number, VertexHandle>();
  for (const vertex of doc.vertices) {
    vertexIds.set(vertex.id, mesh.createVertex(vertex.position));
  }
  const polygonIds = new Map<number, number>();
  const selected: number[] = [];
  for (const polygon of doc.polygons) {
    const handles = polygon.vertices.map((id) => resolve(vertexIds, id, `polygon ${polygon.id}`));
    const handle = mesh.addPolygon(handles, polygon.type, polygon.material);
    polygonIds.set(polygon.id, handle);
    if (polygon.selected) selected.push(handle);
  }
  mesh.selectPolygons(selected);

  for (const material of doc.materials) {
    mesh.setOrCreateMaterial(material);
  }
  for (const map of doc.weightMaps) {
    const channel = mesh.setOrCreateChannel("weight", map.name, {});
    for (const entry of map.values) channel.set(resolve(vertexIds, entry.vertex, `weight map ${map.name}`), entry.value);
  }
  for (const map of doc.morphMaps) {
    const channel = mesh.setOrCreateChannel("morph", map.name, { morphKind: map.kind });
    for (const entry of map.values) channel.set(resolve(vertexIds, entry.vertex, `morph ${map.name}`), entry.value);
  }
  for (const map of doc.uvMaps) {
    const channel = mesh.setOrCreateChannel("uv", map.name, { primary: map.primary });
    for (const entry of map.values) {
      channel.set(resolve(polygonIds, entry.polygon, `uv map ${map.name}`), entry.corner, entry.value);
    }
  }
  for (const map of doc.colorMaps) {
    const channel = mesh.setOrCreateChannel("color", map.name, { colorKind: map.kind });
    for (const entry of map.values) {
      channel.set(resolve(polygonIds, entry.polygon, `color map ${map.name}`), entry.corner, entry.value);
    }
  }
  for (const set of doc.selectionSets) {
    const channel = mesh.setOrCreateChannel("selection", set.name, { elementKind: set.kind });
    if (set.kind === "edge") {
      for (const [a, b] of set.edges) {
        channel.add([resolve(vertexIds, a, `selection set ${set.name}`), resolve(vertexIds, b, `selection set ${set.name}`)]);
      }
    } else {
      const ids = set.kind === "vertex" ? vertexIds : polygonIds;
      for (const id of set.elements) channel.add(resolve(ids, id, `selection set ${set.name}`));
    }
  }
  for (const crease of doc.creases) {
    mesh.setCrease(resolve(vertexIds, crease.edge[0], "crease"), resolve(vertexIds, crease.edge[1], "crease"), crease.weight);
  }
  for (const [a, b] of doc.seams) {
    mesh.markSeam(resolve(vertexIds, a, "seam"), resolve(vertexIds, b, "seam"));
  }
  return mesh;
}

/** Serialise a host mesh; handles are written as ids. */
export function toMeshDocument(mesh: MemoryMesh): MeshDocument {
  const vertices: MeshDocument["vertices"] = [];
  for (const id of mesh.getVertexHandles()) {
    const position = mesh.getVertexPosition(id);
    if (position) vertices.push({ id, position });
  }
  const object = mesh.getObjectInfo();
  return {
    convention: mesh.convention,
    ...(object ? { object } : {}),
    vertices,
    polygons: mesh.getPolygons().map((polygon) => ({
      id: polygon.handle,
      type: polygon.type,
      vertices: polygon.vertices,
      material: polygon.material,
      selected: mesh.isPolygonSelected(polygon.handle),
    })),
    materials: mesh.getMaterials(),
    weightMaps: mesh.getChannels("weight").map((channel) => ({
      name: channel.name,
      values: channel.entries().map(([vertex, value]) => ({ vertex, value })),
    })),
    morphMaps: mesh.getChannels("morph").map((channel) => ({
      name: channel.name,
      kind: channel.morphKind,
      values: channel.entries().map(([vertex, value]) => ({ vertex, value })),
    })),
    uvMaps: mesh.getChannels("uv").map((channel) => ({
      name: channel.name,
      primary: channel.primary,
      values: channel.entries(),
    })),
    colorMaps: mesh.getChannels("color").map((channel) => ({
      name: channel.name,
      kind: channel.colorKind,
      values: channel.entries(),
    })),
    selectionSets: mesh.getChannels("selection").map((channel) => ({
      name: channel.name,
      kind: channel.elementKind,
      elements: channel.elements(),
      edges: channel.edges(),
    })),
    creases: mesh.getCreases(),
    seams: mesh.getSeams(),
  };
}
