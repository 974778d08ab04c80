import { z } from "zod";
import { InvalidPayloadError, MalformedReferenceError } from "./errors.js";
import { edgeKey, type MeshSnapshot } from "./snapshot.js";

const finite = () => z.number().finite();
// range is checked against the snapshot itself, so negatives surface as bad references
const index = () => z.number().int();
const unit = () => z.number().min(0).max(1);

const Vec2Schema = z.tuple([finite(), finite()]);
const Vec3Schema = z.tuple([finite(), finite(), finite()]);
const QuatSchema = z.tuple([finite(), finite(), finite(), finite()]);
const EdgeSchema = z.tuple([index(), index()]);

const VertexEntrySchema = <T extends z.ZodTypeAny>(value: T) => z.object({ vertex: index(), value });
const CornerEntrySchema = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ polygon: index(), corner: index(), value });

const PolygonSchema = z.object({
  vertices: z.array(index()).min(3),
  material: index().nullable().default(null),
  isSubdivisionSurface: z.boolean().default(false),
  origin: z.enum(["regular", "triangulatedFromIrregular"]),
});

const MaterialSchema = z.object({
  name: z.string(),
  diffuse: z.tuple([unit(), unit(), unit()]),
  texturePath: z.string().nullable().default(null),
});

const MetadataSchema = z.object({
  sourceApp: z.string(),
  timestamp: z.string(),
  unitScale: finite().positive().optional(),
  object: z
    .object({
      name: z.string(),
      transform: z.object({ translation: Vec3Schema, rotation: QuatSchema, scale: Vec3Schema }),
    })
    .optional(),
});

const SelectionSetSchema = z.discriminatedUnion("kind", [
  z.object({ name: z.string(), kind: z.literal("vertex"), elements: z.array(index()) }),
  z.object({ name: z.string(), kind: z.literal("polygon"), elements: z.array(index()) }),
  z.object({
    name: z.string(),
    kind: z.literal("edge"),
    edges: z.array(EdgeSchema),
    primary: z.boolean().optional(),
  }),
]);

/** Wire layout of the latest schema version. Unknown top-level keys are stripped. */
export const SnapshotPayloadSchema = z.object({
  schemaVersion: z.number().int(),
  coordinateConvention: z.enum(["RH_Yup", "LH_Zup"]),
  metadata: MetadataSchema.optional(),
  vertices: z.array(Vec3Schema).default([]),
  polygons: z.array(PolygonSchema).default([]),
  materials: z.array(MaterialSchema).default([]),
  uvMaps: z
    .array(z.object({ name: z.string(), primary: z.boolean().default(false), values: z.array(CornerEntrySchema(Vec2Schema)) }))
    .default([]),
  colorMaps: z
    .array(
      z.object({
        name: z.string(),
        kind: z.enum(["RGB", "RGBA"]),
        values: z.array(CornerEntrySchema(z.array(finite()))),
      }),
    )
    .default([]),
  weightMaps: z.array(z.object({ name: z.string(), values: z.array(VertexEntrySchema(unit())) })).default([]),
  morphs: z
    .array(
      z.object({
        name: z.string(),
        kind: z.enum(["relative", "absolute"]),
        values: z.array(VertexEntrySchema(Vec3Schema)),
      }),
    )
    .default([]),
  subdivisionWeights: z.array(z.object({ edge: EdgeSchema, weight: unit() })).default([]),
  selectionSets: z.array(SelectionSetSchema).default([]),
});

export type SnapshotPayload = z.infer<typeof SnapshotPayloadSchema>;

function formatPath(path: Array<string | number>): string {
  return path
    .map((part) => (typeof part === "number" ? `[${part}]` : `.${part}`))
    .join("")
    .replace(/^\./, "");
}

/**
 * Shape-check a migrated payload and turn it into a snapshot. References are
 * not checked here; see `validateSnapshotReferences`.
 */
export function parseSnapshotPayload(value: unknown): MeshSnapshot {
  const parsed = SnapshotPayloadSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue ? formatPath(issue.path) : "";
    throw new InvalidPayloadError(`${issue?.message ?? "invalid payload"} at path ${path || "<root>"}`, path);
  }
  const data = parsed.data;
  return {
    ...data,
    subdivisionWeights: data.subdivisionWeights.map(({ edge, weight }) => ({ edge: edgeKey(edge[0], edge[1]), weight })),
    selectionSets: data.selectionSets.map((set) =>
      set.kind === "edge" ? { ...set, edges: set.edges.map(([a, b]) => edgeKey(a, b)) } : set,
    ),
  };
}

function inRange(value: number, count: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < count;
}

/**
 * Every id a snapshot holds must point at an element of the same snapshot.
 * Throws on the first violation.
 */
export function validateSnapshotReferences(snapshot: MeshSnapshot): void {
  const vertexCount = snapshot.vertices.length;
  const polygonCount = snapshot.polygons.length;

  const checkVertex = (vertex: number, path: string) => {
    if (!inRange(vertex, vertexCount)) {
      throw new MalformedReferenceError(`vertex id ${vertex} is out of range [0, ${vertexCount})`, path);
    }
  };
  const checkEdge = ([a, b]: [number, number], path: string) => {
    checkVertex(a, `${path}[0]`);
    checkVertex(b, `${path}[1]`);
    if (a === b) throw new MalformedReferenceError(`edge joins vertex ${a} to itself`, path);
  };
  const checkCorner = (polygon: number, corner: number, path: string) => {
    const target = snapshot.polygons[polygon];
    if (!target || !inRange(polygon, polygonCount)) {
      throw new MalformedReferenceError(`polygon id ${polygon} is out of range [0, ${polygonCount})`, `${path}.polygon`);
    }
    if (!inRange(corner, target.vertices.length)) {
      throw new MalformedReferenceError(
        `corner ${corner} is out of range for polygon ${polygon} with ${target.vertices.length} vertices`,
        `${path}.corner`,
      );
    }
  };

  snapshot.polygons.forEach((polygon, i) => {
    polygon.vertices.forEach((vertex, j) => checkVertex(vertex, `polygons[${i}].vertices[${j}]`));
    if (new Set(polygon.vertices).size !== polygon.vertices.length) {
      throw new MalformedReferenceError(`polygon ${i} repeats a vertex`, `polygons[${i}].vertices`);
    }
    if (polygon.material !== null && !inRange(polygon.material, snapshot.materials.length)) {
      throw new MalformedReferenceError(
        `material index ${polygon.material} is out of range [0, ${snapshot.materials.length})`,
        `polygons[${i}].material`,
      );
    }
  });

  if (snapshot.uvMaps.filter((uvMap) => uvMap.primary).length > 1) {
    throw new InvalidPayloadError("at most one uv map can be primary", "uvMaps");
  }
  snapshot.uvMaps.forEach((uvMap, i) => {
    uvMap.values.forEach((entry, j) => checkCorner(entry.polygon, entry.corner, `uvMaps[${i}].values[${j}]`));
  });

  snapshot.colorMaps.forEach((colorMap, i) => {
    const size = colorMap.kind === "RGBA" ? 4 : 3;
    colorMap.values.forEach((entry, j) => {
      checkCorner(entry.polygon, entry.corner, `colorMaps[${i}].values[${j}]`);
      if (entry.value.length !== size) {
        throw new InvalidPayloadError(
          `${colorMap.kind} color must have ${size} components`,
          `colorMaps[${i}].values[${j}].value`,
        );
      }
    });
  });

  snapshot.weightMaps.forEach((weightMap, i) => {
    weightMap.values.forEach((entry, j) => checkVertex(entry.vertex, `weightMaps[${i}].values[${j}].vertex`));
  });
  snapshot.morphs.forEach((morph, i) => {
    morph.values.forEach((entry, j) => checkVertex(entry.vertex, `morphs[${i}].values[${j}].vertex`));
  });
  snapshot.subdivisionWeights.forEach((crease, i) => checkEdge(crease.edge, `subdivisionWeights[${i}].edge`));

  snapshot.selectionSets.forEach((set, i) => {
    if (set.kind === "edge") {
      set.edges.forEach((edge, j) => checkEdge(edge, `selectionSets[${i}].edges[${j}]`));
      return;
    }
    const count = set.kind === "vertex" ? vertexCount : polygonCount;
    set.elements.forEach((element, j) => {
      if (!inRange(element, count)) {
        throw new MalformedReferenceError(
          `${set.kind} id ${element} is out of range [0, ${count})`,
          `selectionSets[${i}].elements[${j}]`,
        );
      }
    });
  });
}
