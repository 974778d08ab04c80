import { InvalidPayloadError, UnsupportedVersionError } from "./errors.js";
import { LATEST_SCHEMA_VERSION, type MeshSnapshot } from "./snapshot.js";
import { SUPPORTED_SCHEMA_VERSIONS, migrateSnapshotPayloadToLatest } from "./snapshotMigrations.js";
import { parseSnapshotPayload, validateSnapshotReferences } from "./snapshotSchema.js";

export interface EncodeOptions {
  /** Spaces of indentation; 0 writes a single line. */
  indent?: number;
}

function toPayload(snapshot: MeshSnapshot): Record<string, unknown> {
  return {
    schemaVersion: LATEST_SCHEMA_VERSION,
    coordinateConvention: snapshot.coordinateConvention,
    ...(snapshot.metadata ? { metadata: snapshot.metadata } : {}),
    vertices: snapshot.vertices,
    polygons: snapshot.polygons.map((polygon) => ({
      vertices: polygon.vertices,
      material: polygon.material,
      isSubdivisionSurface: polygon.isSubdivisionSurface,
      origin: polygon.origin,
    })),
    materials: snapshot.materials,
    uvMaps: snapshot.uvMaps,
    colorMaps: snapshot.colorMaps,
    weightMaps: snapshot.weightMaps,
    morphs: snapshot.morphs,
    subdivisionWeights: snapshot.subdivisionWeights,
    selectionSets: snapshot.selectionSets,
  };
}

/**
 * Serialise a snapshot at the latest schema version. The payload goes through
 * the same shape and reference checks as `decodeSnapshot`, so a payload this
 * writes always decodes.
 *
 * @throws InvalidPayloadError for out-of-range or non-finite values
 * @throws MalformedReferenceError for ids that point outside the snapshot
 */
export function encodeSnapshot(snapshot: MeshSnapshot, options: EncodeOptions = {}): string {
  const payload = toPayload(snapshot);
  validateSnapshotReferences(parseSnapshotPayload(payload));
  return JSON.stringify(payload, null, options.indent ?? 2);
}

/**
 * Parse payload text into a snapshot. Either the whole snapshot is valid and
 * returned, or this throws and nothing is produced.
 *
 * @throws InvalidPayloadError when the text is not JSON or has the wrong shape
 * @throws UnsupportedVersionError for a schemaVersion outside the allow-list
 * @throws MalformedReferenceError for ids that point outside the snapshot
 */
export function decodeSnapshot(text: string): MeshSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidPayloadError(`payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new InvalidPayloadError("payload root must be an object");
  }

  const version = "schemaVersion" in raw ? raw.schemaVersion : undefined;
  if (typeof version !== "number" || !Number.isInteger(version)) {
    throw new InvalidPayloadError("schemaVersion must be an integer", "schemaVersion");
  }
  if (!SUPPORTED_SCHEMA_VERSIONS.includes(version)) {
    throw new UnsupportedVersionError(version, SUPPORTED_SCHEMA_VERSIONS);
  }

  const migrated = migrateSnapshotPayloadToLatest(raw);
  const snapshot = parseSnapshotPayload(migrated.data);
  validateSnapshotReferences(snapshot);
  return snapshot;
}
