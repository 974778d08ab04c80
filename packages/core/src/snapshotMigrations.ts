import { LATEST_SCHEMA_VERSION } from "./snapshot.js";

export const SUPPORTED_SCHEMA_VERSIONS: readonly number[] = [1, 2] as const;

interface MutablePayload {
  schemaVersion?: unknown;
  [key: string]: unknown;
}

export interface SnapshotMigrationResult {
  data: MutablePayload;
  version: number | null;
  applied: string[];
}

function clonePayload<T>(value: T): T {
  return structuredClone(value);
}

function isObjectRecord(value: unknown): value is MutablePayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * v1 had no face-corner colors, no polygon origin tag and no primary UV flag.
 * Every v1 polygon was exported as-is, the first UV map was the active one and
 * positions were always written at unit scale.
 */
function migrateV1ToV2(input: MutablePayload): MutablePayload {
  const polygons = Array.isArray(input.polygons)
    ? input.polygons.map((polygon) => {
      if (!isObjectRecord(polygon)) return polygon;
      return { ...polygon, origin: polygon.origin ?? "regular" };
    })
    : input.polygons;

  const flagged = Array.isArray(input.uvMaps)
    && input.uvMaps.some((uvMap) => isObjectRecord(uvMap) && uvMap.primary === true);
  const uvMaps = Array.isArray(input.uvMaps)
    ? input.uvMaps.map((uvMap, index) => {
      if (!isObjectRecord(uvMap)) return uvMap;
      return { ...uvMap, primary: uvMap.primary ?? (!flagged && index === 0) };
    })
    : input.uvMaps;

  const metadata = isObjectRecord(input.metadata)
    ? { ...input.metadata, unitScale: input.metadata.unitScale ?? 1 }
    : input.metadata;

  return {
    ...input,
    ...(metadata === undefined ? {} : { metadata }),
    schemaVersion: 2,
    polygons,
    uvMaps,
    colorMaps: input.colorMaps ?? [],
  };
}

/**
 * Bring a recognised older payload up to the latest layout. Unknown versions
 * pass through untouched; the caller decides whether they are acceptable.
 */
export function migrateSnapshotPayloadToLatest(input: unknown): SnapshotMigrationResult {
  if (!isObjectRecord(input)) {
    return {
      data: { schemaVersion: null },
      version: null,
      applied: [],
    };
  }

  let working = clonePayload(input);
  const applied: string[] = [];

  while (typeof working.schemaVersion === "number" && working.schemaVersion < LATEST_SCHEMA_VERSION) {
    if (working.schemaVersion === 1) {
      working = migrateV1ToV2(working);
      applied.push("v1->v2");
      continue;
    }
    break;
  }

  return {
    data: working,
    version: typeof working.schemaVersion === "number" && Number.isFinite(working.schemaVersion)
      ? working.schemaVersion
      : null,
    applied,
  };
}
