export * from "./coordinates.js";
export * from "./errors.js";
export * from "./snapshot.js";
export * from "./host.js";
export { MemoryMesh } from "./memoryMesh.js";
export {
  MeshDocumentSchema,
  loadMeshDocument,
  toMeshDocument,
  type MeshDocument,
  type MeshDocumentInput,
} from "./meshDocument.js";
export { isRegularPolygon, polygonNormal, projectToPlane, triangulatePolygon } from "./triangulate.js";
export {
  DEFAULT_DIFFUSE,
  extractSnapshot,
  type ExtractOptions,
  type ExtractionMode,
  type ExtractionResult,
  type ExtractionSource,
} from "./extract.js";
export {
  SUPPORTED_SCHEMA_VERSIONS,
  migrateSnapshotPayloadToLatest,
  type SnapshotMigrationResult,
} from "./snapshotMigrations.js";
export {
  SnapshotPayloadSchema,
  parseSnapshotPayload,
  validateSnapshotReferences,
  type SnapshotPayload,
} from "./snapshotSchema.js";
export { decodeSnapshot, encodeSnapshot, type EncodeOptions } from "./codec.js";
export { mergeSnapshot, type MergeSummary, type MergeTarget } from "./merge.js";
