export type MeshBridgeErrorCode =
  | "EXTRACTION_ERROR"
  | "TRANSPORT_ERROR"
  | "UNSUPPORTED_VERSION"
  | "MALFORMED_REFERENCE"
  | "INVALID_PAYLOAD"
  | "OPERATION_IN_PROGRESS"
  | "OPERATION_FAILED";

export class MeshBridgeError extends Error {
  readonly code: MeshBridgeErrorCode;
  /** Location inside the payload, e.g. `polygons[3].vertices[1]`. */
  readonly path?: string;

  constructor(code: MeshBridgeErrorCode, message: string, path?: string) {
    super(message);
    this.name = "MeshBridgeError";
    this.code = code;
    this.path = path;
  }
}

/** Host data that could not be exported. Collected as an issue; extraction carries on. */
export class ExtractionError extends MeshBridgeError {
  constructor(message: string, path?: string) {
    super("EXTRACTION_ERROR", message, path);
    this.name = "ExtractionError";
  }
}

export class TransportError extends MeshBridgeError {
  constructor(message: string) {
    super("TRANSPORT_ERROR", message);
    this.name = "TransportError";
  }
}

export class UnsupportedVersionError extends MeshBridgeError {
  readonly version: number;

  constructor(version: number, supported: readonly number[]) {
    super(
      "UNSUPPORTED_VERSION",
      `schemaVersion ${version} is not supported (supported: ${supported.join(", ")})`,
      "schemaVersion",
    );
    this.name = "UnsupportedVersionError";
    this.version = version;
  }
}

export class MalformedReferenceError extends MeshBridgeError {
  constructor(message: string, path: string) {
    super("MALFORMED_REFERENCE", message, path);
    this.name = "MalformedReferenceError";
  }
}

export class InvalidPayloadError extends MeshBridgeError {
  constructor(message: string, path?: string) {
    super("INVALID_PAYLOAD", message, path);
    this.name = "InvalidPayloadError";
  }
}

export function isMeshBridgeError(error: unknown): error is MeshBridgeError {
  return error instanceof MeshBridgeError;
}

export function asMeshBridgeError(
  error: unknown,
  fallbackCode: MeshBridgeErrorCode,
  fallbackMessage: string,
): MeshBridgeError {
  if (isMeshBridgeError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new MeshBridgeError(fallbackCode, error.message);
  }
  return new MeshBridgeError(fallbackCode, fallbackMessage);
}
