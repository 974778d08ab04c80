import {
  MeshBridgeError,
  asMeshBridgeError,
  convertObjectTransform,
  countSnapshotElements,
  decodeSnapshot,
  encodeSnapshot,
  extractSnapshot,
  mergeSnapshot,
  type CoordinateConvention,
  type ExtractionMode,
  type ExtractionSource,
  type HostMesh,
  type HostMeshReader,
  type MergeSummary,
  type MeshBridgeErrorCode,
  type SnapshotElementCounts,
  type SnapshotObject,
} from "@meshbridge/core";
import type { ClipboardTransport } from "../transport/types.js";
import type { OperationEvent, OperationEventType } from "./events.js";

export type OperationName = "copy" | "cut" | "paste" | "newMesh";

export type ControllerState =
  | "idle"
  | "extracting"
  | "encoding"
  | "writing"
  | "deleting"
  | "reading"
  | "decoding"
  | "merging";

export interface OperationControllerOptions {
  transport: ClipboardTransport;
  /** Convention snapshots are written in. Defaults to the source mesh's own. */
  exchangeConvention?: CoordinateConvention;
  sourceApp?: string;
  now?: () => Date;
  onEvent?: (event: OperationEvent) => void;
}

export interface ExportOptions {
  /** Defaults to `selected`; an empty selection exports the whole mesh. */
  mode?: ExtractionMode;
}

export interface ExportSummary {
  convention: CoordinateConvention;
  bytes: number;
  elements: SnapshotElementCounts;
}

export interface CutSummary extends ExportSummary {
  polygonsDeleted: number;
}

export interface ImportSummary extends MergeSummary {
  /** Convention the snapshot was written in. */
  sourceConvention: CoordinateConvention;
  sourceApp: string | null;
  /** Mesh item the snapshot was taken from, its transform in the target's convention. */
  sourceObject: SnapshotObject | null;
}

export interface OperationFailure {
  code: MeshBridgeErrorCode;
  message: string;
  path?: string;
}

export type OperationResult<T> =
  | { ok: true; operation: OperationName; summary: T; warnings: string[]; events: OperationEvent[] }
  | { ok: false; operation: OperationName; error: OperationFailure; warnings: string[]; events: OperationEvent[] };

interface RunContext {
  phase(state: Exclude<ControllerState, "idle">): void;
  warn(message: string): void;
  emit(type: OperationEventType, payload: Record<string, unknown>): void;
}

function toFailure(error: MeshBridgeError): OperationFailure {
  return error.path === undefined
    ? { code: error.code, message: error.message }
    : { code: error.code, message: error.message, path: error.path };
}

/**
 * Runs Copy, Cut, Paste and New Mesh from Clipboard one at a time. Every
 * operation resolves to a result; failures are reported, never thrown, and a
 * failed operation leaves the mesh as it was.
 */
export class OperationController {
  private currentState: ControllerState = "idle";
  private active: OperationName | null = null;
  private readonly transport: ClipboardTransport;
  private readonly exchangeConvention?: CoordinateConvention;
  private readonly sourceApp?: string;
  private readonly now?: () => Date;
  /** Event numbering runs across operations for the controller's lifetime. */
  private seq = 0;
  private readonly onEvent?: (event: OperationEvent) => void;

  constructor(options: OperationControllerOptions) {
    this.transport = options.transport;
    this.exchangeConvention = options.exchangeConvention;
    this.sourceApp = options.sourceApp;
    this.now = options.now;
    this.onEvent = options.onEvent;
  }

  get state(): ControllerState {
    return this.currentState;
  }

  copy(mesh: HostMeshReader, options: ExportOptions = {}): Promise<OperationResult<ExportSummary>> {
    return this.run("copy", async (context) => {
      const exported = await this.exportMesh("copy", mesh, options, context);
      return exported.summary;
    });
  }

  /** Copy, then delete the exported polygons once the payload is stored. */
  cut(mesh: HostMesh, options: ExportOptions = {}): Promise<OperationResult<CutSummary>> {
    return this.run("cut", async (context) => {
      const exported = await this.exportMesh("cut", mesh, options, context);
      context.phase("deleting");
      mesh.deletePolygons(exported.source.polygonHandles);
      return { ...exported.summary, polygonsDeleted: exported.source.polygonHandles.length };
    });
  }

  /** Append the stored snapshot to `mesh`. */
  paste(mesh: HostMesh): Promise<OperationResult<ImportSummary>> {
    return this.run("paste", (context) => this.importInto("existing", mesh, context));
  }

  /** Replace the content of `mesh` with the stored snapshot. */
  newMeshFromClipboard(mesh: HostMesh): Promise<OperationResult<ImportSummary>> {
    return this.run("newMesh", (context) => this.importInto("replace", mesh, context));
  }

  private async exportMesh(
    operation: OperationName,
    mesh: HostMeshReader,
    options: ExportOptions,
    context: RunContext,
  ): Promise<{ summary: ExportSummary; source: ExtractionSource }> {
    context.phase("extracting");
    const extraction = extractSnapshot(mesh, {
      mode: options.mode ?? "selected",
      convention: this.exchangeConvention,
      sourceApp: this.sourceApp,
      now: this.now,
    });
    for (const issue of extraction.issues) {
      context.warn(issue.message);
      context.emit("extraction.issue", { operation, code: issue.code, message: issue.message });
    }
    if (extraction.snapshot.polygons.length === 0) {
      throw new MeshBridgeError("OPERATION_FAILED", "Nothing to copy: the mesh has no exportable polygons.");
    }

    context.phase("encoding");
    const text = encodeSnapshot(extraction.snapshot);

    context.phase("writing");
    await this.transport.write(text);

    return {
      summary: {
        convention: extraction.snapshot.coordinateConvention,
        bytes: Buffer.byteLength(text, "utf8"),
        elements: countSnapshotElements(extraction.snapshot),
      },
      source: extraction.source,
    };
  }

  private async importInto(kind: "existing" | "replace", mesh: HostMesh, context: RunContext): Promise<ImportSummary> {
    context.phase("reading");
    const text = await this.transport.read();

    context.phase("decoding");
    const snapshot = decodeSnapshot(text);

    context.phase("merging");
    const summary = mergeSnapshot(snapshot, { kind, mesh });
    if (summary.creases.skipped > 0) {
      context.warn(`${summary.creases.skipped} crease edges have no matching edge in the target and were skipped.`);
    }
    if (summary.seams.skipped > 0) {
      context.warn(`${summary.seams.skipped} seam edges have no matching edge in the target and were skipped.`);
    }
    const object = snapshot.metadata?.object;
    return {
      ...summary,
      sourceConvention: snapshot.coordinateConvention,
      sourceApp: snapshot.metadata?.sourceApp ?? null,
      sourceObject: object
        ? {
          name: object.name,
          transform: convertObjectTransform(object.transform, snapshot.coordinateConvention, mesh.convention),
        }
        : null,
    };
  }

  private async run<T>(
    operation: OperationName,
    body: (context: RunContext) => Promise<T>,
  ): Promise<OperationResult<T>> {
    const events: OperationEvent[] = [];
    const warnings: string[] = [];
    const emit = (type: OperationEventType, payload: Record<string, unknown>) => {
      this.seq += 1;
      const event: OperationEvent = { seq: this.seq, type, payload };
      events.push(event);
      this.onEvent?.(event);
    };

    if (this.active !== null) {
      const error = new MeshBridgeError(
        "OPERATION_IN_PROGRESS",
        `Cannot start ${operation} while ${this.active} is still running.`,
      );
      emit("operation.failed", { operation, code: error.code, message: error.message });
      return { ok: false, operation, error: toFailure(error), warnings, events };
    }

    this.active = operation;
    emit("operation.started", { operation, transport: this.transport.kind });
    const context: RunContext = {
      phase: (state) => {
        this.currentState = state;
        emit("operation.phase", { operation, phase: state });
      },
      warn: (message) => {
        warnings.push(message);
      },
      emit,
    };

    try {
      const summary = await body(context);
      emit("operation.completed", { operation, warnings: warnings.length });
      return { ok: true, operation, summary, warnings, events };
    } catch (error) {
      const failure = asMeshBridgeError(error, "OPERATION_FAILED", `${operation} failed.`);
      emit("operation.failed", { operation, code: failure.code, message: failure.message });
      return { ok: false, operation, error: toFailure(failure), warnings, events };
    } finally {
      this.active = null;
      this.currentState = "idle";
    }
  }
}
