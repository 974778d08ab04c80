import { readFile, rename, writeFile } from "node:fs/promises";
import {
  MemoryMesh,
  asMeshBridgeError,
  loadMeshDocument,
  toMeshDocument,
} from "@meshbridge/core";
import {
  loadSettings,
  parseCliConfig,
  renderHelpText,
  resolveTransportMode,
  saveSettings,
  type MeshbridgeCliConfig,
} from "./config.js";
import { OperationController, type OperationResult } from "./controller/controller.js";
import { formatOperationEvent } from "./controller/events.js";
import { stableJsonStringify } from "./stableJson.js";
import { createTransport, type ClipboardBackend } from "./transport/index.js";

export interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

export const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

export interface CliRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  /** Stand-in for the system clipboard. */
  clipboard?: ClipboardBackend;
  tempFilePath?: string;
  now?: () => Date;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readMeshFile(path: string): Promise<MemoryMesh> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`${path} is not valid JSON: ${describeError(error)}`);
  }
  return loadMeshDocument(raw);
}

async function writeMeshFile(path: string, mesh: MemoryMesh): Promise<void> {
  const staging = `${path}.${process.pid}.tmp`;
  await writeFile(staging, `${JSON.stringify(toMeshDocument(mesh), null, 2)}\n`, "utf8");
  await rename(staging, path);
}

async function runSettingsCommand(config: MeshbridgeCliConfig, io: CliIo): Promise<number> {
  if (config.transport) {
    try {
      await saveSettings(config.settingsPath, { transportMode: config.transport });
    } catch (error) {
      io.writeStderr(`Failed to save settings: ${describeError(error)}`);
      return 1;
    }
    io.writeStdout(
      stableJsonStringify({ ok: true, saved: true, settingsPath: config.settingsPath, transportMode: config.transport }),
    );
    return 0;
  }

  const loaded = await loadSettings(config.settingsPath);
  if (loaded.warning) io.writeStderr(loaded.warning);
  io.writeStdout(
    stableJsonStringify({
      ok: true,
      saved: false,
      settingsPath: config.settingsPath,
      source: loaded.source,
      transportMode: loaded.settings.transportMode,
    }),
  );
  return 0;
}

async function openMesh(config: MeshbridgeCliConfig, meshPath: string): Promise<MemoryMesh> {
  if (config.command !== "new-mesh") {
    return readMeshFile(meshPath);
  }
  try {
    return await readMeshFile(meshPath);
  } catch (error) {
    if (isMissingFile(error)) return new MemoryMesh(config.convention ?? "RH_Yup");
    throw error;
  }
}

export async function runMeshbridgeCli(
  argv: string[],
  io: CliIo = defaultIo,
  options: CliRuntimeOptions = {},
): Promise<number> {
  const env = options.env ?? process.env;
  const parsed = parseCliConfig(argv, env);
  if (parsed.error) {
    if (parsed.error === "help") {
      io.writeStdout(renderHelpText());
      return 0;
    }
    io.writeStderr(parsed.error);
    io.writeStdout(renderHelpText());
    return 1;
  }
  const config = parsed.config;

  if (config.command === "settings") {
    return runSettingsCommand(config, io);
  }

  const meshPath = config.meshPath;
  if (!meshPath) {
    io.writeStderr(`${config.command} requires a mesh file path.`);
    return 1;
  }

  const loaded = await loadSettings(config.settingsPath);
  if (loaded.warning) io.writeStderr(loaded.warning);
  const transportMode = resolveTransportMode(config, loaded.settings);

  let mesh: MemoryMesh;
  try {
    mesh = await openMesh(config, meshPath);
  } catch (error) {
    const failure = asMeshBridgeError(error, "INVALID_PAYLOAD", "Failed to read mesh file.");
    io.writeStderr(`Failed to read mesh file: ${failure.code}: ${failure.message}`);
    return 1;
  }

  const controller = new OperationController({
    transport: createTransport(transportMode, { clipboard: options.clipboard, tempFilePath: options.tempFilePath }),
    exchangeConvention: config.command === "new-mesh" ? undefined : config.convention,
    now: options.now,
    onEvent: config.verbose ? (event) => io.writeStderr(formatOperationEvent(event)) : undefined,
  });

  const mode = config.all ? "whole" : "selected";
  let result: OperationResult<unknown>;
  if (config.command === "copy") {
    result = await controller.copy(mesh, { mode });
  } else if (config.command === "cut") {
    result = await controller.cut(mesh, { mode });
  } else if (config.command === "paste") {
    result = await controller.paste(mesh);
  } else {
    result = await controller.newMeshFromClipboard(mesh);
  }

  if (result.ok && config.command !== "copy") {
    try {
      await writeMeshFile(meshPath, mesh);
    } catch (error) {
      io.writeStderr(`Failed to write mesh file: ${describeError(error)}`);
      return 1;
    }
  }

  io.writeStdout(
    stableJsonStringify({
      ok: result.ok,
      operation: result.operation,
      transportMode,
      meshPath,
      summary: result.ok ? result.summary : null,
      warnings: result.warnings,
      error: result.ok ? null : result.error,
    }),
  );

  if (!result.ok) {
    io.writeStderr(`${result.error.code}: ${result.error.message}`);
    return 1;
  }
  for (const warning of result.warnings) io.writeStderr(`warning: ${warning}`);
  return 0;
}
