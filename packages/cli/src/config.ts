import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { isCoordinateConvention, type CoordinateConvention } from "@meshbridge/core";

export type TransportMode = "TemporaryFile" | "OSClipboard";

export const TRANSPORT_MODES: readonly TransportMode[] = ["TemporaryFile", "OSClipboard"] as const;

export const DEFAULT_TRANSPORT_MODE: TransportMode = "TemporaryFile";

const TRANSPORT_ALIASES: Record<string, TransportMode> = {
  TemporaryFile: "TemporaryFile",
  OSClipboard: "OSClipboard",
  tempfile: "TemporaryFile",
  clipboard: "OSClipboard",
};

export function parseTransportMode(value: string): TransportMode | null {
  return Object.hasOwn(TRANSPORT_ALIASES, value) ? TRANSPORT_ALIASES[value] ?? null : null;
}

export const MeshbridgeSettingsSchema = z
  .object({
    transportMode: z.enum(["TemporaryFile", "OSClipboard"]).default(DEFAULT_TRANSPORT_MODE),
  })
  .strict();

export type MeshbridgeSettings = z.infer<typeof MeshbridgeSettingsSchema>;

export const DEFAULT_SETTINGS: MeshbridgeSettings = {
  transportMode: DEFAULT_TRANSPORT_MODE,
};

export interface LoadedSettings {
  settings: MeshbridgeSettings;
  source: "default" | "file";
  warning?: string;
}

export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.MESHBRIDGE_SETTINGS) return resolve(env.MESHBRIDGE_SETTINGS);
  return join(homedir(), ".meshbridge", "settings.json");
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** A missing file means defaults; an unreadable or invalid one falls back to defaults with a warning. */
export async function loadSettings(path: string): Promise<LoadedSettings> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return { settings: { ...DEFAULT_SETTINGS }, source: "default" };
    }
    return {
      settings: { ...DEFAULT_SETTINGS },
      source: "default",
      warning: `Could not read settings file ${path}: ${describeError(error)}`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      settings: { ...DEFAULT_SETTINGS },
      source: "default",
      warning: `Settings file ${path} is not valid JSON (${describeError(error)}); using defaults.`,
    };
  }

  const parsed = MeshbridgeSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      settings: { ...DEFAULT_SETTINGS },
      source: "default",
      warning: `Settings file ${path} is invalid (${issue?.message ?? "unknown issue"}); using defaults.`,
    };
  }
  return { settings: parsed.data, source: "file" };
}

export async function saveSettings(path: string, settings: MeshbridgeSettings): Promise<void> {
  const validated = MeshbridgeSettingsSchema.parse(settings);
  await mkdir(dirname(path), { recursive: true });
  const staging = `${path}.${process.pid}.tmp`;
  await writeFile(staging, `${JSON.stringify(validated, null, 2)}\n`, "utf8");
  await rename(staging, path);
}

export type MeshbridgeCommand = "copy" | "cut" | "paste" | "new-mesh" | "settings";

const COMMANDS: readonly MeshbridgeCommand[] = ["copy", "cut", "paste", "new-mesh", "settings"];

function isCommand(value: string | undefined): value is MeshbridgeCommand {
  return COMMANDS.some((command) => command === value);
}

export interface MeshbridgeCliConfig {
  command: MeshbridgeCommand;
  meshPath?: string;
  /** Export the whole mesh rather than the polygon selection. */
  all: boolean;
  /** From `--transport`. */
  transport?: TransportMode;
  /** From `MESHBRIDGE_TRANSPORT`. */
  envTransport?: TransportMode;
  /** Exchange convention for Copy/Cut, or the convention of a new mesh file. */
  convention?: CoordinateConvention;
  verbose: boolean;
  settingsPath: string;
}

export interface ParsedCliConfig {
  config: MeshbridgeCliConfig;
  error?: string;
}

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const [first, ...rest] = argv;
  const config: MeshbridgeCliConfig = {
    command: isCommand(first) ? first : "copy",
    all: false,
    verbose: false,
    settingsPath: resolveSettingsPath(env),
  };

  if (first === "--help" || first === "-h" || first === undefined) {
    return { config, error: "help" };
  }
  if (!isCommand(first)) {
    return { config, error: `Unknown command "${first}".` };
  }

  if (env.MESHBRIDGE_TRANSPORT) {
    const mode = parseTransportMode(env.MESHBRIDGE_TRANSPORT);
    if (!mode) {
      return { config, error: `Invalid MESHBRIDGE_TRANSPORT value "${env.MESHBRIDGE_TRANSPORT}".` };
    }
    config.envTransport = mode;
  }

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (arg === "--") {
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return { config, error: "help" };
    }
    if (arg === "--all") {
      config.all = true;
      continue;
    }
    if (arg === "--verbose") {
      config.verbose = true;
      continue;
    }
    if (arg === "--transport") {
      const value = rest[index + 1];
      if (!value) {
        return { config, error: "--transport requires a value." };
      }
      const mode = parseTransportMode(value);
      if (!mode) {
        return { config, error: `Invalid --transport value "${value}".` };
      }
      config.transport = mode;
      index += 1;
      continue;
    }
    if (arg === "--convention") {
      const value = rest[index + 1];
      if (!value) {
        return { config, error: "--convention requires a value." };
      }
      if (!isCoordinateConvention(value)) {
        return { config, error: `Invalid --convention value "${value}".` };
      }
      config.convention = value;
      index += 1;
      continue;
    }
    if (arg !== undefined && !arg.startsWith("-") && config.meshPath === undefined && config.command !== "settings") {
      config.meshPath = resolve(arg);
      continue;
    }
    return { config, error: `Unknown argument "${arg ?? ""}".` };
  }

  if (config.command !== "settings" && !config.meshPath) {
    return { config, error: `${config.command} requires a mesh file path.` };
  }
  return { config };
}

/** Flag, then environment, then persisted settings. */
export function resolveTransportMode(config: MeshbridgeCliConfig, settings: MeshbridgeSettings): TransportMode {
  return config.transport ?? config.envTransport ?? settings.transportMode;
}

export function renderHelpText() {
  return [
    "meshbridge",
    "",
    "Usage:",
    "  meshbridge copy <mesh.json> [--all]",
    "  meshbridge cut <mesh.json> [--all]",
    "  meshbridge paste <mesh.json>",
    "  meshbridge new-mesh <mesh.json> [--convention RH_Yup|LH_Zup]",
    "  meshbridge settings [--transport <mode>]",
    "",
    "Flags:",
    "  --all                   Copy/cut the whole mesh instead of the selected polygons.",
    "  --transport <mode>      TemporaryFile (tempfile) or OSClipboard (clipboard).",
    "  --convention <tag>      Exchange convention for copy/cut; convention of a new mesh file.",
    "  --verbose               Print operation events to stderr.",
    "  -h, --help              Show help.",
    "",
    "Environment:",
    "  MESHBRIDGE_TRANSPORT    Transport mode, overridden by --transport.",
    "  MESHBRIDGE_SETTINGS     Settings file (default: ~/.meshbridge/settings.json).",
  ].join("\n");
}
