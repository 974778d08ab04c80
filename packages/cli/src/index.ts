export {
  DEFAULT_SETTINGS,
  DEFAULT_TRANSPORT_MODE,
  MeshbridgeSettingsSchema,
  TRANSPORT_MODES,
  loadSettings,
  parseCliConfig,
  parseTransportMode,
  renderHelpText,
  resolveSettingsPath,
  resolveTransportMode,
  saveSettings,
  type LoadedSettings,
  type MeshbridgeCliConfig,
  type MeshbridgeCommand,
  type MeshbridgeSettings,
  type ParsedCliConfig,
  type TransportMode,
} from "./config.js";
export {
  OSClipboardTransport,
  TEMP_FILE_NAME,
  TempFileTransport,
  createTransport,
  defaultTempFilePath,
  type ClipboardBackend,
  type ClipboardTransport,
  type TransportOptions,
} from "./transport/index.js";
export {
  OperationController,
  type ControllerState,
  type CutSummary,
  type ExportOptions,
  type ExportSummary,
  type ImportSummary,
  type OperationControllerOptions,
  type OperationFailure,
  type OperationName,
  type OperationResult,
} from "./controller/controller.js";
export { formatOperationEvent, type OperationEvent, type OperationEventType } from "./controller/events.js";
export { runMeshbridgeCli, defaultIo, type CliIo, type CliRuntimeOptions } from "./meshbridgeCli.js";
export { stableJsonStringify } from "./stableJson.js";
