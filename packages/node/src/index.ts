/**
 * @railkit/node
 *
 * Node host for railkit toolbars: env configuration, a stderr log sink,
 * file-backed saved state and a terminal toolbar host.
 */

export {
  DEFAULT_COLUMNS,
  DEFAULT_STATE_FILE_NAME,
  ENV_DEV,
  ENV_STATE_FILE,
  type EnvMap,
  type NodeHostConfig,
  readNodeHostConfig,
  resolveColumns,
} from "./config.js";
export { type ConsoleLogOptions, type LogStream, createConsoleLog } from "./consoleLog.js";
export {
  type FileSavedStateStore,
  type FileSavedStateStoreOptions,
  type SavedStateRecord,
  createFileSavedStateStore,
} from "./savedStateFile.js";
export {
  type TerminalFrame,
  type TerminalOutput,
  type TerminalToolbar,
  type TerminalToolbarOptions,
  createTerminalToolbar,
} from "./terminalToolbar.js";
