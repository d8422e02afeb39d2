export {
  generateGrid,
  generateFromConfig,
  runGeneration,
  reportGeneration,
  reportGenerationFailure
} from './grid-generation'
export type { GenerationResult } from './grid-generation'
export {
  generationLogs,
  MAX_LOG_ENTRIES,
  beginGenerationRun,
  currentRun,
  log,
  logWarning,
  logDebug,
  logOnce,
  logMessages,
  setLogListener,
  setVerbosity,
  getVerbosity,
  clearGenerationLogs
} from './generation-logger'
export type { LogEntry, LogLevel, Verbosity } from './generation-logger'
