// Generation log: a bounded in-memory buffer grouped into generation runs.
// Free of geometry imports so any layer can use it.

export type LogLevel = 'info' | 'warning' | 'debug';

export type Verbosity = 'normal' | 'verbose';

export interface LogEntry {
  /** Run the entry belongs to; 0 before the first run starts. */
  run: number;
  level: LogLevel;
  message: string;
}

/** Oldest entries are dropped past this many. */
export const MAX_LOG_ENTRIES = 1000;

export const generationLogs: LogEntry[] = [];

let currentRunNumber = 0;

// Messages already written by logOnce in the current run
const loggedThisRun = new Set<string>();

let lastMessage: string | null = null;

let verbosity: Verbosity = 'normal';

let listener: ((entry: LogEntry) => void) | null = null;

// Console output during tests is opt-in
const consoleEnabled = typeof process === 'undefined' ||
  process.env.NODE_ENV !== 'test' ||
  process.env.PERSPECTIVE_GRID_VERBOSE_TESTS === 'true';

export function setLogListener(callback: ((entry: LogEntry) => void) | null) {
  listener = callback;
}

/**
 * - 'normal': run summaries, warnings and hidden panels
 * - 'verbose': also one debug line per panel
 */
export function setVerbosity(level: Verbosity) {
  verbosity = level;
}

export function getVerbosity(): Verbosity {
  return verbosity;
}

/**
 * Start a new generation run. logOnce messages and duplicate suppression
 * start over; the buffer keeps earlier runs.
 */
export function beginGenerationRun(): number {
  currentRunNumber++;
  loggedThisRun.clear();
  lastMessage = null;
  return currentRunNumber;
}

export function currentRun(): number {
  return currentRunNumber;
}

function write(level: LogLevel, message: string) {
  if (message === lastMessage) {
    return;
  }
  lastMessage = message;

  const entry: LogEntry = { run: currentRunNumber, level, message };
  generationLogs.push(entry);
  if (generationLogs.length > MAX_LOG_ENTRIES) {
    generationLogs.splice(0, generationLogs.length - MAX_LOG_ENTRIES);
  }

  if (consoleEnabled) {
    if (level === 'warning') {
      console.warn(message);
    } else {
      console.log(message);
    }
  }

  listener?.(entry);
}

export function log(message: string) {
  write('info', message);
}

export function logWarning(message: string) {
  write('warning', message);
}

/**
 * Only written when verbosity is 'verbose'.
 */
export function logDebug(message: string) {
  if (verbosity === 'verbose') {
    write('debug', message);
  }
}

/**
 * Write a message at most once per generation run.
 */
export function logOnce(message: string, level: LogLevel = 'info') {
  if (loggedThisRun.has(message)) {
    return;
  }
  loggedThisRun.add(message);
  write(level, message);
}

/**
 * Buffered messages, optionally of one run only.
 */
export function logMessages(run?: number): string[] {
  return generationLogs
    .filter(entry => run === undefined || entry.run === run)
    .map(entry => entry.message);
}

export function clearGenerationLogs() {
  generationLogs.length = 0;
  loggedThisRun.clear();
  lastMessage = null;
  currentRunNumber = 0;
}
