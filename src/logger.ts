/**
 * Logger abstraction.
 *
 * Structured, level-based logging with context. Entries about a workflow
 * carry `workflowId` and `sessionId`, and entries about a step also carry
 * `stepNumber`, so one run can be followed across the executor, planner
 * and API logs; `forWorkflow()` attaches those keys.
 *
 * Output goes to the console as one JSON object per line, or as a short
 * text line for local runs. Consumers can replace the sink with
 * setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export type LogFormat = 'json' | 'text';

/** Context keys with a fixed meaning; anything else is free-form. */
export interface LogContext {
  component?: string;
  workflowId?: string;
  sessionId?: string;
  stepNumber?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

/** The part of a workflow a log line needs to identify it. */
export interface WorkflowLogRef {
  id: string;
  sessionId: string;
}

export interface LoggingOptions {
  level: LogLevel;
  format?: LogFormat;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

function write(level: LogLevel, line: string): void {
  switch (level) {
    case LogLevel.Error:
      console.error(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

const jsonHandler: LogHandler = (entry) => {
  write(entry.level, JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  }));
};

/** `2026-01-01T00:00:00.000Z INFO [executor] Step completed workflowId=wf_1 stepNumber=2` */
export function formatText(entry: LogEntry): string {
  const context: LogContext = entry.context ?? {};
  const { component, ...rest } = context;
  const fields = Object.entries(rest)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  const scope = typeof component === 'string' ? ` [${component}]` : '';
  return [`${entry.timestamp} ${entry.level.toUpperCase()}${scope} ${entry.message}`, ...fields].join(' ');
}

const textHandler: LogHandler = (entry) => write(entry.level, formatText(entry));

let currentHandler: LogHandler = jsonHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the log sink (e.g., for testing or external log systems). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Apply the configured level and console format in one call. */
export function configureLogging(options: LoggingOptions): void {
  setLogLevel(options.level);
  if (options.format) {
    setLogHandler(options.format === 'text' ? textHandler : jsonHandler);
  }
}

function emit(level: LogLevel, message: string, context: LogContext): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
  /** Child logger tagged with a workflow, and with one of its steps when given. */
  forWorkflow(workflow: WorkflowLogRef, stepNumber?: number): Logger;
}

/** Create a logger with persistent context fields. */
export function createLogger(baseContext: LogContext = {}): Logger {
  return {
    debug: (msg, ctx) => emit(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => emit(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => emit(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => emit(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
    forWorkflow: (workflow, stepNumber) =>
      createLogger({
        ...baseContext,
        workflowId: workflow.id,
        sessionId: workflow.sessionId,
        ...(stepNumber === undefined ? {} : { stepNumber }),
      }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'intentflow' });
