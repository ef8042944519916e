import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const LOG_FILE_PREFIX = 'regulator-';

/**
 * Generate timestamp-based log filename.
 */
export function generateLogFilename(now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  return `${LOG_FILE_PREFIX}${timestamp}.log`;
}

/**
 * Cleanup old log files, keeping only the most recent maxFiles.
 * Also removes empty log files.
 *
 * @returns files that could not be removed
 */
export function cleanupOldLogs(logDir: string, maxFiles: number): string[] {
  if (!fs.existsSync(logDir)) {
    return [];
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return {
        name: f,
        path: filePath,
        mtime: stats.mtime.getTime(),
        size: stats.size,
      };
    });

  const emptyFiles = files.filter((f) => f.size === 0);
  const nonEmptyFiles = files.filter((f) => f.size > 0).sort((a, b) => b.mtime - a.mtime); // newest first

  const failed: string[] = [];
  for (const file of [...emptyFiles, ...nonEmptyFiles.slice(maxFiles)]) {
    try {
      fs.unlinkSync(file.path);
    } catch {
      failed.push(file.path);
    }
  }
  return failed;
}

/**
 * Ensure log directory exists.
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Create Pino mixin that injects the turn context.
 * Explicit fields in log args take precedence over ALS values.
 */
export function createTraceMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = { sessionId: ctx.sessionId };
    if (ctx.turn !== undefined) {
      result['turn'] = ctx.turn;
    }
    return result;
  };
}

/**
 * Create a configured logger instance.
 *
 * Features:
 * - Console output with pino-pretty (in development)
 * - File output with timestamp-based filename
 * - Auto-cleanup of old and empty log files
 * - Auto-injection of session/turn context via mixin (AsyncLocalStorage)
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };
  const { logDir, maxFiles, level, pretty } = finalConfig;

  ensureLogDir(logDir);
  const undeletable = cleanupOldLogs(logDir, maxFiles);

  const logFilePath = path.join(logDir, generateLogFilename());

  const targets: pino.TransportTargetOptions[] = [];

  // Console output goes to stderr so stdout carries only the turn report
  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        destination: 2,
      },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 2 },
    });
  }

  targets.push({
    target: 'pino-pretty',
    level,
    options: {
      destination: logFilePath,
      mkdir: true,
      colorize: false,
    },
  });

  const logger = pino({
    level,
    transport: {
      targets,
    },
    mixin: createTraceMixin(),
  });

  if (undeletable.length > 0) {
    logger.warn({ files: undeletable }, 'Could not remove old log files');
  }

  return logger;
}
