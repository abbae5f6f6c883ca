/**
 * Console logger with subsystem prefixes and a JSON field object per line:
 *
 *   [WorkerPool] worker transition {"workerId":1,"from":"starting","to":"ready"}
 */

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

function isDebugEnabled(): boolean {
  return process.env.SOCKGATE_DEBUG === "true";
}

/**
 * Stringify log fields, handling Errors, BigInt and circular references.
 * Falls back to String() if JSON.stringify fails.
 */
export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => {
      if (typeof v === "bigint") {
        return `${v.toString()}n`;
      }
      if (v instanceof Error) {
        return { name: v.name, message: v.message };
      }
      return v;
    });
  } catch {
    try {
      return String(value);
    } catch {
      return "[Unstringifiable value]";
    }
  }
}

export function formatLine(subsystem: string, message: string, fields?: LogFields): string {
  const prefix = `[${subsystem}] ${message}`;
  if (!fields || Object.keys(fields).length === 0) {
    return prefix;
  }
  return `${prefix} ${safeStringify(fields)}`;
}

export function createLogger(subsystem: string): Logger {
  return {
    debug: (message, fields) => {
      if (isDebugEnabled()) {
        console.debug(formatLine(subsystem, message, fields));
      }
    },
    info: (message, fields) => console.log(formatLine(subsystem, message, fields)),
    warn: (message, fields) => console.warn(formatLine(subsystem, message, fields)),
    error: (message, fields) => console.error(formatLine(subsystem, message, fields)),
  };
}
