import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

type AppLoggerParams = {
  filePath: string;
};

/** JSONL debug log; every record carries the level, message and metadata. */
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const filePath = path.resolve(params.filePath);
  await mkdir(path.dirname(filePath), { recursive: true });
  const stream = createWriteStream(filePath, { flags: "a" });
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (closed) return;
    const normalizedLevel = level === "warn" ? "warning" : level;
    const payload = {
      timestamp: new Date().toISOString(),
      level: normalizedLevel,
      message,
      meta: meta ?? undefined
    };
    try {
      stream.write(`${JSON.stringify(payload)}\n`);
    } catch {
      closed = true;
    }
  };

  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}

type ConsoleLoggerParams = {
  stream?: { write: (chunk: string) => unknown };
  /** also forwards every record here, e.g. the JSONL debug log */
  sink?: Logger;
  verbose?: boolean;
};

/**
 * Diagnostics for humans, written to stderr so stdout stays a clean report.
 * Messages already carry their `file: error:` prefix and print as they are.
 */
export function createConsoleLogger(params: ConsoleLoggerParams = {}): Logger {
  const stream = params.stream ?? process.stderr;
  const sink = params.sink ?? noopLogger;
  const print = (line: string) => {
    stream.write(`${line}\n`);
  };

  return {
    debug: (message, meta) => {
      sink.debug(message, meta);
      if (params.verbose) print(pc.dim(message));
    },
    info: (message, meta) => {
      sink.info(message, meta);
      if (params.verbose) print(message);
    },
    warn: (message, meta) => {
      sink.warn(message, meta);
      print(pc.yellow(message));
    },
    error: (message, meta) => {
      sink.error(message, meta);
      print(pc.red(message));
    }
  };
}
