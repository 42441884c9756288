export type Level = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

interface BaseCtx {
  service?: string;
  file?: string;
  term?: string;
  request_id?: string;
}

export interface LogOptions {
  level?: Level;
  format?: "json" | "pretty";
  // Defaults to console.log; the CLI and tests swap it out.
  write?: (line: string) => void;
}

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: LogContext): void;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error", "silent"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function isLevel(v: string | undefined): v is Level {
  return LEVELS.some((l) => l === v);
}

function nowISO() { return new Date().toISOString(); }

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const lvl: Level = opts.level ?? (isLevel(envLevel) ? envLevel : "info");
  const fmt = opts.format ?? (process.env.LOG_FORMAT === "json" ? "json" : "pretty");
  // eslint-disable-next-line no-console
  const write = opts.write ?? ((line: string) => console.log(line));

  function emit(base: BaseCtx, level: Exclude<Level, "silent">, msg: string, extra?: LogContext) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    const ts = nowISO();
    if (fmt === "json") {
      write(JSON.stringify({ ts, level, msg, ...base, ...(extra || {}) }));
      return;
    }
    const { service: svc, ...rest } = base;
    const ctx = { ...rest, ...(extra || {}) };
    const head = `[${ts}] ${level.toUpperCase()}${svc ? ` ${svc}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    write(`${head} - ${msg}${ctxStr}`);
  }

  function create(current: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...current, ...ctx }); },
      trace(msg, ctx) { emit(current, "trace", msg, ctx); },
      debug(msg, ctx) { emit(current, "debug", msg, ctx); },
      info(msg, ctx) { emit(current, "info", msg, ctx); },
      warn(msg, ctx) { emit(current, "warn", msg, ctx); },
      error(msg, ctx) { emit(current, "error", msg, ctx); },
    };
  }

  return create({ service });
}

// Used where a caller passes no logger (library calls from tests and the client).
export const silentLogger: Logger = getLogger(undefined, { level: "silent" });
