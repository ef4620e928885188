import type { Logger } from "./types";

type Level = "debug" | "info" | "warn" | "error";

export type LogRecord = {
  ts: string;
  level: Level;
  msg: string;
  data?: Record<string, unknown>;
};

export function formatRecord(rec: LogRecord, json: boolean): string {
  if (json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.msg];
  if (rec.data && Object.keys(rec.data).length) parts.push(JSON.stringify(rec.data));
  return parts.join(" ");
}

/**
 * Logger that writes one line per record to stderr. stdout is reserved for
 * the stdio transport.
 */
export function createLogger(
  opts: { debug?: boolean; json?: boolean; write?: (line: string) => void; now?: () => Date } = {}
): Logger {
  const write = opts.write ?? ((line: string) => process.stderr.write(line + "\n"));
  const now = opts.now ?? (() => new Date());

  const emit = (level: Level) => (msg: string, data?: Record<string, unknown>) => {
    if (level === "debug" && !opts.debug) return;
    write(formatRecord({ ts: now().toISOString(), level, msg, data }, !!opts.json));
  };

  return { debug: emit("debug"), info: emit("info"), warn: emit("warn"), error: emit("error") };
}
