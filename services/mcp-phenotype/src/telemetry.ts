import { randomUUID } from "node:crypto";
import { toErrorMessage } from "./errors.js";

export const logLevels = ["info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof logLevels)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

export type RequestLogContext = {
  requestId: string;
  route: string;
  startedAt: number;
};

type LogSink = (line: string) => void;

const levelRank: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

// stdout belongs to the stdio transport, so every line goes to stderr
const defaultSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

const telemetryState: { level: LogLevel; sink: LogSink } = {
  level: "info",
  sink: defaultSink,
};

export function configureTelemetry(options: { level?: LogLevel; sink?: LogSink }) {
  if (options.level) telemetryState.level = options.level;
  if (options.sink) telemetryState.sink = options.sink;
}

export function resetTelemetry() {
  telemetryState.level = "info";
  telemetryState.sink = defaultSink;
}

function nowIso() {
  return new Date().toISOString();
}

export function compactString(value: string, max = 240): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= max) return normalized;
  return `${normalized.slice(0, max - 1)}…`;
}

function emit(level: EmitLevel, event: string, fields: Record<string, unknown>) {
  if (levelRank[level] < levelRank[telemetryState.level]) return;
  const payload = {
    ts: nowIso(),
    level,
    event,
    ...fields,
  };
  telemetryState.sink(JSON.stringify(payload));
}

export function logEvent(
  level: EmitLevel,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit(level, event, fields);
}

export function startRequestLog(
  route: string,
  fields: Record<string, unknown> = {},
): RequestLogContext {
  const context: RequestLogContext = {
    requestId: randomUUID().slice(0, 8),
    route,
    startedAt: Date.now(),
  };

  emit("info", "request.start", {
    requestId: context.requestId,
    route,
    ...fields,
  });
  return context;
}

export function stepRequestLog(
  context: RequestLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("info", event, {
    requestId: context.requestId,
    route: context.route,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function warnRequestLog(
  context: RequestLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  emit("warn", event, {
    requestId: context.requestId,
    route: context.route,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function errorRequestLog(
  context: RequestLogContext,
  event: string,
  error: unknown,
  fields: Record<string, unknown> = {},
) {
  emit("error", event, {
    requestId: context.requestId,
    route: context.route,
    elapsedMs: Date.now() - context.startedAt,
    message: compactString(toErrorMessage(error)),
    ...fields,
  });
}

export function endRequestLog(
  context: RequestLogContext,
  fields: Record<string, unknown> = {},
) {
  emit("info", "request.end", {
    requestId: context.requestId,
    route: context.route,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}
