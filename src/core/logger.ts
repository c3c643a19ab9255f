/**
 * Structured JSON logger. Each line carries the active OpenTelemetry trace
 * and span ids when a span is active, so engine transitions can be joined
 * with traces emitted by whatever hosts the engine.
 */

import { trace } from "@opentelemetry/api";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type EmitLevel = Exclude<LogLevel, "silent">;

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogSink = (line: string, level: EmitLevel) => void;

export interface EngineLoggerOptions {
  /** Minimum level to emit. Defaults to "info". */
  level?: LogLevel;
  service?: string;
  sink?: LogSink;
  bindings?: Record<string, unknown>;
}

const stdioSink: LogSink = (line, level) => {
  const out =
    level === "error" || level === "warn" ? process.stderr : process.stdout;
  out.write(`${line}\n`);
};

export class EngineLogger {
  private readonly minLevel: number;
  private readonly service: string;
  private readonly sink: LogSink;
  private readonly bindings: Record<string, unknown>;

  constructor(private readonly options: EngineLoggerOptions = {}) {
    this.minLevel = LOG_LEVEL_ORDER[options.level ?? "info"];
    this.service = options.service ?? "phasegate";
    this.sink = options.sink ?? stdioSink;
    this.bindings = options.bindings ?? {};
  }

  child(bindings: Record<string, unknown>): EngineLogger {
    return new EngineLogger({
      ...this.options,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra);
  }

  private log(
    level: EmitLevel,
    message: string,
    extra?: Record<string, unknown>,
  ): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return;

    const entry: Record<string, unknown> = {
      level,
      time: new Date().toISOString(),
      service: this.service,
      msg: message,
      ...this.bindings,
    };

    const span = trace.getActiveSpan();
    if (span) {
      const ctx = span.spanContext();
      entry.traceId = ctx.traceId;
      entry.spanId = ctx.spanId;
    }

    if (extra) {
      Object.assign(entry, extra);
    }

    this.sink(JSON.stringify(entry), level);
  }
}

export const silentLogger = (): EngineLogger =>
  new EngineLogger({ level: "silent" });
