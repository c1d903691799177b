import { EventEmitter } from "node:events";
import { nowIso } from "./pipeline/utils.js";

export type RunLogLevel = "log" | "warn" | "error" | "progress";

export type RunLogEvent = {
  level: RunLogLevel;
  message: string;
  at: string;
};

export type RunLogListener = (event: RunLogEvent) => void;

/**
 * Event-emitting log shared by every pipeline stage. Stages never print; sinks
 * subscribe and decide what reaches the terminal.
 */
export class RunLog {
  private readonly emitter = new EventEmitter();
  private readonly history: RunLogEvent[] = [];

  subscribe(listener: RunLogListener): () => void {
    this.emitter.on("event", listener);
    return () => this.emitter.off("event", listener);
  }

  events(): RunLogEvent[] {
    return [...this.history];
  }

  log(message: string): void {
    this.emit("log", message);
  }

  warn(message: string): void {
    this.emit("warn", message);
  }

  error(message: string): void {
    this.emit("error", message);
  }

  progress(message: string): void {
    this.emit("progress", message);
  }

  private emit(level: RunLogLevel, message: string): void {
    const event: RunLogEvent = { level, message, at: nowIso() };
    this.history.push(event);
    this.emitter.emit("event", event);
  }
}

/** Console sink: everything in debug mode, otherwise only errors. */
export function attachConsoleSink(log: RunLog, options: { debug: boolean }): () => void {
  return log.subscribe((event) => {
    if (event.level === "error") {
      console.error(`[error] ${event.message}`);
      return;
    }
    if (!options.debug) return;
    if (event.level === "warn") console.warn(`[warn] ${event.message}`);
    else console.log(`[${event.level}] ${event.message}`);
  });
}
