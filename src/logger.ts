/**
 * @module logger
 * @description Tagged, levelled logging on top of `debug`.
 *
 * Each tag maps to one `debug` namespace per level (`mesh:session:warn`,
 * `mesh:registry:debug`, …), so `DEBUG=mesh:*` still works for ad-hoc
 * tracing. The configured level decides which namespaces are switched on.
 */

import createDebug from "debug";
import type { Debugger } from "debug";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export const LOG_LEVEL_NAMES: readonly LogLevelName[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LEVEL_BY_NAME, value);
}

/** The logging surface components depend on. Any console-like object fits. */
export interface MeshLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(tag: string): MeshLogger;
}

export const NAMESPACE_ROOT = "mesh";

export class Logger implements MeshLogger {
  private readonly threshold: LogLevel;
  private readonly sinks: Record<Exclude<LogLevelName, "silent">, Debugger>;

  /**
   * @param tag - Component name, e.g. `"session"`.
   * @param level - Minimum level written. Without one, `DEBUG=mesh:<tag>`
   *   selects `"debug"` and everything else `"warn"`.
   */
  constructor(
    readonly tag: string = "core",
    level?: LogLevelName
  ) {
    const namespace = `${NAMESPACE_ROOT}:${tag}`;
    this.threshold =
      LEVEL_BY_NAME[level ?? (createDebug.enabled(namespace) ? "debug" : "warn")];
    this.sinks = {
      debug: createDebug(`${namespace}:debug`),
      info: createDebug(`${namespace}:info`),
      warn: createDebug(`${namespace}:warn`),
      error: createDebug(`${namespace}:error`),
    };
    this.sinks.debug.enabled = this.threshold <= LogLevel.DEBUG;
    this.sinks.info.enabled = this.threshold <= LogLevel.INFO;
    this.sinks.warn.enabled = this.threshold <= LogLevel.WARN;
    this.sinks.error.enabled = this.threshold <= LogLevel.ERROR;
  }

  get level(): LogLevelName {
    return LOG_LEVEL_NAMES[this.threshold] ?? "silent";
  }

  isEnabled(level: Exclude<LogLevelName, "silent">): boolean {
    return this.sinks[level].enabled;
  }

  debug(message: string, ...args: unknown[]): void {
    this.sinks.debug(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.sinks.info(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.sinks.warn(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.sinks.error(message, ...args);
  }

  /** Same level, nested tag (`session` → `session:registry`). */
  child(tag: string): Logger {
    return new Logger(`${this.tag}:${tag}`, this.level);
  }
}
