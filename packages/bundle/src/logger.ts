import type { LogLevel } from "./types.js";
import { AsyncLocalStorage } from "node:async_hooks";

export type LogCallback = (level: LogLevel, message: string, transformId?: string) => void | Promise<void>;

const logCallbackStorage = new AsyncLocalStorage<LogCallback | null>();
let fallbackLogCallback: LogCallback | null = null;

export function setLogCallback(callback: LogCallback | null): void {
  fallbackLogCallback = callback;
}

export function runWithLogCallback<T>(callback: LogCallback | null, fn: () => Promise<T>): Promise<T> {
  return logCallbackStorage.run(callback, fn);
}

function getLogCallback(): LogCallback | null {
  const scoped = logCallbackStorage.getStore();
  return scoped === undefined ? fallbackLogCallback : scoped;
}

function emit(level: LogLevel, message: string, transformId?: string): boolean {
  const callback = getLogCallback();
  if (!callback) {
    return false;
  }
  const result = callback(level, message, transformId);
  if (result instanceof Promise) {
    result.catch((error: unknown) => {
      console.error("[error]", `Log callback failed: ${error instanceof Error ? error.message : String(error)}`);
    });
  }
  return true;
}

export const log = {
  debug: (message: string, transformId?: string) => {
    if (!emit("debug", message, transformId) && process.env.DEBUG_BUNDLE === "1") {
      console.log("[debug]", message);
    }
  },
  info: (message: string, transformId?: string) => {
    if (!emit("info", message, transformId)) {
      console.log("[info]", message);
    }
  },
  warn: (message: string, transformId?: string) => {
    if (!emit("warn", message, transformId)) {
      console.warn("[warn]", message);
    }
  },
  error: (message: string, transformId?: string) => {
    if (!emit("error", message, transformId)) {
      console.error("[error]", message);
    }
  },
};
