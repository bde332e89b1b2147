import debug from "debug";

const BASE_NAMESPACE = "rowcast";

/**
 * Creates a namespaced debug logger.
 *
 * `createLogger("result")` logs under `rowcast:result`; enable it with
 * `DEBUG=rowcast:*`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
  return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Receives warning-level diagnostics.
 */
export type WarningHandler = (message: string) => void;

export function warnInDevelopment(message: string, details?: unknown): void {
  if (!isDevelopmentEnvironment()) {
    return;
  }
  if (details !== undefined) {
    console.warn(message, details);
    return;
  }
  console.warn(message);
}

function isDevelopmentEnvironment(): boolean {
  return getNodeEnv() !== "production";
}

function getNodeEnv(): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env.NODE_ENV;
}
