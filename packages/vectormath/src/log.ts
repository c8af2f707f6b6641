import { config } from "./config.js";

const PREFIX = "[vectormath]";

/** Write a diagnostic line when `debug` is enabled */
export function logDebug(message: string, ...details: unknown[]): void {
  if (!config.get("debug")) return;
  console.debug(`${PREFIX} ${message}`, ...details);
}
