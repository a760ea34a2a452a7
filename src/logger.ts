// Console logger used across the pipeline components.
// Lines look like: [WARN] [LatencyTracker] stage "keyframe" took 52.10ms (budget 40ms)

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const DEBUG_ENABLED = process.env.LOG_LEVEL === "debug";

export function createConsoleLogger(component: string): Logger {
  return {
    debug: (msg, ...args) => {
      if (DEBUG_ENABLED) console.debug(`[DEBUG] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
