import { readGcmEnv, type GcmLogLevel } from "./env";

const LEVEL_RANK: Record<GcmLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

const formatTime = () =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

/**
 * Console logger tagged with its source. Without an explicit level the
 * threshold is re-read from GCM_LOG_LEVEL on every call.
 */
export function createLogger(source: string, level?: GcmLogLevel): Logger {
  const enabled = (target: GcmLogLevel) =>
    LEVEL_RANK[target] >= LEVEL_RANK[level ?? readGcmEnv().logLevel];
  const line = (message: string) => `${formatTime()} [${source}] ${message}`;

  return {
    debug: (message) => {
      if (enabled("debug")) console.debug(line(message));
    },
    info: (message) => {
      if (enabled("info")) console.log(line(message));
    },
    warn: (message) => {
      if (enabled("warn")) console.warn(line(message));
    },
    error: (message) => {
      if (enabled("error")) console.error(line(message));
    },
  };
}
