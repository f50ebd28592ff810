import bunyan from "bunyan";

export const LOG_LEVELS: readonly bunyan.LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function isLogLevel(value: string): value is bunyan.LogLevelString {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Logs go to stderr so stdout carries only the solve output. Pass `streams`
 * to send records elsewhere (tests use a bunyan.RingBuffer).
 */
export function createLogger(
  level: bunyan.LogLevel = "info",
  streams?: bunyan.Stream[],
): bunyan {
  return bunyan.createLogger({
    name: "nineset",
    level,
    ...(streams ? { streams } : { stream: process.stderr }),
  });
}
