import pino from "pino";

// stdout carries the setup report; log lines go to stderr.
export const logger = pino(
  {
    name: "devtools-bridge",
    level: process.env.LOG_LEVEL ?? "info",
    transport:
      process.env.NODE_ENV === "development"
        ? { target: "pino/file", options: { destination: 2 } }
        : undefined,
  },
  process.env.NODE_ENV === "development" ? undefined : pino.destination({ dest: 2, sync: true }),
);

/** Raise verbosity for --verbose runs. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}
