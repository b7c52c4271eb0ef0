import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Also append log lines to this file */
  logFile?: string;
}

/**
 * Pino logger writing to stderr, and to a log file when one is configured.
 * Stdout stays free for the build result.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = levelFromEnv(process.env.LOG_LEVEL), logFile } = options;

  const streams: pino.StreamEntry[] = [{ level: "trace", stream: process.stderr }];
  if (logFile) {
    streams.push({
      level: "trace",
      stream: pino.destination({ dest: logFile, sync: true, mkdir: true }),
    });
  }

  return pino(
    {
      level,
      timestamp: () => `,"time":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    },
    pino.multistream(streams)
  );
}

function levelFromEnv(value: string | undefined): LevelWithSilent {
  switch (value) {
    case "fatal":
    case "error":
    case "warn":
    case "info":
    case "debug":
    case "trace":
    case "silent":
      return value;
    default:
      return "info";
  }
}

/**
 * Process-wide logger, used until the CLI has read its configuration
 */
export const logger = createLogger();
