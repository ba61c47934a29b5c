import pino from "pino";
import { z } from "zod";

const loggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  NODE_ENV: z.enum(["production", "development", "test"]).default("production"),
  VITEST: z.string().optional(),
});

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

function createRootLogger(): Logger {
  const env = loggerEnvSchema.parse(process.env);
  const isTestEnv = env.NODE_ENV === "test" || env.VITEST === "true";

  const options: pino.LoggerOptions = {
    base: { pid: process.pid },
    level: isTestEnv ? "silent" : env.LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // stdout is reserved for the rendered tree
  if (env.NODE_ENV === "development" && !isTestEnv) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2,
          ignore: "pid,hostname,category",
          messageFormat: "[{category}] {msg}",
          translateTime: "yyyy-mm-dd HH:MM:ss.l",
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  rootLogger ??= createRootLogger();
  const logger = rootLogger.child({ category });
  loggerCache.set(category, logger);
  return logger;
}
