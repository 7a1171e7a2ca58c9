import pino from "pino";

/**
 * Structural logger accepted by the control plane. Both a pino instance and a
 * Fastify request logger satisfy it.
 */
export type SessionLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => SessionLogger;
};

export function createLogger(name = "autoauth"): pino.Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const level =
    process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : isDev ? "debug" : "info");

  return pino({
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}
