import pino, { type LoggerOptions } from "pino";

/** The slice of a pino logger that components depend on. */
export type Logger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

// Fastify builds its pino instance from these; components share `app.log`.
export function loggerOptions(args: { level?: string; pretty?: boolean; isDev?: boolean } = {}): LoggerOptions {
  const isDev = args.isDev ?? process.env.NODE_ENV !== "production";
  return {
    level: args.level ?? (isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && args.pretty
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
  };
}

export const silentLogger = (): Logger => pino({ level: "silent" });
