import pino from "pino";

/** Structural subset of a pino logger; Fastify's request logger satisfies it too. */
export type AgentLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export function defaultLogLevel(): string {
  return process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info");
}

export function createLogger(opts: { level?: string; pretty?: boolean } = {}): pino.Logger {
  const level = opts.level ?? defaultLogLevel();
  if (opts.pretty) {
    return pino({
      level,
      transport: { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard" } },
    });
  }
  return pino({ level });
}

export const silentLogger: AgentLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/** First `max` characters, for logging message content without the full body. */
export function preview(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
