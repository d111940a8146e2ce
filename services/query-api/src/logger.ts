import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

export type CreateLoggerOptions = {
  name?: string;
  level?: string;
  destination?: DestinationStream;
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";

  if (options.destination) {
    return pino({ name: options.name, level }, options.destination);
  }

  return pino({
    name: options.name,
    level,
    transport:
      process.env.NODE_ENV === "development" ? { target: "pino-pretty" } : undefined,
  });
}
