import pino from "pino";

const pretty = process.env.LOG_PRETTY === "1";

// Reports go to stdout, so every log line goes to stderr.
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    transport: pretty
      ? { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard", destination: 2 } }
      : undefined,
  },
  pretty ? undefined : pino.destination(2)
);

export function setLoggerContext(context: {
  command: string;
  region: string;
}): void {
  logger.setBindings(context);
}
