import pino, { type Logger } from "pino";

export function createLogger(opts: { level?: string; name?: string } = {}): Logger {
  return pino({
    name: opts.name ?? "creative-pipeline",
    level: opts.level ?? process.env.LOG_LEVEL ?? "info",
  });
}
