import { pino, type Logger } from "pino";

const IS_TEST =
  process.env.NODE_ENV === "test" || process.env.NODE_TEST_CONTEXT !== undefined;

const BASE_LEVEL = process.env.LOG_LEVEL ?? (IS_TEST ? "silent" : "info");

export type { Logger } from "pino";

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: BASE_LEVEL,
    transport:
      process.env.NODE_ENV === "production" || IS_TEST
        ? undefined
        : {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
            },
          },
  });
}
