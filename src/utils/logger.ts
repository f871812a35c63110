import pino, { Logger, LevelWithSilent } from "pino";

const env = String(process.env.NODE_ENV || "development").toLowerCase();
const isProd = env === "production";
const isTest = env === "test";

export const logger = pino({
  level: isTest ? "silent" : "info",
  transport:
    isProd || isTest
      ? undefined
      : { target: "pino-pretty", options: { colorize: true } },
});

// Applies the validated LOG_LEVEL once configuration has loaded.
export const configureLogger = (
  level: LevelWithSilent,
  target: Logger = logger
): Logger => {
  target.level = level;
  return target;
};

export type { Logger } from "pino";
