import type { LevelWithSilent } from "pino";
import { z } from "zod";
import type { EngineOptions } from "../conversation/conversation.service";
import type { ScoreWeights } from "../recommendation/types";
import { parseScoreWeights } from "../recommendation/weights";

const optionalNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === undefined || v === "" ? undefined : Number(v)), schema);

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: optionalNumber(z.number().int().positive().default(4000)),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DATABASE_URL: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined)),
  RECS_TOP_N: optionalNumber(z.number().int().positive().default(5)),
  NEUTRAL_BASELINE_SCORE: optionalNumber(z.number().min(0).max(100).default(50)),
  TARGET_MATCH_RATIO: optionalNumber(z.number().gt(0).max(1).default(0.2)),
  MATCH_RATIO_SPREAD: optionalNumber(z.number().positive().default(0.1)),
  SCORE_WEIGHTS: z.string().optional(),
  CATALOG_CACHE_TTL_MS: optionalNumber(z.number().int().min(0).default(60000)),
  CONVERSATION_IDLE_MINUTES: optionalNumber(z.number().positive().default(30)),
});

export type AppConfig = {
  env: string;
  isProd: boolean;
  port: number;
  logLevel: LevelWithSilent;
  databaseUrl?: string;
  catalogCacheTtlMs: number;
  conversationIdleMinutes: number;
  engine: EngineOptions;
};

export const loadConfig = (
  source: Record<string, string | undefined> = process.env
): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid configuration: ${issue?.path.join(".")} ${issue?.message}`
    );
  }
  const env = parsed.data;
  let scoreWeights: ScoreWeights;
  try {
    scoreWeights = parseScoreWeights(env.SCORE_WEIGHTS);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration: SCORE_WEIGHTS ${message}`);
  }
  return {
    env: env.NODE_ENV,
    isProd: env.NODE_ENV.toLowerCase() === "production",
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL,
    catalogCacheTtlMs: env.CATALOG_CACHE_TTL_MS,
    conversationIdleMinutes: env.CONVERSATION_IDLE_MINUTES,
    engine: {
      topN: env.RECS_TOP_N,
      neutralBaselineScore: env.NEUTRAL_BASELINE_SCORE,
      targetMatchRatio: env.TARGET_MATCH_RATIO,
      matchRatioSpread: env.MATCH_RATIO_SPREAD,
      scoreWeights,
    },
  };
};
