import { RankWeights, ScoreWeights } from "./types";
import { HttpError } from "../utils/http-error";

// Bonuses for newly specified dimensions (mood, budget, tags, enthusiasm)
// plus per-turn adjustments. Penalties are stored as positive magnitudes.
const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
  mood: 8,
  budget: 8,
  tags: 8,
  enthusiasm: 4,
  enthusiasmLevel: 3,
  matchRatio: 6,
  relaxationPenalty: 5,
  purchaseIntent: 12,
  priceInquiry: 4,
  negativeSentiment: 10,
};

const DEFAULT_RANK_WEIGHTS: RankWeights = {
  tagOverlap: 3,
  mood: 2,
  budget: 2,
  category: 2.5,
  keyword: 1,
  popularity: 1,
};

const SCORE_WEIGHT_KEYS: readonly (keyof ScoreWeights)[] = [
  "mood",
  "budget",
  "tags",
  "enthusiasm",
  "enthusiasmLevel",
  "matchRatio",
  "relaxationPenalty",
  "purchaseIntent",
  "priceInquiry",
  "negativeSentiment",
];

const isScoreWeightKey = (k: string): k is keyof ScoreWeights =>
  SCORE_WEIGHT_KEYS.some((key) => key === k);

/**
 * Accepts "mood:8,budget:6" or a partial object. Unknown keys are ignored,
 * negative, infinite or non-numeric values are rejected.
 */
export const parseScoreWeights = (
  input: string | Partial<ScoreWeights> | undefined
): ScoreWeights => {
  if (!input) return { ...DEFAULT_SCORE_WEIGHTS };
  const result: ScoreWeights = { ...DEFAULT_SCORE_WEIGHTS };
  if (typeof input === "string") {
    const s = input.trim();
    if (!s) return result;
    const parts = s.split(",").map((p) => p.trim()).filter(Boolean);
    for (const part of parts) {
      const [k, v] = part.split(":");
      if (!k || v === undefined) continue;
      const num = Number(v);
      if (!Number.isFinite(num) || num < 0) throw new HttpError(400, "Invalid weights");
      const key = k.trim();
      if (isScoreWeightKey(key)) result[key] = num;
    }
    return result;
  }
  for (const key of SCORE_WEIGHT_KEYS) {
    const v = input[key];
    if (v === undefined) continue;
    if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
      throw new HttpError(400, "Invalid weights");
    }
    result[key] = v;
  }
  return result;
};

export const defaultScoreWeights = (): ScoreWeights => ({
  ...DEFAULT_SCORE_WEIGHTS,
});

export const defaultRankWeights = (): RankWeights => ({
  ...DEFAULT_RANK_WEIGHTS,
});
