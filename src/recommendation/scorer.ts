import {
  ENTHUSIASM_ORDINAL,
  PreferenceSignals,
  ScoreWeights,
  SignalDimension,
} from "./types";

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export type ScoreInput = {
  prior: number;
  signals: PreferenceSignals;
  matchCount: number;
  catalogSize: number;
  // dimensions specified in earlier turns of the conversation
  specifiedDimensions: readonly SignalDimension[];
  hardFiltersActive: boolean;
  relaxedFilters: boolean;
};

export type ScoreOptions = {
  weights: ScoreWeights;
  targetMatchRatio: number;
  matchRatioSpread: number;
};

export type ScoreBreakdown = {
  newDimensions: SignalDimension[];
  newDimensionBonus: number;
  enthusiasmBonus: number;
  matchRatio: number;
  matchBonus: number;
  intentBonus: number;
  penalty: number;
};

export const clampScore = (value: number): number =>
  Math.min(MAX_SCORE, Math.max(MIN_SCORE, value));

const round2 = (value: number) => Math.round(value * 100) / 100;

export const presentDimensions = (
  signals: PreferenceSignals
): SignalDimension[] => {
  const dims: SignalDimension[] = [];
  if (signals.mood !== undefined) dims.push("mood");
  if (signals.budgetCeiling !== undefined) dims.push("budget");
  if (signals.tags.length > 0) dims.push("tags");
  if (signals.enthusiasm !== undefined) dims.push("enthusiasm");
  return dims;
};

/**
 * Bell-shaped bonus factor in (0, 1], peaking when the matching share of the
 * catalog equals the target ratio.
 */
export const matchRatioFactor = (
  ratio: number,
  target: number,
  spread: number
): number => {
  if (spread <= 0) return ratio === target ? 1 : 0;
  const d = ratio - target;
  return Math.exp(-(d * d) / (2 * spread * spread));
};

export const scoreInterest = (
  input: ScoreInput,
  options: ScoreOptions
): { score: number; delta: number; breakdown: ScoreBreakdown } => {
  const { signals } = input;
  const w = options.weights;

  const newDimensions = presentDimensions(signals).filter(
    (d) => !input.specifiedDimensions.includes(d)
  );
  const newDimensionBonus = newDimensions.reduce((sum, d) => sum + w[d], 0);

  const enthusiasmBonus =
    signals.enthusiasm !== undefined
      ? w.enthusiasmLevel * ENTHUSIASM_ORDINAL[signals.enthusiasm]
      : 0;

  const matchRatio =
    input.catalogSize > 0 ? input.matchCount / input.catalogSize : 0;
  // match quality only counts when the user actually narrowed the catalog
  const matchBonus =
    input.hardFiltersActive && !input.relaxedFilters && input.catalogSize > 0
      ? w.matchRatio *
        matchRatioFactor(
          matchRatio,
          options.targetMatchRatio,
          options.matchRatioSpread
        )
      : 0;

  const intentBonus =
    (signals.purchaseIntent ? w.purchaseIntent : 0) +
    (signals.priceInquiry ? w.priceInquiry : 0);

  const penalty =
    (input.relaxedFilters ? w.relaxationPenalty : 0) +
    (signals.negativeSentiment ? w.negativeSentiment : 0);

  const delta =
    newDimensionBonus + enthusiasmBonus + matchBonus + intentBonus - penalty;
  const score = round2(clampScore(input.prior + delta));

  return {
    score,
    delta,
    breakdown: {
      newDimensions,
      newDimensionBonus,
      enthusiasmBonus,
      matchRatio,
      matchBonus,
      intentBonus,
      penalty,
    },
  };
};
