import { randomUUID } from "crypto";
import { mergeTags, tightestBudget } from "./filter";
import { presentDimensions, clampScore } from "./scorer";
import { ConversationState, PreferenceSignals, SignalDimension } from "./types";

export const DEFAULT_BASELINE_SCORE = 50;

export const createConversationState = (
  conversationId: string,
  baseline: number = DEFAULT_BASELINE_SCORE,
  now: number = Date.now(),
  sessionId: string = randomUUID()
): ConversationState => ({
  conversationId,
  sessionId,
  score: clampScore(baseline),
  turnIndex: 0,
  accumulatedTags: [],
  specifiedDimensions: [],
  scoreHistory: [],
  updatedAt: now,
});

/**
 * Produce the state after one processed turn. The input state is not
 * modified.
 */
export const advanceConversationState = (
  state: ConversationState,
  signals: PreferenceSignals,
  score: number,
  now: number = Date.now()
): ConversationState => {
  const dims = new Set<SignalDimension>(state.specifiedDimensions);
  for (const d of presentDimensions(signals)) dims.add(d);
  const next: ConversationState = {
    ...state,
    score: clampScore(score),
    turnIndex: state.turnIndex + 1,
    accumulatedTags: mergeTags(state.accumulatedTags, signals.tags),
    specifiedDimensions: [...dims],
    scoreHistory: [...state.scoreHistory, clampScore(score)],
    updatedAt: now,
  };
  const budget = tightestBudget(state.budgetCeiling, signals.budgetCeiling);
  if (budget !== undefined) next.budgetCeiling = budget;
  if (signals.mood !== undefined) next.mood = signals.mood;
  return next;
};
