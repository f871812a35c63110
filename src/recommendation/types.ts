import type { Product } from "../types/product";

export const MOODS = [
  "comfort",
  "adventurous",
  "spicy",
  "healthy",
  "indulgent",
] as const;

export type Mood = (typeof MOODS)[number];

export type Enthusiasm = "low" | "medium" | "high";

export const ENTHUSIASM_ORDINAL: Record<Enthusiasm, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

// Dimensions that earn a one-time bonus the first turn they are specified.
export type SignalDimension = "mood" | "budget" | "tags" | "enthusiasm";

export type PreferenceSignals = {
  mood?: Mood;
  budgetCeiling?: number;
  // sorted, de-duplicated; empty means unspecified
  tags: string[];
  enthusiasm?: Enthusiasm;
  category?: string;
  keywords: string[];
  purchaseIntent: boolean;
  negativeSentiment: boolean;
  priceInquiry: boolean;
};

export type ConversationState = {
  conversationId: string;
  // New for every state created under an id, so a reused id starts a
  // separate log series.
  sessionId: string;
  score: number;
  turnIndex: number;
  accumulatedTags: string[];
  budgetCeiling?: number;
  mood?: Mood;
  specifiedDimensions: SignalDimension[];
  scoreHistory: number[];
  updatedAt: number;
};

export type FilterName = "tags" | "budget";

export type FilterResult = {
  products: Product[];
  relaxedFilters: boolean;
  droppedFilters: FilterName[];
  // true when a budget or tag constraint applied before any relaxation
  hardFiltersActive: boolean;
  effectiveTags: string[];
  effectiveBudget?: number;
};

export type ScoreWeights = {
  mood: number;
  budget: number;
  tags: number;
  enthusiasm: number;
  enthusiasmLevel: number;
  matchRatio: number;
  relaxationPenalty: number;
  purchaseIntent: number;
  priceInquiry: number;
  negativeSentiment: number;
};

export type RankWeights = {
  tagOverlap: number;
  mood: number;
  budget: number;
  category: number;
  keyword: number;
  popularity: number;
};

export type Recommendation = {
  product: Product;
  matchScore: number;
  rank: number;
};

export type TurnRecord = {
  conversationId: string;
  sessionId: string;
  turnIndex: number;
  utterance: string;
  signals: PreferenceSignals;
  score: number;
  recommendations: Recommendation[];
  relaxedFilters: boolean;
  reply: string;
  timestamp: string;
};

export type TurnFailureKind = "CATALOG_UNAVAILABLE";

export type TurnSuccess = {
  ok: true;
  conversationId: string;
  turnIndex: number;
  score: number;
  recommendations: Recommendation[];
  relaxedFilters: boolean;
  droppedFilters: FilterName[];
  signals: PreferenceSignals;
  reply: string;
  logPersisted: boolean;
};

export type TurnFailure = {
  ok: false;
  error: { kind: TurnFailureKind; message: string };
};

export type TurnResult = TurnSuccess | TurnFailure;
