import type { Product } from "../types/product";
import { Mood, PreferenceSignals, RankWeights, Recommendation } from "./types";
import { defaultRankWeights } from "./weights";

export const DEFAULT_TOP_N = 5;

export type RankOptions = {
  weights?: RankWeights;
  moodCategoryAffinity?: Partial<Record<Mood, string[]>>;
  // tag set and budget the filter actually applied; default to the turn's own
  tags?: readonly string[];
  budgetCeiling?: number;
};

const round4 = (v: number) => Math.round(v * 10000) / 10000;

export const tagOverlap = (product: Product, tags: readonly string[]) =>
  product.tags.filter((t) => tags.includes(t)).length;

export const moodAffinity = (
  product: Product,
  mood: Mood | undefined,
  affinity: Partial<Record<Mood, string[]>>
): number => {
  if (!mood) return 0;
  if (product.moodTags.includes(mood)) return 1;
  return affinity[mood]?.includes(product.category) ? 0.5 : 0;
};

// Closer to the ceiling (but not over) is better value.
export const budgetValue = (price: number, budget: number | undefined) => {
  if (budget === undefined || budget <= 0 || price > budget) return 0;
  return price / budget;
};

export const keywordHits = (product: Product, keywords: readonly string[]) => {
  const name = product.name.toLowerCase();
  const description = product.description.toLowerCase();
  const ingredients = product.ingredients.map((i) => i.toLowerCase());
  let hits = 0;
  for (const kw of keywords) {
    if (name.includes(kw)) hits += 1;
    if (description.includes(kw)) hits += 1;
    if (ingredients.some((i) => i.includes(kw))) hits += 1;
  }
  return hits;
};

export const computeMatchScore = (
  product: Product,
  signals: PreferenceSignals,
  options: RankOptions = {}
): number => {
  const w = options.weights ?? defaultRankWeights();
  const tags = options.tags ?? signals.tags;
  const budget = options.budgetCeiling ?? signals.budgetCeiling;
  const score =
    w.tagOverlap * tagOverlap(product, tags) +
    w.mood *
      moodAffinity(product, signals.mood, options.moodCategoryAffinity ?? {}) +
    w.budget * budgetValue(product.price, budget) +
    w.category *
      (signals.category !== undefined && product.category === signals.category
        ? 1
        : 0) +
    w.keyword * keywordHits(product, signals.keywords) +
    w.popularity * (product.popularityScore / 100);
  return round4(score);
};

/**
 * Order the filtered products by match score (descending, ties by id
 * ascending) and keep the first topN. An empty input is a valid outcome.
 */
export const rankProducts = (
  filtered: readonly Product[],
  signals: PreferenceSignals,
  topN: number = DEFAULT_TOP_N,
  options: RankOptions = {}
): Recommendation[] => {
  if (filtered.length === 0 || topN <= 0) return [];
  const items = filtered.map((product) => ({
    product,
    matchScore: computeMatchScore(product, signals, options),
  }));

  items.sort((a, b) => {
    if (b.matchScore !== a.matchScore) return b.matchScore - a.matchScore;
    return a.product.id - b.product.id;
  });

  return items
    .slice(0, Math.floor(topN))
    .map((item, i) => ({ ...item, rank: i + 1 }));
};
