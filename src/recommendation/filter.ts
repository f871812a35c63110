import type { Product } from "../types/product";
import {
  ConversationState,
  FilterName,
  FilterResult,
  PreferenceSignals,
} from "./types";

export const mergeTags = (a: readonly string[], b: readonly string[]) =>
  [...new Set([...a, ...b])].sort();

export const tightestBudget = (
  a: number | undefined,
  b: number | undefined
): number | undefined => {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
};

const withinBudget = (p: Product, budget: number | undefined) =>
  budget === undefined || p.price <= budget;

const overlapsTags = (p: Product, tags: readonly string[]) =>
  tags.length === 0 || p.tags.some((t) => tags.includes(t));

/**
 * Apply the hard filters (budget ceiling, required tags) for this turn.
 * Turn signals are combined with what the conversation has accumulated.
 * An empty result is relaxed by dropping tags, then budget.
 */
export const filterCatalog = (
  catalog: readonly Product[],
  signals: PreferenceSignals,
  state: Pick<ConversationState, "accumulatedTags" | "budgetCeiling">
): FilterResult => {
  const effectiveTags = mergeTags(state.accumulatedTags, signals.tags);
  const effectiveBudget = tightestBudget(
    signals.budgetCeiling,
    state.budgetCeiling
  );
  const hardFiltersActive =
    effectiveTags.length > 0 || effectiveBudget !== undefined;

  const base = {
    hardFiltersActive,
    effectiveTags,
    effectiveBudget,
  };

  const strict = catalog.filter(
    (p) => withinBudget(p, effectiveBudget) && overlapsTags(p, effectiveTags)
  );
  if (strict.length > 0 || catalog.length === 0 || !hardFiltersActive) {
    return { ...base, products: strict, relaxedFilters: false, droppedFilters: [] };
  }

  const dropped: FilterName[] = [];
  if (effectiveTags.length > 0) {
    dropped.push("tags");
    const budgetOnly = catalog.filter((p) => withinBudget(p, effectiveBudget));
    if (budgetOnly.length > 0) {
      return {
        ...base,
        products: budgetOnly,
        relaxedFilters: true,
        droppedFilters: dropped,
      };
    }
  }
  if (effectiveBudget !== undefined) dropped.push("budget");
  return {
    ...base,
    products: [...catalog],
    relaxedFilters: true,
    droppedFilters: dropped,
  };
};
