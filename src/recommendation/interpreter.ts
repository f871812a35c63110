import {
  Enthusiasm,
  PreferenceSignals,
  Mood,
} from "./types";
import { getDefaultVocabulary, Vocabulary, VocabularyEntry } from "./vocabulary";

const AMOUNT = String.raw`\$?\s*(\d+(?:\.\d{1,2})?)`;

// "under $10", "below 10", "no more than 10 dollars", "budget of $10"
const BUDGET_PREFIX = new RegExp(
  String.raw`(?<![a-z])(?:under|below|less than|cheaper than|no more than|at most|up to|max(?:imum)?|within|budget(?: of| is)?)\s*` +
    AMOUNT,
  "g"
);
// "$10 or less", "10 bucks max"
const BUDGET_SUFFIX = new RegExp(
  AMOUNT +
    String.raw`\s*(?:dollars|bucks)?\s+(?:or less|or under|or below|max|tops)(?![a-z])`,
  "g"
);

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export const emptySignals = (): PreferenceSignals => ({
  tags: [],
  keywords: [],
  purchaseIntent: false,
  negativeSentiment: false,
  priceInquiry: false,
});

/**
 * Decode an utterance to text. Anything that is not a well-formed string is
 * treated as empty input.
 */
export const normalizeUtterance = (utterance: unknown): string => {
  if (typeof utterance !== "string") return "";
  if (LONE_SURROGATE.test(utterance)) return "";
  return utterance;
};

const lastMatch = <T extends string>(
  text: string,
  entries: VocabularyEntry<T>[]
): T | undefined => {
  let best: { index: number; length: number; value: T } | undefined;
  for (const entry of entries) {
    for (const m of text.matchAll(entry.pattern)) {
      const index = m.index ?? 0;
      const length = m[0].length;
      // later wins; at the same position the longer phrase wins
      if (
        !best ||
        index > best.index ||
        (index === best.index && length > best.length)
      ) {
        best = { index, length, value: entry.value };
      }
    }
  }
  return best?.value;
};

const countMatches = (text: string, patterns: RegExp[]): number =>
  patterns.reduce((n, p) => n + (text.match(p)?.length ?? 0), 0);

const anyMatch = (text: string, patterns: RegExp[]): boolean =>
  patterns.some((p) => text.search(p) !== -1);

export const extractBudget = (text: string): number | undefined => {
  let best: { index: number; value: number } | undefined;
  for (const re of [BUDGET_PREFIX, BUDGET_SUFFIX]) {
    for (const m of text.matchAll(re)) {
      const value = Number(m[1]);
      const index = m.index ?? 0;
      if (!Number.isFinite(value) || value <= 0) continue;
      if (!best || index >= best.index) best = { index, value };
    }
  }
  return best?.value;
};

export const extractEnthusiasm = (
  text: string,
  vocabulary: Vocabulary
): Enthusiasm | undefined => {
  const points =
    countMatches(text, vocabulary.intensifiers) +
    (text.match(/!{2,}/g)?.length ?? 0);
  if (points >= 2) return "high";
  if (points === 1) return "medium";
  if (anyMatch(text, vocabulary.dampeners)) return "low";
  return undefined;
};

const extractKeywords = (text: string, vocabulary: Vocabulary): string[] => {
  const seen = new Set<string>();
  for (const raw of text.match(/[a-z][a-z'-]*/g) ?? []) {
    const word = raw.replace(/^['-]+|['-]+$/g, "");
    if (word.length < 3 || vocabulary.stopWords.has(word)) continue;
    seen.add(word);
  }
  return [...seen];
};

/**
 * Rule-based extraction of preference signals from one chat message.
 * When two moods or two categories are mentioned the last one wins.
 */
export const interpret = (
  utterance: unknown,
  vocabulary: Vocabulary = getDefaultVocabulary()
): PreferenceSignals => {
  const text = normalizeUtterance(utterance).toLowerCase();
  const signals = emptySignals();
  if (!text.trim()) return signals;

  const mood: Mood | undefined = lastMatch(text, vocabulary.moods);
  if (mood) signals.mood = mood;

  const budget = extractBudget(text);
  if (budget !== undefined) signals.budgetCeiling = budget;

  const tags = new Set<string>();
  for (const entry of vocabulary.tags) {
    if (text.search(entry.pattern) !== -1) tags.add(entry.value);
  }
  signals.tags = [...tags].sort();

  const enthusiasm = extractEnthusiasm(text, vocabulary);
  if (enthusiasm) signals.enthusiasm = enthusiasm;

  const category = lastMatch(text, vocabulary.categories);
  if (category) signals.category = category;

  signals.keywords = extractKeywords(text, vocabulary);
  signals.purchaseIntent = anyMatch(text, vocabulary.purchaseIntent);
  signals.negativeSentiment = anyMatch(text, vocabulary.negativeSentiment);
  signals.priceInquiry = anyMatch(text, vocabulary.priceInquiry);

  return signals;
};
