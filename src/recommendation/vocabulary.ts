import fs from "fs";
import path from "path";
import { z } from "zod";
import { MOODS, Mood } from "./types";

const entrySchema = z.object({
  keyword: z.string().min(1),
  value: z.string().min(1),
});

const vocabularySchema = z.object({
  version: z.string().min(1),
  moods: z.array(entrySchema.extend({ value: z.enum(MOODS) })),
  tags: z.array(entrySchema),
  categories: z.array(entrySchema),
  moodCategoryAffinity: z.record(z.enum(MOODS), z.array(z.string())),
  intensifiers: z.array(z.string().min(1)),
  dampeners: z.array(z.string().min(1)),
  purchaseIntent: z.array(z.string().min(1)),
  negativeSentiment: z.array(z.string().min(1)),
  priceInquiry: z.array(z.string().min(1)),
  stopWords: z.array(z.string().min(1)),
});

export type VocabularyFile = z.infer<typeof vocabularySchema>;

export type VocabularyEntry<T extends string = string> = {
  keyword: string;
  value: T;
  pattern: RegExp;
};

export type Vocabulary = {
  version: string;
  moods: VocabularyEntry<Mood>[];
  tags: VocabularyEntry[];
  categories: VocabularyEntry[];
  moodCategoryAffinity: Partial<Record<Mood, string[]>>;
  intensifiers: RegExp[];
  dampeners: RegExp[];
  purchaseIntent: RegExp[];
  negativeSentiment: RegExp[];
  priceInquiry: RegExp[];
  stopWords: Set<string>;
};

export const DEFAULT_VOCABULARY_PATH = path.resolve(
  __dirname,
  "../../data/vocabulary.json"
);

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Whole-word, case-insensitive pattern for a keyword or phrase. Hyphens and
 * apostrophes count as word characters so "gluten-free" does not match "free".
 */
export const keywordPattern = (keyword: string): RegExp =>
  new RegExp(
    `(?<![a-z0-9'-])${escapeRegExp(keyword.toLowerCase())}(?![a-z0-9'-])`,
    "g"
  );

export const compileVocabulary = (file: VocabularyFile): Vocabulary => {
  const compile = <T extends string>(e: { keyword: string; value: T }) => ({
    keyword: e.keyword.toLowerCase(),
    value: e.value,
    pattern: keywordPattern(e.keyword),
  });
  return {
    version: file.version,
    moods: file.moods.map(compile),
    tags: file.tags.map(compile),
    categories: file.categories.map(compile),
    moodCategoryAffinity: file.moodCategoryAffinity,
    intensifiers: file.intensifiers.map(keywordPattern),
    dampeners: file.dampeners.map(keywordPattern),
    purchaseIntent: file.purchaseIntent.map(keywordPattern),
    negativeSentiment: file.negativeSentiment.map(keywordPattern),
    priceInquiry: file.priceInquiry.map(keywordPattern),
    stopWords: new Set(file.stopWords.map((w) => w.toLowerCase())),
  };
};

export const parseVocabulary = (raw: unknown): Vocabulary =>
  compileVocabulary(vocabularySchema.parse(raw));

export const loadVocabulary = (
  filePath: string = DEFAULT_VOCABULARY_PATH
): Vocabulary => {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return parseVocabulary(raw);
};

let defaultVocabulary: Vocabulary | null = null;

export const getDefaultVocabulary = (): Vocabulary => {
  if (!defaultVocabulary) defaultVocabulary = loadVocabulary();
  return defaultVocabulary;
};
