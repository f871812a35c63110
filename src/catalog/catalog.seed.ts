import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Product } from "../types/product";

export const productSchema = z.object({
  id: z.number().int().positive(),
  sku: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  price: z.number().nonnegative(),
  category: z.string().min(1),
  tags: z.array(z.string()).default([]),
  moodTags: z.array(z.string()).default([]),
  ingredients: z.array(z.string()).default([]),
  calories: z.number().int().nonnegative().default(0),
  popularityScore: z.number().min(0).max(100).default(0),
  spiceLevel: z.number().int().min(0).max(10).default(0),
  chefSpecial: z.boolean().default(false),
  limitedTime: z.boolean().default(false),
});

export const DEFAULT_SEED_PATH = path.resolve(
  __dirname,
  "../../data/products.json"
);

export const loadSeedProducts = (
  filePath: string = DEFAULT_SEED_PATH
): Product[] => {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const products = z.array(productSchema).parse(raw);
  const ids = new Set<number>();
  for (const p of products) {
    if (ids.has(p.id)) throw new Error(`Duplicate product id ${p.id}`);
    ids.add(p.id);
  }
  return products;
};
