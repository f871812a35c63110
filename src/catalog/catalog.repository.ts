import type { Pool } from "pg";
import type { Product, ProductFilter } from "../types/product";
import { StoreUnavailableError } from "../utils/store-error";
import { loadSeedProducts } from "./catalog.seed";

/**
 * Read-only product catalog. Each call returns a complete snapshot of the
 * rows matching the filter.
 */
export interface CatalogRepository {
  queryProducts(filters?: ProductFilter): Promise<Product[]>;
}

export const matchesFilter = (p: Product, filters: ProductFilter): boolean => {
  if (filters.maxPrice !== undefined && p.price > filters.maxPrice) return false;
  if (filters.tags && filters.tags.length) {
    const wanted = filters.tags;
    if (!p.tags.some((t) => wanted.includes(t))) return false;
  }
  if (
    filters.category &&
    p.category.toLowerCase() !== filters.category.toLowerCase()
  ) {
    return false;
  }
  if (filters.search && filters.search.trim()) {
    const q = filters.search.trim().toLowerCase();
    if (
      !p.name.toLowerCase().includes(q) &&
      !p.description.toLowerCase().includes(q)
    ) {
      return false;
    }
  }
  return true;
};

export class InMemoryCatalogRepository implements CatalogRepository {
  private readonly products: Product[];

  constructor(products: Product[] = loadSeedProducts()) {
    this.products = [...products].sort((a, b) => a.id - b.id);
  }

  async queryProducts(filters: ProductFilter = {}): Promise<Product[]> {
    return this.products.filter((p) => matchesFilter(p, filters));
  }
}

type ProductRow = {
  id: number;
  sku: string;
  name: string;
  description: string | null;
  price: string | number;
  category: string;
  tags: string[] | null;
  mood_tags: string[] | null;
  ingredients: string[] | null;
  calories: number | null;
  popularity_score: number | null;
  spice_level: number | null;
  chef_special: boolean;
  limited_time: boolean;
};

const toProduct = (row: ProductRow): Product => ({
  id: Number(row.id),
  sku: row.sku,
  name: row.name,
  description: row.description ?? "",
  // NUMERIC comes back from pg as a string
  price: Number(row.price),
  category: row.category,
  tags: row.tags ?? [],
  moodTags: row.mood_tags ?? [],
  ingredients: row.ingredients ?? [],
  calories: row.calories ?? 0,
  popularityScore: row.popularity_score ?? 0,
  spiceLevel: row.spice_level ?? 0,
  chefSpecial: row.chef_special,
  limitedTime: row.limited_time,
});

export const buildWhere = (
  filters: ProductFilter
): { clause: string; params: unknown[] } => {
  const conditions: string[] = [];
  const params: unknown[] = [];
  if (filters.maxPrice !== undefined) {
    params.push(filters.maxPrice);
    conditions.push(`price <= $${params.length}`);
  }
  if (filters.tags && filters.tags.length) {
    params.push(filters.tags);
    conditions.push(`tags && $${params.length}::text[]`);
  }
  if (filters.category) {
    params.push(filters.category);
    conditions.push(`lower(category) = lower($${params.length})`);
  }
  if (filters.search && filters.search.trim()) {
    params.push(`%${filters.search.trim()}%`);
    conditions.push(
      `(name ILIKE $${params.length} OR description ILIKE $${params.length})`
    );
  }
  return {
    clause: conditions.length ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
};

export class PgCatalogRepository implements CatalogRepository {
  constructor(private readonly pool: Pool) {}

  async queryProducts(filters: ProductFilter = {}): Promise<Product[]> {
    const { clause, params } = buildWhere(filters);
    try {
      const result = await this.pool.query<ProductRow>(
        `SELECT id, sku, name, description, price, category, tags, mood_tags,
                ingredients, calories, popularity_score, spice_level,
                chef_special, limited_time
           FROM products ${clause}
          ORDER BY id ASC`,
        params
      );
      return result.rows.map(toProduct);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new StoreUnavailableError("catalog", `Catalog query failed: ${message}`);
    }
  }

  async upsertProducts(products: Product[]): Promise<number> {
    let count = 0;
    for (const p of products) {
      await this.pool.query(
        `INSERT INTO products (id, sku, name, description, price, category, tags,
                               mood_tags, ingredients, calories, popularity_score,
                               spice_level, chef_special, limited_time)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
         ON CONFLICT (id) DO UPDATE SET
           sku = EXCLUDED.sku, name = EXCLUDED.name,
           description = EXCLUDED.description, price = EXCLUDED.price,
           category = EXCLUDED.category, tags = EXCLUDED.tags,
           mood_tags = EXCLUDED.mood_tags, ingredients = EXCLUDED.ingredients,
           calories = EXCLUDED.calories,
           popularity_score = EXCLUDED.popularity_score,
           spice_level = EXCLUDED.spice_level,
           chef_special = EXCLUDED.chef_special,
           limited_time = EXCLUDED.limited_time`,
        [
          p.id,
          p.sku,
          p.name,
          p.description,
          p.price,
          p.category,
          p.tags,
          p.moodTags,
          p.ingredients,
          p.calories,
          p.popularityScore,
          p.spiceLevel,
          p.chefSpecial,
          p.limitedTime,
        ]
      );
      count += 1;
    }
    return count;
  }
}
