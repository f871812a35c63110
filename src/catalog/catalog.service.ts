import type { Product, ProductFilter } from "../types/product";
import { CatalogRepository } from "./catalog.repository";

type Snapshot = {
  products: readonly Product[];
  loadedAt: number;
};

const freezeProduct = (p: Product): Product => {
  Object.freeze(p.tags);
  Object.freeze(p.moodTags);
  Object.freeze(p.ingredients);
  return Object.freeze(p);
};

export class CatalogService {
  private snapshot: Snapshot | null = null;

  constructor(
    private readonly repository: CatalogRepository,
    private readonly cacheTtlMs = 0
  ) {}

  async listProducts(filters: ProductFilter = {}): Promise<Product[]> {
    return this.repository.queryProducts(filters);
  }

  /**
   * Full catalog used for one turn, shared read-only between conversations.
   * Reused for cacheTtlMs when positive.
   */
  async getSnapshot(now: number = Date.now()): Promise<readonly Product[]> {
    if (
      this.cacheTtlMs > 0 &&
      this.snapshot &&
      now - this.snapshot.loadedAt <= this.cacheTtlMs
    ) {
      return this.snapshot.products;
    }
    const rows = await this.repository.queryProducts({});
    const products = Object.freeze(
      rows.map((p) =>
        freezeProduct({
          ...p,
          tags: [...p.tags],
          moodTags: [...p.moodTags],
          ingredients: [...p.ingredients],
        })
      )
    );
    if (this.cacheTtlMs > 0) this.snapshot = { products, loadedAt: now };
    return products;
  }

  invalidate(): void {
    this.snapshot = null;
  }
}
