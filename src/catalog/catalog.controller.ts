import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { ProductFilter } from "../types/product";
import { CatalogService } from "./catalog.service";

// Accepts CSV strings or repeated query params
const normArray = (v: unknown): string[] | undefined => {
  if (v === undefined || v === null) return undefined;
  if (Array.isArray(v))
    return v.filter((x): x is string => typeof x === "string");
  if (typeof v === "string") {
    if (v.trim() === "") return undefined;
    return v
      .split(",")
      .map((x) => x.trim())
      .filter(Boolean);
  }
  return undefined;
};

const querySchema = z.object({
  maxPrice: z.coerce.number().nonnegative().optional(),
  category: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).optional(),
});

export const createCatalogRouter = (service: CatalogService) => {
  const router = Router();

  // GET /api/products
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = querySchema.parse(req.query);
      const filters: ProductFilter = { ...query, tags: normArray(req.query.tags) };
      const data = await service.listProducts(filters);
      res.status(200).json({ data, meta: { total: data.length } });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
