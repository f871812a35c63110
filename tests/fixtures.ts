import pino from "pino";
import type { Product } from "../src/types/product";

export const silentLogger = pino({ level: "silent" });

export const makeProduct = (
  overrides: Partial<Product> & Pick<Product, "id" | "name" | "price">
): Product => ({
  sku: `FF${String(overrides.id).padStart(3, "0")}`,
  description: overrides.name,
  category: "Burgers",
  tags: [],
  moodTags: [],
  ingredients: [],
  calories: 500,
  popularityScore: 50,
  spiceLevel: 0,
  chefSpecial: false,
  limitedTime: false,
  ...overrides,
});

export const veggiePizza = makeProduct({
  id: 1,
  name: "Veggie Pizza",
  price: 9,
  category: "Pizza",
  tags: ["vegan"],
});

export const spicyBurger = makeProduct({
  id: 2,
  name: "Spicy Burger",
  price: 12,
  category: "Burgers",
  tags: ["spicy"],
});

export const scenarioCatalog = (): Product[] => [veggiePizza, spicyBurger];
