export type Product = {
  id: number;
  sku: string;
  name: string;
  description: string;
  price: number;
  category: string;
  // dietary / spice tags, e.g. "vegan", "spicy", "gluten-free"
  tags: string[];
  // moods the dish suits, e.g. "comfort", "adventurous"
  moodTags: string[];
  ingredients: string[];
  calories: number;
  popularityScore: number;
  spiceLevel: number;
  chefSpecial: boolean;
  limitedTime: boolean;
};

export interface ProductFilter {
  maxPrice?: number;
  tags?: string[];
  category?: string;
  search?: string;
}
