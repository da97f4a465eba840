import { z } from "zod";
import { Cuisine, FoodCategory } from "../common/common-enum";
import cuisineFoodsData from "../data/cuisine-foods.json";
import foodKeywordsData from "../data/food-keywords.json";
import { AvailableFoods, FoodRecord } from "../types/model/food";
import { logger } from "../utils/logger";
import { PANTRY_LIMITS } from "../utils/nutritionConstants";
import { FoodSearch } from "./foodSearch.service";

const termListSchema = z.array(z.string().min(1));
const categoryTermsSchema = z.record(z.nativeEnum(FoodCategory), termListSchema);

const cuisineFoodsSchema = z.object({
  cuisines: z.record(z.nativeEnum(Cuisine), termListSchema),
  universal: categoryTermsSchema,
});

const cuisineFoods = cuisineFoodsSchema.parse(cuisineFoodsData);
const foodKeywords = categoryTermsSchema.parse(foodKeywordsData);

// Checked in this order; the first category with a matching keyword wins
const CATEGORY_ORDER = [
  FoodCategory.PROTEINS,
  FoodCategory.CARBS,
  FoodCategory.VEGETABLES,
  FoodCategory.FATS,
];

export const emptyPantry = (): AvailableFoods => ({
  [FoodCategory.PROTEINS]: [],
  [FoodCategory.CARBS]: [],
  [FoodCategory.VEGETABLES]: [],
  [FoodCategory.FATS]: [],
});

export function cuisineSearchTerms(cuisine: Cuisine): string[] {
  return cuisineFoods.cuisines[cuisine] ?? [];
}

/**
 * Categorize a food by keywords in its name, then by its dominant macro.
 * Falls back to proteins.
 */
export function categorizeFood(food: FoodRecord): FoodCategory {
  const name = food.name.toLowerCase();

  for (const category of CATEGORY_ORDER) {
    const keywords = foodKeywords[category] ?? [];
    if (keywords.some((keyword) => name.includes(keyword))) {
      return category;
    }
  }

  const calories = food.nutrients.calories ?? 0;
  if (calories > 0) {
    const protein = food.nutrients.protein ?? 0;
    const carbs = food.nutrients.carbs ?? 0;
    const fat = food.nutrients.fat ?? 0;

    if ((protein * 4) / calories > 0.3) return FoodCategory.PROTEINS;
    if ((fat * 9) / calories > 0.5) return FoodCategory.FATS;
    if ((carbs * 4) / calories > 0.4) return FoodCategory.CARBS;
    if (carbs < 10 && calories < 50) return FoodCategory.VEGETABLES;
  }

  return FoodCategory.PROTEINS;
}

/**
 * Builds the list of real foods a meal plan may draw from
 */
export class AvailableFoodsService {
  constructor(private readonly foodSearch: FoodSearch) {}

  async gatherAvailableFoods(cuisine: Cuisine): Promise<AvailableFoods> {
    const pantry = emptyPantry();
    const seen = new Set<string>();

    const add = (category: FoodCategory, food: FoodRecord) => {
      const key = food.name.toLowerCase();
      if (seen.has(key)) return;
      seen.add(key);
      pantry[category].push(food);
    };

    const results = await Promise.all(
      cuisineSearchTerms(cuisine).map((term) =>
        this.foodSearch.search(term, PANTRY_LIMITS.RESULTS_PER_TERM)
      )
    );

    for (const food of results.flat()) {
      const category = categorizeFood(food);
      if (pantry[category].length < PANTRY_LIMITS.MAX_PER_CATEGORY) {
        add(category, food);
      }
    }

    await this.topUpThinCategories(pantry, add);

    const total = Object.values(pantry).reduce((sum, foods) => sum + foods.length, 0);
    logger.info(
      `Gathered ${total} foods for ${cuisine} cuisine`,
      CATEGORY_ORDER.map((c) => `${c}=${pantry[c].length}`).join(" ")
    );
    return pantry;
  }

  /**
   * Categories with fewer than the minimum get universal staples, up to
   * the top-up target.
   */
  private async topUpThinCategories(
    pantry: AvailableFoods,
    add: (category: FoodCategory, food: FoodRecord) => void
  ): Promise<void> {
    for (const category of CATEGORY_ORDER) {
      if (pantry[category].length >= PANTRY_LIMITS.MIN_PER_CATEGORY) continue;

      for (const term of cuisineFoods.universal[category] ?? []) {
        if (pantry[category].length >= PANTRY_LIMITS.TOP_UP_TARGET) break;

        const alreadyListed = pantry[category].some((food) =>
          food.name.toLowerCase().includes(term)
        );
        if (alreadyListed) continue;

        const [food] = await this.foodSearch.search(term, 1);
        if (food) add(category, food);
      }
    }
  }
}
