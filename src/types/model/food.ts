import type { FoodCategory } from "../../common/common-enum";

/**
 * Nutrient values per 100 g. `null` means the database has no value,
 * which is not the same as zero.
 */
export interface FoodNutrients {
  calories: number | null;
  protein: number | null;
  carbs: number | null;
  fat: number | null;
}

export interface FoodRecord {
  name: string;
  fdcId: number | null;
  dataType: string;
  nutrients: FoodNutrients;
}

export type AvailableFoods = Record<FoodCategory, FoodRecord[]>;
