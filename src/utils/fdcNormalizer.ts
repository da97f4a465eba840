import { FoodNutrients, FoodRecord } from "../types/model/food";
import { FdcFood, FdcFoodNutrient } from "../types/model/fdc";

// FoodData Central nutrient ids, in order of preference per nutrient
const NUTRIENT_IDS: Record<keyof FoodNutrients, number[]> = {
  calories: [1008, 2047, 2048],
  protein: [1003],
  carbs: [1005],
  fat: [1004],
};

const matchesByName = (
  key: keyof FoodNutrients,
  nutrient: FdcFoodNutrient
): boolean => {
  const name = (nutrient.nutrientName || "").toLowerCase();
  switch (key) {
    case "calories":
      return (
        name.includes("energy") &&
        (nutrient.unitName || "").toLowerCase() === "kcal"
      );
    case "protein":
      return name.includes("protein");
    case "carbs":
      return name.includes("carbohydrate");
    case "fat":
      return name.includes("total lipid") || name.includes("fat, total");
  }
};

const roundNutrient = (key: keyof FoodNutrients, value: number): number =>
  key === "calories" ? Math.round(value) : Math.round(value * 10) / 10;

/**
 * Pick the four tracked nutrients out of an FDC nutrient list. Nutrients the
 * record does not report stay `null`; a reported zero stays 0.
 */
export function extractNutrients(
  foodNutrients: FdcFoodNutrient[]
): FoodNutrients {
  const reported = foodNutrients.filter(
    (n): n is FdcFoodNutrient & { value: number } =>
      typeof n.value === "number" && Number.isFinite(n.value)
  );

  const byId = new Map<number, number>();
  for (const nutrient of reported) {
    if (nutrient.nutrientId !== undefined && !byId.has(nutrient.nutrientId)) {
      byId.set(nutrient.nutrientId, nutrient.value);
    }
  }

  const resolve = (key: keyof FoodNutrients): number | null => {
    for (const id of NUTRIENT_IDS[key]) {
      const value = byId.get(id);
      if (value !== undefined) return roundNutrient(key, value);
    }
    const named = reported.find((n) => matchesByName(key, n));
    return named ? roundNutrient(key, named.value) : null;
  };

  return {
    calories: resolve("calories"),
    protein: resolve("protein"),
    carbs: resolve("carbs"),
    fat: resolve("fat"),
  };
}

const hasAnyNutrient = (nutrients: FoodNutrients): boolean =>
  Object.values(nutrients).some((value) => value !== null);

/**
 * Turn raw search hits into usable records: described, de-duplicated by
 * name (case-insensitive), with at least one known nutrient.
 */
export function normalizeFoods(foods: FdcFood[], maxResults: number): FoodRecord[] {
  const records: FoodRecord[] = [];
  const seenNames = new Set<string>();

  for (const food of foods) {
    if (records.length >= maxResults) break;

    const name = (food.description || "").trim();
    if (!name) continue;

    const key = name.toLowerCase();
    if (seenNames.has(key)) continue;

    const nutrients = extractNutrients(food.foodNutrients || []);
    if (!hasAnyNutrient(nutrients)) continue;

    seenNames.add(key);
    records.push({
      name,
      fdcId: food.fdcId ?? null,
      dataType: food.dataType || "Unknown",
      nutrients,
    });
  }

  return records;
}
