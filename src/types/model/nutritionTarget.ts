/**
 * Daily targets as returned to the client. Field names are part of the
 * HTTP contract.
 */
export interface MacroTargets {
  calories: number;
  protein_g: number;
  carbs_g: number;
  fats_g: number;
}

export interface NutritionTarget {
  bmr: number;
  tdee: number;
  targetCalories: number;
  macros: MacroTargets;
}

export interface MealNutrition {
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
}
