import type { Cuisine } from "../../common/common-enum";
import type { FoodRecord } from "../model/food";
import type { MacroTargets } from "../model/nutritionTarget";

/**
 * Payloads of the diet plan endpoints. Each is sent with `success: true`
 * merged in by `sendSuccess`.
 */
export interface SubmitInfoResponse {
  macros: MacroTargets;
  message: string;
}

export interface GeneratePlanResponse {
  plan: string;
  cuisine: Cuisine;
}

export interface SearchFoodResponse {
  foods: FoodRecord[];
  message?: string;
}

export interface UpdateCuisineResponse {
  message: string;
  cuisine: Cuisine;
}

export interface MacrosResponse {
  macros: MacroTargets;
}

export interface CuisinesResponse {
  cuisines: Cuisine[];
}

export interface RestartResponse {
  message: string;
}
