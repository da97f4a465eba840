import {
  ActivityLevel,
  Cuisine,
  Goal,
  Sex,
} from "../../src/common/common-enum";
import { TextGenerationService } from "../../src/services/dietPlanGenerator.service";
import { FoodSearch } from "../../src/services/foodSearch.service";
import { FoodNutrients, FoodRecord } from "../../src/types/model/food";
import { FdcFood } from "../../src/types/model/fdc";
import { UserProfile } from "../../src/types/model/userProfile.model";

export const buildProfile = (overrides: Partial<UserProfile> = {}): UserProfile => ({
  age: 30,
  sex: Sex.MALE,
  weightKg: 80,
  heightCm: 180,
  activityLevel: ActivityLevel.MODERATE,
  goal: Goal.MAINTAIN,
  cuisinePreference: Cuisine.ITALIAN,
  ...overrides,
});

export const buildFood = (
  name: string,
  nutrients: Partial<FoodNutrients> = {}
): FoodRecord => ({
  name,
  fdcId: null,
  dataType: "SR Legacy",
  nutrients: {
    calories: 100,
    protein: 5,
    carbs: 10,
    fat: 2,
    ...nutrients,
  },
});

export const chickenBreastHit: FdcFood = {
  fdcId: 171077,
  description: "Chicken, broiler or fryers, breast, skinless, boneless, meat only, raw",
  dataType: "SR Legacy",
  foodNutrients: [
    { nutrientId: 1008, nutrientName: "Energy", unitName: "KCAL", value: 120 },
    { nutrientId: 1003, nutrientName: "Protein", unitName: "G", value: 22.5 },
    { nutrientId: 1004, nutrientName: "Total lipid (fat)", unitName: "G", value: 2.62 },
    { nutrientId: 1005, nutrientName: "Carbohydrate, by difference", unitName: "G", value: 0 },
  ],
};

export const fdcResponse = (foods: FdcFood[]) => ({
  data: { totalHits: foods.length, foods },
});

/**
 * In-memory FoodSearch returning canned results per query
 */
export class FakeFoodSearch implements FoodSearch {
  readonly calls: Array<{ query: string; maxResults?: number }> = [];

  constructor(private readonly results: Record<string, FoodRecord[]> = {}) {}

  async search(query: string, maxResults?: number): Promise<FoodRecord[]> {
    this.calls.push({ query, maxResults });
    return (this.results[query] ?? []).slice(0, maxResults ?? 10);
  }
}

export class FakePlanGenerator implements TextGenerationService {
  readonly prompts: string[] = [];

  constructor(private readonly plan = "Breakfast: oats\nLunch: pasta\nDinner: fish") {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.plan;
  }
}
