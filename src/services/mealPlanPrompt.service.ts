import { Cuisine, FoodCategory, Goal } from "../common/common-enum";
import { AvailableFoods, FoodRecord } from "../types/model/food";
import { MacroTargets } from "../types/model/nutritionTarget";
import { UserProfile } from "../types/model/userProfile.model";
import {
  NUTRITION_CONSTANTS,
  PANTRY_LIMITS,
} from "../utils/nutritionConstants";
import {
  nutritionCalculator,
  NutritionCalculationService,
} from "./NutritionCalculation.service";

const GOAL_LABELS: Record<Goal, string> = {
  [Goal.LOSE]: "Weight loss",
  [Goal.MAINTAIN]: "Maintenance",
  [Goal.GAIN]: "Muscle gain",
};

export const titleCase = (value: string): string =>
  value
    .split(/[\s_]+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");

const formatValue = (value: number | null, unit: string): string =>
  value === null ? "n/a" : `${value}${unit}`;

export function formatFood(food: FoodRecord): string {
  const { calories, protein, carbs, fat } = food.nutrients;
  return (
    `- ${food.name}: ${formatValue(calories, " kcal")}, ` +
    `${formatValue(protein, "g")} protein, ` +
    `${formatValue(carbs, "g")} carbs, ` +
    `${formatValue(fat, "g")} fat`
  );
}

/**
 * Composes the meal plan prompt. Pure string building, no I/O.
 */
export class MealPlanPromptService {
  constructor(
    private readonly calculator: NutritionCalculationService = nutritionCalculator
  ) {}

  buildPrompt(
    profile: UserProfile,
    macros: MacroTargets,
    cuisine: Cuisine,
    availableFoods?: AvailableFoods
  ): string {
    const cuisineName = titleCase(cuisine);
    const foodSection = availableFoods
      ? this.formatAvailableFoods(availableFoods)
      : "";
    const hasFoods = foodSection.length > 0;

    const rules = [
      hasFoods
        ? "Use ONLY foods from the lists below - do not invent foods that are not listed"
        : "Use common, whole foods that are easy to find",
      "Size portions so the day matches the client's macro targets",
      hasFoods ? "Use the exact food names from the lists" : null,
      "Show every portion size in grams",
      `Keep every meal authentic to ${cuisineName} cuisine`,
    ].filter((rule): rule is string => rule !== null);

    const sections = [
      `You are a professional nutritionist. Create a one-day meal plan featuring ${cuisineName} cuisine for the client below.`,
      "**RULES:**\n" + rules.map((rule, i) => `${i + 1}. ${rule}`).join("\n"),
      "**Client Profile:**\n" +
        [
          `- Age: ${profile.age} years`,
          `- Sex: ${profile.sex}`,
          `- Weight: ${profile.weightKg} kg`,
          `- Height: ${profile.heightCm} cm`,
          `- Activity Level: ${titleCase(profile.activityLevel)}`,
          `- Goal: ${GOAL_LABELS[profile.goal]}`,
          `- Preferred Cuisine: ${cuisineName}`,
        ].join("\n"),
      "**Daily Targets:**\n" +
        [
          `- Calories: ${macros.calories} kcal`,
          `- Protein: ${macros.protein_g}g`,
          `- Carbohydrates: ${macros.carbs_g}g`,
          `- Fats: ${macros.fats_g}g`,
        ].join("\n"),
      "**Per-Meal Guide:**\n" + this.formatMealGuide(macros),
    ];

    if (hasFoods) {
      sections.push(
        `**Available Foods (USDA FoodData Central, per 100 g):**${foodSection}`
      );
    }

    sections.push(
      [
        `Structure the answer as a complete one-day ${cuisineName} meal plan with these meals in order:`,
        ...NUTRITION_CONSTANTS.MEAL_DISTRIBUTION.map(
          ({ meal }, i) => `${i + 1}. ${meal} (with a suggested time)`
        ),
        "",
        "For each meal:",
        "- List each food with its portion size in grams",
        "- Give the meal's total calories, protein, carbs and fat",
        "",
        `End with 3 tips for reaching the goal (${GOAL_LABELS[profile.goal].toLowerCase()}) with ${cuisineName} cuisine.`,
      ].join("\n")
    );

    return sections.join("\n\n");
  }

  private formatMealGuide(macros: MacroTargets): string {
    return NUTRITION_CONSTANTS.MEAL_DISTRIBUTION.map(({ meal, percentage }) => {
      const share = this.calculator.calculateMealNutrition(macros, percentage);
      return `- ${meal} (~${percentage}%): ${share.calories} kcal, ${share.protein}g protein, ${share.carbs}g carbs, ${share.fat}g fat`;
    }).join("\n");
  }

  private formatAvailableFoods(availableFoods: AvailableFoods): string {
    return Object.values(FoodCategory)
      .filter((category) => availableFoods[category].length > 0)
      .map(
        (category) =>
          `\n\n${category.toUpperCase()}:\n` +
          availableFoods[category]
            .slice(0, PANTRY_LIMITS.FOODS_PER_CATEGORY_IN_PROMPT)
            .map(formatFood)
            .join("\n")
      )
      .join("");
  }
}
