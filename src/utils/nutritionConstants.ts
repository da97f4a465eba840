import { ActivityLevel, Goal } from "../common/common-enum";

/**
 * Constants for nutrition calculations and meal planning
 */
export const NUTRITION_CONSTANTS = {
  KCAL_PER_GRAM: {
    protein: 4,
    carbs: 4,
    fat: 9,
  },

  // TDEE multipliers by activity level
  TDEE_MULTIPLIERS: {
    [ActivityLevel.SEDENTARY]: 1.2,
    [ActivityLevel.LIGHT]: 1.375, // 1-3 days/week
    [ActivityLevel.MODERATE]: 1.55, // 3-5 days/week
    [ActivityLevel.ACTIVE]: 1.725, // 6-7 days/week
    [ActivityLevel.VERY_ACTIVE]: 1.9, // athlete
  },

  // Calorie adjustments by goal, applied to TDEE
  CALORIE_ADJUSTMENTS: {
    [Goal.LOSE]: -500,
    [Goal.MAINTAIN]: 0,
    [Goal.GAIN]: 300,
  },

  // Macro ratios by goal (share of calories)
  MACRO_RATIOS: {
    [Goal.LOSE]: {
      protein: 0.4,
      carbs: 0.3,
      fat: 0.3,
    },
    [Goal.MAINTAIN]: {
      protein: 0.3,
      carbs: 0.4,
      fat: 0.3,
    },
    [Goal.GAIN]: {
      protein: 0.3,
      carbs: 0.45,
      fat: 0.25,
    },
  },

  // BMI outside this band is clamped before BMR
  BMI_BOUNDS: {
    MIN: 16,
    MAX: 40,
  },

  // Share of daily calories per meal, in percent
  MEAL_DISTRIBUTION: [
    { meal: "Breakfast", percentage: 25 },
    { meal: "Morning Snack", percentage: 10 },
    { meal: "Lunch", percentage: 30 },
    { meal: "Afternoon Snack", percentage: 10 },
    { meal: "Dinner", percentage: 25 },
  ],
} as const;

/**
 * Plausible human ranges for profile input
 */
export const PROFILE_LIMITS = {
  AGE: { MIN: 1, MAX: 120 },
  WEIGHT_KG: { MIN: 20, MAX: 300 },
  HEIGHT_CM: { MIN: 100, MAX: 250 },
} as const;

/**
 * Limits for building the available-foods pantry
 */
export const PANTRY_LIMITS = {
  RESULTS_PER_TERM: 3,
  MAX_PER_CATEGORY: 6,
  MIN_PER_CATEGORY: 3,
  TOP_UP_TARGET: 5,
  FOODS_PER_CATEGORY_IN_PROMPT: 8,
} as const;
