import { Goal, Sex } from "../common/common-enum";
import {
  MacroTargets,
  MealNutrition,
  NutritionTarget,
} from "../types/model/nutritionTarget";
import { UserProfile } from "../types/model/userProfile.model";
import { ValidationError } from "../utils/errors";
import { NUTRITION_CONSTANTS } from "../utils/nutritionConstants";
import { userProfileSchema } from "../utils/validators";

/**
 * Service responsible for all nutrition calculations
 */
export class NutritionCalculationService {
  /**
   * Reject profiles outside plausible human ranges or with unknown
   * enumerated values.
   */
  validateProfile(profile: UserProfile): void {
    const { error } = userProfileSchema.validate(profile, {
      abortEarly: true,
      allowUnknown: false,
    });
    if (error) {
      throw new ValidationError(error.details[0]?.message ?? error.message);
    }
  }

  /**
   * Weight used for BMR. A BMI outside the plausible band is pulled back to
   * the nearest bound for the given height.
   */
  effectiveWeight(weightKg: number, heightCm: number): number {
    const heightM = heightCm / 100;
    const bmi = weightKg / (heightM * heightM);
    const { MIN, MAX } = NUTRITION_CONSTANTS.BMI_BOUNDS;

    if (bmi < MIN) return MIN * heightM * heightM;
    if (bmi > MAX) return MAX * heightM * heightM;
    return weightKg;
  }

  /**
   * Calculate BMR using Mifflin-St Jeor equation
   */
  calculateBMR(profile: UserProfile): number {
    const { sex, heightCm, age } = profile;
    const weightKg = this.effectiveWeight(profile.weightKg, heightCm);
    const base = 10 * weightKg + 6.25 * heightCm - 5 * age;

    return sex === Sex.MALE ? base + 5 : base - 161;
  }

  /**
   * Calculate TDEE based on activity level
   */
  calculateTDEE(bmr: number, profile: UserProfile): number {
    return bmr * NUTRITION_CONSTANTS.TDEE_MULTIPLIERS[profile.activityLevel];
  }

  /**
   * Calculate target calories based on goal. A deficit never drops below BMR.
   */
  calculateTargetCalories(tdee: number, bmr: number, goal: Goal): number {
    const adjusted = tdee + NUTRITION_CONSTANTS.CALORIE_ADJUSTMENTS[goal];

    if (goal === Goal.LOSE) {
      return Math.round(Math.max(adjusted, bmr));
    }
    return Math.round(adjusted);
  }

  /**
   * Calculate macronutrient distribution. Carbohydrate takes whatever
   * calories protein and fat leave after rounding.
   */
  calculateMacros(calories: number, goal: Goal): MacroTargets {
    const ratios = NUTRITION_CONSTANTS.MACRO_RATIOS[goal];
    const kcal = NUTRITION_CONSTANTS.KCAL_PER_GRAM;

    const proteinG = Math.round((calories * ratios.protein) / kcal.protein);
    const fatG = Math.round((calories * ratios.fat) / kcal.fat);
    const remaining = calories - proteinG * kcal.protein - fatG * kcal.fat;
    const carbsG = Math.max(0, Math.round(remaining / kcal.carbs));

    return {
      calories,
      protein_g: proteinG,
      carbs_g: carbsG,
      fats_g: fatG,
    };
  }

  /**
   * Calculate complete nutrition target
   */
  calculateNutritionTarget(profile: UserProfile): NutritionTarget {
    this.validateProfile(profile);

    const bmr = this.calculateBMR(profile);
    const tdee = this.calculateTDEE(bmr, profile);
    const targetCalories = this.calculateTargetCalories(
      tdee,
      bmr,
      profile.goal
    );
    const macros = this.calculateMacros(targetCalories, profile.goal);

    return {
      bmr: Math.round(bmr),
      tdee: Math.round(tdee),
      targetCalories,
      macros,
    };
  }

  computeMacros(profile: UserProfile): MacroTargets {
    return this.calculateNutritionTarget(profile).macros;
  }

  /**
   * Calculate nutrition for a single meal from its share of the day
   */
  calculateMealNutrition(
    macros: MacroTargets,
    caloriePercentage: number
  ): MealNutrition {
    const percentage = caloriePercentage / 100;

    return {
      calories: Math.round(macros.calories * percentage),
      protein: Math.round(macros.protein_g * percentage),
      carbs: Math.round(macros.carbs_g * percentage),
      fat: Math.round(macros.fats_g * percentage),
    };
  }
}

export const nutritionCalculator = new NutritionCalculationService();
