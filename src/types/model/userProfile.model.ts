import type {
  ActivityLevel,
  Cuisine,
  Goal,
  Sex,
} from "../../common/common-enum";

export interface UserProfile {
  age: number;
  sex: Sex;
  weightKg: number;
  heightCm: number;
  activityLevel: ActivityLevel;
  goal: Goal;
  cuisinePreference: Cuisine;
}
