import Joi from "joi";
import {
  ActivityLevel,
  Cuisine,
  Goal,
  Sex,
} from "../common/common-enum";
import { UserProfile } from "../types/model/userProfile.model";
import { PROFILE_LIMITS } from "./nutritionConstants";

export const userProfileSchema = Joi.object<UserProfile>({
  age: Joi.number()
    .integer()
    .min(PROFILE_LIMITS.AGE.MIN)
    .max(PROFILE_LIMITS.AGE.MAX)
    .label("age")
    .required(),
  sex: Joi.string()
    .valid(...Object.values(Sex))
    .label("sex")
    .required(),
  weightKg: Joi.number()
    .min(PROFILE_LIMITS.WEIGHT_KG.MIN)
    .max(PROFILE_LIMITS.WEIGHT_KG.MAX)
    .label("weight_kg")
    .required(),
  heightCm: Joi.number()
    .min(PROFILE_LIMITS.HEIGHT_CM.MIN)
    .max(PROFILE_LIMITS.HEIGHT_CM.MAX)
    .label("height_cm")
    .required(),
  activityLevel: Joi.string()
    .valid(...Object.values(ActivityLevel))
    .label("activity_level")
    .required(),
  goal: Joi.string()
    .valid(...Object.values(Goal))
    .label("goal")
    .required(),
  cuisinePreference: Joi.string()
    .valid(...Object.values(Cuisine))
    .label("cuisine_preference")
    .required(),
});
