import { z } from "zod";
import {
  ActivityLevel,
  Cuisine,
  Goal,
  Sex,
} from "../common/common-enum";

// Field names and values sent by older web clients
const FIELD_ALIASES: Record<string, string> = {
  gender: "sex",
  weight: "weight_kg",
  height: "height_cm",
};

const GOAL_ALIASES: Record<string, Goal> = {
  weight_loss: Goal.LOSE,
  muscle_gain: Goal.GAIN,
  maintenance: Goal.MAINTAIN,
};

const normalizeText = (value: unknown) =>
  typeof value === "string" ? value.trim().toLowerCase() : value;

const applyFieldAliases = (body: unknown) => {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return body;
  }
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    const target = FIELD_ALIASES[key] ?? key;
    if (!(target in result)) result[target] = value;
  }
  return result;
};

const numberField = (name: string) =>
  z.preprocess(
    (value) => {
      if (value === "" || value === null) return undefined;
      return typeof value === "string" ? Number(value.trim()) : value;
    },
    z
      .number({
        required_error: `${name} is required`,
        invalid_type_error: `${name} must be a number`,
      })
      .positive(`${name} must be positive`)
  );

const enumField = <T extends Record<string, string>>(
  name: string,
  values: T,
  aliases: Record<string, T[keyof T]> = {}
) =>
  z.preprocess(
    (value) => {
      const normalized = normalizeText(value);
      if (normalized === "") return undefined;
      if (typeof normalized === "string" && normalized in aliases) {
        return aliases[normalized];
      }
      return normalized;
    },
    z.nativeEnum(values, {
      errorMap: (_issue, ctx) => ({
        message:
          ctx.data === undefined
            ? `${name} is required`
            : `${name} must be one of ${Object.values(values).join(", ")}`,
      }),
    })
  );

export const submitInfoBodySchema = z.preprocess(
  applyFieldAliases,
  z
    .object(
      {
        age: numberField("age"),
        sex: enumField("sex", Sex),
        weight_kg: numberField("weight_kg"),
        height_cm: numberField("height_cm"),
        activity_level: enumField("activity_level", ActivityLevel),
        goal: enumField("goal", Goal, GOAL_ALIASES),
        cuisine_preference: enumField("cuisine_preference", Cuisine),
      },
      { invalid_type_error: "Request body must be a JSON object" }
    )
    .transform((body) => ({
      age: body.age,
      sex: body.sex,
      weightKg: body.weight_kg,
      heightCm: body.height_cm,
      activityLevel: body.activity_level,
      goal: body.goal,
      cuisinePreference: body.cuisine_preference,
    }))
);

export const searchFoodBodySchema = z.object(
  {
    query: z
      .string({
        required_error: "Query is required",
        invalid_type_error: "Query must be a string",
      })
      .trim()
      .min(1, "Query is required"),
  },
  { invalid_type_error: "Request body must be a JSON object" }
);

export const updateCuisineBodySchema = z.object(
  {
    cuisine: enumField("cuisine", Cuisine),
  },
  { invalid_type_error: "Request body must be a JSON object" }
);

export const submitInfoSchema = { body: submitInfoBodySchema };
export const searchFoodSchema = { body: searchFoodBodySchema };
export const updateCuisineSchema = { body: updateCuisineBodySchema };

export type SubmitInfoBody = z.output<typeof submitInfoBodySchema>;
export type SearchFoodBody = z.output<typeof searchFoodBodySchema>;
export type UpdateCuisineBody = z.output<typeof updateCuisineBodySchema>;
