import { z } from "zod";
import type { FdcDataType } from "../../common/common-enum";

/**
 * Body of `POST /foods/search` on FoodData Central
 */
export interface FdcSearchRequest {
  query: string;
  dataType?: FdcDataType[];
  pageSize: number;
  requireAllWords: boolean;
}

export const fdcFoodNutrientSchema = z.object({
  nutrientId: z.number().optional(),
  nutrientName: z.string().optional(),
  unitName: z.string().optional(),
  value: z.number().nullable().optional(),
});

export const fdcFoodSchema = z.object({
  fdcId: z.number().optional(),
  description: z.string().optional(),
  dataType: z.string().optional(),
  foodNutrients: z.array(fdcFoodNutrientSchema).optional(),
});

export const fdcSearchResponseSchema = z.object({
  totalHits: z.number().optional(),
  foods: z.array(fdcFoodSchema).optional(),
});

export type FdcFoodNutrient = z.infer<typeof fdcFoodNutrientSchema>;
export type FdcFood = z.infer<typeof fdcFoodSchema>;
export type FdcSearchResponse = z.infer<typeof fdcSearchResponseSchema>;
