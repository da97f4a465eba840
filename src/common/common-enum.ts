export enum Sex {
  MALE = "male",
  FEMALE = "female",
}

export enum ActivityLevel {
  SEDENTARY = "sedentary",
  LIGHT = "light",
  MODERATE = "moderate",
  ACTIVE = "active",
  VERY_ACTIVE = "very_active",
}

export enum Goal {
  LOSE = "lose",
  MAINTAIN = "maintain",
  GAIN = "gain",
}

export enum Cuisine {
  AMERICAN = "american",
  ITALIAN = "italian",
  MEXICAN = "mexican",
  ASIAN = "asian",
  CHINESE = "chinese",
  INDIAN = "indian",
  MEDITERRANEAN = "mediterranean",
  VEGETARIAN = "vegetarian",
}

export enum FoodCategory {
  PROTEINS = "proteins",
  CARBS = "carbs",
  VEGETABLES = "vegetables",
  FATS = "fats",
}

export enum FdcDataType {
  SR_LEGACY = "SR Legacy",
  FOUNDATION = "Foundation",
  SURVEY = "Survey (FNDDS)",
  BRANDED = "Branded",
}
