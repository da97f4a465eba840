import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import cookieParser from "cookie-parser";
import { AppConfig, validateConfig } from "./configs/environment";
import { DietPlanController } from "./controllers/dietPlan.controller";
import { errorMiddleware } from "./middlewares/error.middleware";
import { requestLogger } from "./middlewares/logger.middleware";
import {
  createRateLimiter,
  validateContentType,
} from "./middlewares/validation.middleware";
import routes from "./routes";
import { AvailableFoodsService } from "./services/availableFoods.service";
import {
  DietPlanGeneratorService,
  TextGenerationService,
} from "./services/dietPlanGenerator.service";
import { FoodSearch, FoodSearchClient } from "./services/foodSearch.service";
import { MealPlanPromptService } from "./services/mealPlanPrompt.service";
import { NutritionCalculationService } from "./services/NutritionCalculation.service";
import { SessionStore } from "./services/session.service";
import { logger } from "./utils/logger";

export interface AppDependencies {
  foodSearch: FoodSearch;
  planGenerator: TextGenerationService;
  sessions: SessionStore;
}

export const createApp = (config: AppConfig, deps: AppDependencies) => {
  const calculator = new NutritionCalculationService();
  const controller = new DietPlanController({
    calculator,
    foodSearch: deps.foodSearch,
    availableFoods: new AvailableFoodsService(deps.foodSearch),
    promptBuilder: new MealPlanPromptService(calculator),
    planGenerator: deps.planGenerator,
  });

  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin, credentials: true }));
  app.use(compression());
  app.use(cookieParser());
  app.use(validateContentType);
  app.use(express.json({ limit: "1mb" }));
  app.use(createRateLimiter(config));
  app.use(requestLogger);

  app.use("/", routes(config, controller, deps.sessions));

  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
};

export class DietPlanApplication {
  /**
   * Validate the environment and wire real upstream services. Throws when a
   * required key is missing.
   */
  initialize() {
    logger.info("Starting Diet Plan Assistant ...");
    const config = validateConfig();

    const foodSearch = new FoodSearchClient({
      apiKey: config.usda.apiKey,
      baseUrl: config.usda.baseUrl,
      timeoutMs: config.usda.timeoutMs,
    });
    const planGenerator = new DietPlanGeneratorService({
      apiKey: config.gemini.apiKey,
      model: config.gemini.model,
      temperature: config.gemini.temperature,
    });
    const sessions = new SessionStore({
      ttlMinutes: config.session.ttlMinutes,
    });

    const app = createApp(config, { foodSearch, planGenerator, sessions });
    return { app, config, foodSearch };
  }
}
