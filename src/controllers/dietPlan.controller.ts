import { Request, Response } from "express";
import { Cuisine } from "../common/common-enum";
import { DietSession } from "../services/session.service";
import { AvailableFoodsService } from "../services/availableFoods.service";
import { TextGenerationService } from "../services/dietPlanGenerator.service";
import { FoodSearch } from "../services/foodSearch.service";
import {
  MealPlanPromptService,
  titleCase,
} from "../services/mealPlanPrompt.service";
import { NutritionCalculationService } from "../services/NutritionCalculation.service";
import { SessionRequest } from "../middlewares/session.middleware";
import {
  CuisinesResponse,
  GeneratePlanResponse,
  MacrosResponse,
  RestartResponse,
  SearchFoodResponse,
  SubmitInfoResponse,
  UpdateCuisineResponse,
} from "../types/response/diet-plan.response";
import { logger } from "../utils/logger";
import { sendSuccess } from "../utils/response";
import {
  SearchFoodBody,
  SubmitInfoBody,
  UpdateCuisineBody,
} from "../validators/diet-plan.validator";

export interface DietPlanControllerDeps {
  calculator: NutritionCalculationService;
  foodSearch: FoodSearch;
  availableFoods: AvailableFoodsService;
  promptBuilder: MealPlanPromptService;
  planGenerator: TextGenerationService;
}

export class DietPlanController {
  constructor(private readonly deps: DietPlanControllerDeps) {}

  /**
   * @route POST /api/submit-info
   * @desc Store the profile and compute daily targets
   */
  submitInfo = (
    req: SessionRequest<SubmitInfoBody>,
    res: Response,
    session: DietSession
  ) => {
    const profile = req.body;
    const macros = this.deps.calculator.computeMacros(profile);

    session.setProfile(profile);
    session.setMacros(macros);
    logger.info(
      `Targets computed for session ${session.id.slice(0, 8)}: ${macros.calories} kcal`
    );

    sendSuccess<SubmitInfoResponse>(res, {
      macros,
      message: "User information saved successfully!",
    });
  };

  /**
   * @route POST /api/generate-plan
   * @desc Generate a meal plan from the stored profile and cuisine
   */
  generatePlan = async (
    _req: Request,
    res: Response,
    session: DietSession
  ) => {
    const profile = session.getProfile();
    const macros = session.getMacros();
    const cuisine = session.getCuisine();

    const availableFoods =
      await this.deps.availableFoods.gatherAvailableFoods(cuisine);
    const prompt = this.deps.promptBuilder.buildPrompt(
      profile,
      macros,
      cuisine,
      availableFoods
    );
    const plan = await this.deps.planGenerator.generate(prompt);

    sendSuccess<GeneratePlanResponse>(res, { plan, cuisine });
  };

  /**
   * @route POST /api/search-food
   * @desc Search USDA FoodData Central
   */
  searchFood = async (req: SessionRequest<SearchFoodBody>, res: Response) => {
    const foods = await this.deps.foodSearch.search(req.body.query);

    if (foods.length === 0) {
      sendSuccess<SearchFoodResponse>(res, { foods, message: "No foods found" });
      return;
    }
    sendSuccess<SearchFoodResponse>(res, { foods });
  };

  /**
   * @route POST /api/update-cuisine
   * @desc Change the cuisine used for the next plan
   */
  updateCuisine = (
    req: SessionRequest<UpdateCuisineBody>,
    res: Response,
    session: DietSession
  ) => {
    const { cuisine } = req.body;
    session.setCuisine(cuisine);

    sendSuccess<UpdateCuisineResponse>(res, {
      message: `Cuisine updated to ${titleCase(cuisine)}`,
      cuisine,
    });
  };

  /**
   * @route GET /api/get-macros
   * @desc Current session's targets
   */
  getMacros = (_req: Request, res: Response, session: DietSession) => {
    sendSuccess<MacrosResponse>(res, { macros: session.getMacros() });
  };

  /**
   * @route POST /api/restart
   * @desc Forget the session's profile and targets
   */
  restart = (_req: Request, res: Response, session: DietSession) => {
    session.clear();
    sendSuccess<RestartResponse>(res, { message: "Session cleared" });
  };

  /**
   * @route GET /api/cuisines
   */
  getCuisines = (_req: Request, res: Response) => {
    sendSuccess<CuisinesResponse>(res, { cuisines: Object.values(Cuisine) });
  };
}
