import express from "express";
import { DietPlanController } from "../../controllers/dietPlan.controller";
import { asyncHandler } from "../../middlewares/async-handler.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { withSession } from "../../middlewares/session.middleware";
import { SessionStore } from "../../services/session.service";
import {
  searchFoodSchema,
  submitInfoSchema,
  updateCuisineSchema,
} from "../../validators/diet-plan.validator";

export const createDietPlanRouter = (
  controller: DietPlanController,
  sessions: SessionStore
) => {
  const router = express.Router();

  /**
   * @route POST /api/submit-info
   * @desc Save the profile and return daily macro targets
   */
  router.post(
    "/submit-info",
    validateRequest(submitInfoSchema),
    withSession(sessions, controller.submitInfo)
  );

  /**
   * @route POST /api/generate-plan
   * @desc Generate a meal plan for the session's profile
   */
  router.post("/generate-plan", withSession(sessions, controller.generatePlan));

  /**
   * @route POST /api/search-food
   * @desc Search foods in USDA FoodData Central
   */
  router.post(
    "/search-food",
    validateRequest(searchFoodSchema),
    asyncHandler(controller.searchFood)
  );

  /**
   * @route POST /api/update-cuisine
   * @desc Change the session's cuisine preference
   */
  router.post(
    "/update-cuisine",
    validateRequest(updateCuisineSchema),
    withSession(sessions, controller.updateCuisine)
  );

  router.get("/get-macros", withSession(sessions, controller.getMacros));
  router.post("/restart", withSession(sessions, controller.restart));
  router.get("/cuisines", controller.getCuisines);

  return router;
};
