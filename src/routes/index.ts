import express from "express";
import { AppConfig } from "../configs/environment";
import { DietPlanController } from "../controllers/dietPlan.controller";
import { SessionStore } from "../services/session.service";
import { createDietPlanRouter } from "./diet-plan";
import { createHealthRouter } from "./health";

const createRoutes = (
  config: AppConfig,
  controller: DietPlanController,
  sessions: SessionStore
) => {
  const router = express.Router();

  router.use("/health", createHealthRouter(config));
  router.use("/api/health", createHealthRouter(config));

  router.use("/api", createDietPlanRouter(controller, sessions));

  return router;
};

export default createRoutes;
