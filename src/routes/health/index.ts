import express from "express";
import { AppConfig } from "../../configs/environment";

export const createHealthRouter = (config: AppConfig) => {
  const healthRouter = express.Router();

  healthRouter.get("/", (_req, res) => {
    res.json({
      success: true,
      message: "Diet Plan Assistant is healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  healthRouter.get("/status", (_req, res) => {
    res.json({
      success: true,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {
        usda: config.usda.apiKey ? "configured" : "not_configured",
        gemini: config.gemini.apiKey ? "configured" : "not_configured",
        nutrition_calculator: "active",
      },
      endpoints: {
        submitInfo: "/api/submit-info",
        generatePlan: "/api/generate-plan",
        searchFood: "/api/search-food",
        updateCuisine: "/api/update-cuisine",
      },
    });
  });

  return healthRouter;
};
