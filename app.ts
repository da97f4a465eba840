import "dotenv/config";
import { logger } from "./src/utils/logger";
import { DietPlanApplication } from "./src/main";

const bootstrap = () => {
  const { app, config, foodSearch } = new DietPlanApplication().initialize();

  app.listen(config.port, () => {
    logger.info(`Diet Plan Assistant listening on port ${config.port}`);
  });

  foodSearch
    .checkConnection()
    .then((reachable) => {
      if (reachable) {
        logger.info("USDA FoodData Central reachable");
      } else {
        logger.warn("USDA FoodData Central returned no results for the probe query");
      }
    })
    .catch((error: unknown) => {
      logger.warn("USDA FoodData Central probe failed", error);
    });
};

try {
  bootstrap();
} catch (error) {
  logger.error("Failed to initialize application:", error);
  process.exit(1);
}
