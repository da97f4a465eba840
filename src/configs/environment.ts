import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  PORT: z.string().regex(/^\d+$/, "PORT must be a number").optional(),
  NODE_ENV: z.string().optional(),

  USDA_API_KEY: z.string({ required_error: "USDA_API_KEY is required" }).min(1, "USDA_API_KEY is required"),
  USDA_BASE_URL: z.string().url().optional(),
  USDA_TIMEOUT_MS: z.string().regex(/^\d+$/).optional(),

  GEMINI_API_KEY: z.string({ required_error: "GEMINI_API_KEY is required" }).min(1, "GEMINI_API_KEY is required"),
  GEMINI_MODEL: z.string().optional(),
  GEMINI_TEMPERATURE: z.string().optional(),

  SESSION_TTL_MINUTES: z.string().regex(/^\d+$/).optional(),

  LOG_LEVEL: z.string().optional(),

  RATE_LIMIT_WINDOW: z.string().optional(),
  RATE_LIMIT_MAX: z.string().optional(),
  CORS_ORIGIN: z.string().optional(),
});

export type AppConfig = ReturnType<typeof buildConfig>;

const buildConfig = () => {
  const env = process.env;
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    usda: {
      apiKey: env.USDA_API_KEY || "",
      baseUrl: env.USDA_BASE_URL || "https://api.nal.usda.gov/fdc/v1",
      timeoutMs: parseInt(env.USDA_TIMEOUT_MS || "10000", 10),
    },
    gemini: {
      apiKey: env.GEMINI_API_KEY || "",
      model: env.GEMINI_MODEL || "gemini-2.5-flash",
      temperature: parseFloat(env.GEMINI_TEMPERATURE || "0.7"),
    },
    session: {
      ttlMinutes: parseInt(env.SESSION_TTL_MINUTES || "60", 10),
    },
    logging: {
      level: env.LOG_LEVEL || "info",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "60000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "60", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",") || ["http://localhost:3000"],
      },
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

/** Drops the cached config so the next `loadConfig` re-reads the env. */
export const resetConfig = () => {
  cachedConfig = null;
};

export const validateConfig = (): AppConfig => {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return loadConfig();
};
