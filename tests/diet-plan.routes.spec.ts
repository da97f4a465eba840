import dayjs, { Dayjs } from "dayjs";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/configs/environment";
import { createApp } from "../src/main";
import { TextGenerationService } from "../src/services/dietPlanGenerator.service";
import { FoodSearch } from "../src/services/foodSearch.service";
import { SessionStore } from "../src/services/session.service";
import { UpstreamError } from "../src/utils/errors";
import { buildFood, FakeFoodSearch, FakePlanGenerator } from "./helpers/fixtures";

const profileBody = {
  age: 30,
  sex: "male",
  weight_kg: 80,
  height_cm: 180,
  activity_level: "moderate",
  goal: "maintain",
  cuisine_preference: "italian",
};

const UPSTREAM_MESSAGE = "The nutrition or AI service is unavailable. Please try again.";

const failingSearch: FoodSearch = {
  search: async () => {
    throw new UpstreamError("usda", "FoodData Central responded with status 503");
  },
};

const failingGenerator: TextGenerationService = {
  generate: async () => {
    throw new UpstreamError("gemini", "Gemini request failed: overloaded");
  },
};

describe("Diet plan routes", () => {
  let foodSearch: FoodSearch;
  let planGenerator: FakePlanGenerator;

  const buildApp = (
    overrides: {
      foodSearch?: FoodSearch;
      planGenerator?: TextGenerationService;
      sessions?: SessionStore;
    } = {}
  ) =>
    createApp(loadConfig(), {
      foodSearch: overrides.foodSearch ?? foodSearch,
      planGenerator: overrides.planGenerator ?? planGenerator,
      sessions: overrides.sessions ?? new SessionStore({ ttlMinutes: 60 }),
    });

  beforeEach(() => {
    foodSearch = new FakeFoodSearch({
      "chicken breast": [
        buildFood("Chicken breast, raw", { calories: 120, protein: 22.5, carbs: 0, fat: 2.6 }),
      ],
    });
    planGenerator = new FakePlanGenerator();
  });

  describe("POST /api/submit-info", () => {
    it("returns the daily targets and issues a session cookie", async () => {
      const res = await request(buildApp()).post("/api/submit-info").send(profileBody);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        macros: { calories: 2759, protein_g: 207, carbs_g: 276, fats_g: 92 },
        message: "User information saved successfully!",
      });
      expect(res.headers["set-cookie"]?.[0]).toMatch(/^diet_sid=[0-9a-f-]{36};/);
    });

    it("accepts the legacy field names, goal names and string numbers", async () => {
      const res = await request(buildApp())
        .post("/api/submit-info")
        .send({
          age: "25",
          gender: "Female",
          weight: 60,
          height: 165,
          activity_level: "sedentary",
          goal: "weight_loss",
          cuisine_preference: "Mexican",
        });

      expect(res.status).toBe(200);
      expect(res.body.macros).toEqual({
        calories: 1345,
        protein_g: 135,
        carbs_g: 100,
        fats_g: 45,
      });
    });

    it("lists every missing field", async () => {
      const res = await request(buildApp())
        .post("/api/submit-info")
        .send({ age: 30, sex: "male" });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        error:
          "weight_kg is required, height_cm is required, activity_level is required, goal is required, cuisine_preference is required",
      });
    });

    it("rejects values outside plausible ranges", async () => {
      const res = await request(buildApp())
        .post("/api/submit-info")
        .send({ ...profileBody, age: 150 });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('"age" must be less than or equal to 120');
    });

    it("rejects an unknown activity level", async () => {
      const res = await request(buildApp())
        .post("/api/submit-info")
        .send({ ...profileBody, activity_level: "couch" });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe(
        "activity_level must be one of sedentary, light, moderate, active, very_active"
      );
    });

    it("rejects a non-numeric weight", async () => {
      const res = await request(buildApp())
        .post("/api/submit-info")
        .send({ ...profileBody, weight_kg: "heavy" });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("weight_kg must be a number");
    });

    it("rejects a body that is not an object", async () => {
      const res = await request(buildApp()).post("/api/submit-info").send([1, 2]);

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Request body must be a JSON object");
    });

    it("rejects malformed JSON", async () => {
      const res = await request(buildApp())
        .post("/api/submit-info")
        .set("Content-Type", "application/json")
        .send('{"age": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: "Request body must be valid JSON" });
    });

    it("rejects a body over the size limit", async () => {
      const res = await request(buildApp())
        .post("/api/search-food")
        .send({ query: "x".repeat(1_100_000) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ success: false, error: "request entity too large" });
    });

    it("rejects a body that is not JSON", async () => {
      const res = await request(buildApp())
        .post("/api/submit-info")
        .set("Content-Type", "text/plain")
        .send("age=30");

      expect(res.status).toBe(415);
      expect(res.body.error).toBe("Content-Type must be application/json");
    });

    it("raises calories with the activity level", async () => {
      const agent = request.agent(buildApp());
      const calories: number[] = [];

      for (const activity_level of ["sedentary", "light", "moderate", "active", "very_active"]) {
        const res = await agent.post("/api/submit-info").send({ ...profileBody, activity_level });
        calories.push(res.body.macros.calories);
      }

      expect(calories[0]).toBe(2136);
      expect(calories[2]).toBe(2759);
      for (let i = 1; i < calories.length; i++) {
        expect(calories[i]).toBeGreaterThan(calories[i - 1] ?? 0);
      }
    });
  });

  describe("POST /api/generate-plan", () => {
    it("requires a submitted profile", async () => {
      const res = await request(buildApp()).post("/api/generate-plan");

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        success: false,
        error: "Please submit your information first",
      });
    });

    it("generates a plan for the session's profile", async () => {
      const agent = request.agent(buildApp());
      await agent.post("/api/submit-info").send(profileBody);

      const res = await agent.post("/api/generate-plan");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        plan: "Breakfast: oats\nLunch: pasta\nDinner: fish",
        cuisine: "italian",
      });
      expect(planGenerator.prompts).toHaveLength(1);
      expect(planGenerator.prompts[0]?.split("\n")).toContain("- Calories: 2759 kcal");
    });

    it("keeps sessions apart", async () => {
      const app = buildApp();
      const alice = request.agent(app);
      const bob = request.agent(app);

      await alice.post("/api/submit-info").send(profileBody);
      const res = await bob.post("/api/generate-plan");

      expect(res.status).toBe(409);
    });

    it("reports a generation failure as 502", async () => {
      const agent = request.agent(buildApp({ planGenerator: failingGenerator }));
      await agent.post("/api/submit-info").send(profileBody);

      const res = await agent.post("/api/generate-plan");

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ success: false, error: UPSTREAM_MESSAGE });
    });
  });

  describe("POST /api/update-cuisine", () => {
    it("changes the cuisine used for the next plan", async () => {
      const agent = request.agent(buildApp());
      await agent.post("/api/submit-info").send(profileBody);

      const update = await agent.post("/api/update-cuisine").send({ cuisine: "MEXICAN" });
      const plan = await agent.post("/api/generate-plan");

      expect(update.body).toEqual({
        success: true,
        message: "Cuisine updated to Mexican",
        cuisine: "mexican",
      });
      expect(plan.body.cuisine).toBe("mexican");
    });

    it("requires a submitted profile", async () => {
      const res = await request(buildApp())
        .post("/api/update-cuisine")
        .send({ cuisine: "indian" });

      expect(res.status).toBe(409);
    });

    it("rejects an unknown cuisine", async () => {
      const res = await request(buildApp())
        .post("/api/update-cuisine")
        .send({ cuisine: "lunar" });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe(
        "cuisine must be one of american, italian, mexican, asian, chinese, indian, mediterranean, vegetarian"
      );
    });
  });

  describe("POST /api/search-food", () => {
    it("returns matching foods", async () => {
      const res = await request(buildApp())
        .post("/api/search-food")
        .send({ query: "  chicken breast " });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        foods: [
          {
            name: "Chicken breast, raw",
            fdcId: null,
            dataType: "SR Legacy",
            nutrients: { calories: 120, protein: 22.5, carbs: 0, fat: 2.6 },
          },
        ],
      });
    });

    it("answers an unknown food with an empty list", async () => {
      const res = await request(buildApp())
        .post("/api/search-food")
        .send({ query: "zzz_nonexistent_food_xyz" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, foods: [], message: "No foods found" });
    });

    it.each([{}, { query: "   " }])("requires a query (%j)", async (body) => {
      const res = await request(buildApp()).post("/api/search-food").send(body);

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Query is required");
    });

    it("reports an upstream failure as 502", async () => {
      const res = await request(buildApp({ foodSearch: failingSearch }))
        .post("/api/search-food")
        .send({ query: "rice" });

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ success: false, error: UPSTREAM_MESSAGE });
    });
  });

  describe("session endpoints", () => {
    it("returns stored macros and refreshes the session cookie", async () => {
      const agent = request.agent(buildApp());
      const submit = await agent.post("/api/submit-info").send(profileBody);

      const res = await agent.get("/api/get-macros");

      expect(res.body).toEqual({
        success: true,
        macros: { calories: 2759, protein_g: 207, carbs_g: 276, fats_g: 92 },
      });
      const sessionId = /^diet_sid=([^;]+);/.exec(submit.headers["set-cookie"]?.[0] ?? "")?.[1];
      expect(sessionId).toBeDefined();
      expect(res.headers["set-cookie"]?.[0]).toMatch(
        new RegExp(`^diet_sid=${sessionId}; Max-Age=3600;`)
      );
    });

    it("keeps an active visitor's session past the first hour", async () => {
      let current: Dayjs = dayjs("2026-01-01T00:00:00.000Z");
      const sessions = new SessionStore({ ttlMinutes: 60, now: () => current });
      const agent = request.agent(buildApp({ sessions }));
      await agent.post("/api/submit-info").send(profileBody);

      current = current.add(50, "minute");
      const first = await agent.get("/api/get-macros");
      current = current.add(50, "minute");
      const second = await agent.get("/api/get-macros");

      expect(first.status).toBe(200);
      expect(first.headers["set-cookie"]?.[0]).toContain("Max-Age=3600");
      expect(second.status).toBe(200);
      expect(second.body.macros.calories).toBe(2759);
    });

    it("forgets the profile on restart", async () => {
      const agent = request.agent(buildApp());
      await agent.post("/api/submit-info").send(profileBody);

      const restart = await agent.post("/api/restart");
      const macros = await agent.get("/api/get-macros");

      expect(restart.body).toEqual({ success: true, message: "Session cleared" });
      expect(macros.status).toBe(409);
    });

    it("lists the supported cuisines", async () => {
      const res = await request(buildApp()).get("/api/cuisines");

      expect(res.body.cuisines).toEqual([
        "american",
        "italian",
        "mexican",
        "asian",
        "chinese",
        "indian",
        "mediterranean",
        "vegetarian",
      ]);
    });
  });

  describe("health", () => {
    it("reports liveness", async () => {
      const res = await request(buildApp()).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        message: "Diet Plan Assistant is healthy",
      });
    });

    it("reports configured upstreams", async () => {
      const res = await request(buildApp()).get("/api/health/status");

      expect(res.body.services).toEqual({
        usda: "configured",
        gemini: "configured",
        nutrition_calculator: "active",
      });
    });
  });
});
