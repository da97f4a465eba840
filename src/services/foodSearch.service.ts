import axios, { AxiosInstance } from "axios";
import { FoodRecord } from "../types/model/food";
import {
  FdcFood,
  FdcSearchRequest,
  fdcSearchResponseSchema,
} from "../types/model/fdc";
import { UpstreamError } from "../utils/errors";
import { logger } from "../utils/logger";
import { cleanQuery, createDefaultStrategies } from "./foodSearchStrategies";

export type FdcHttpClient = Pick<AxiosInstance, "post">;

export interface FoodSearchOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  http?: FdcHttpClient;
}

export interface FoodSearch {
  search(query: string, maxResults?: number): Promise<FoodRecord[]>;
}

// Upstream statuses that mean "this query found nothing"
const EMPTY_RESULT_STATUSES = [400, 404];

/**
 * USDA FoodData Central search with ordered fallback strategies
 */
export class FoodSearchClient implements FoodSearch {
  private readonly apiKey: string;
  private readonly http: FdcHttpClient;

  constructor({ apiKey, baseUrl, timeoutMs = 10_000, http }: FoodSearchOptions) {
    this.apiKey = apiKey;
    this.http = http ?? axios.create({ baseURL: baseUrl, timeout: timeoutMs });
  }

  /**
   * Run strategies in order and return the first non-empty result. Zero
   * matches is an empty list, not an error.
   */
  async search(query: string, maxResults = 10): Promise<FoodRecord[]> {
    const cleaned = cleanQuery(query);
    if (!cleaned) return [];

    const strategies = createDefaultStrategies(
      (request) => this.searchFdc(request),
      maxResults
    );

    for (const strategy of strategies) {
      const foods = await strategy.attempt(cleaned);
      if (foods.length > 0) {
        logger.info(
          `Found ${foods.length} foods for "${cleaned}" (strategy=${strategy.name})`
        );
        return foods;
      }
      logger.debug(`Strategy ${strategy.name} found nothing for "${cleaned}"`);
    }

    logger.info(`No foods found for "${cleaned}" after ${strategies.length} strategies`);
    return [];
  }

  /**
   * Quick connectivity probe used at start-up.
   */
  async checkConnection(): Promise<boolean> {
    const foods = await this.search("apple", 1);
    return foods.length > 0;
  }

  private async searchFdc(request: FdcSearchRequest): Promise<FdcFood[]> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>("/foods/search", request, {
        params: { api_key: this.apiKey },
      });
      data = response.data;
    } catch (error) {
      if (!axios.isAxiosError(error)) throw error;

      const status = error.response?.status;
      if (status !== undefined && EMPTY_RESULT_STATUSES.includes(status)) {
        logger.warn(`FoodData Central rejected query "${request.query}" (${status})`);
        return [];
      }
      throw new UpstreamError(
        "usda",
        status !== undefined
          ? `FoodData Central responded with status ${status}`
          : `FoodData Central unreachable: ${error.message}`
      );
    }

    const parsed = fdcSearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(
        "usda",
        `Unexpected FoodData Central response: ${parsed.error.message}`
      );
    }
    return parsed.data.foods ?? [];
  }
}
