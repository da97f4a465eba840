import { FdcDataType } from "../common/common-enum";
import { FoodRecord } from "../types/model/food";
import { FdcFood, FdcSearchRequest } from "../types/model/fdc";
import { normalizeFoods } from "../utils/fdcNormalizer";

export interface SearchStrategy {
  readonly name: string;
  attempt(query: string): Promise<FoodRecord[]>;
}

/** One upstream search call. */
export type FdcSearch = (request: FdcSearchRequest) => Promise<FdcFood[]>;

type RequestBuilder = (
  query: string
) => Omit<FdcSearchRequest, "pageSize"> | null;

const CURATED_TYPES = [
  FdcDataType.SR_LEGACY,
  FdcDataType.FOUNDATION,
  FdcDataType.SURVEY,
];

const DESCRIPTORS = [
  "raw",
  "cooked",
  "boiled",
  "baked",
  "fried",
  "grilled",
  "roasted",
  "steamed",
  "fresh",
  "dried",
];

export const MIN_QUERY_LENGTH = 2;

/**
 * Collapse whitespace and drop double quotes. Returns null when too short
 * to search.
 */
export function cleanQuery(query: string): string | null {
  const cleaned = query.replace(/"/g, " ").trim().split(/\s+/).join(" ");
  return cleaned.length >= MIN_QUERY_LENGTH ? cleaned : null;
}

export function singularize(word: string): string {
  const lower = word.toLowerCase();
  if (lower.length <= 3 || /(ss|us|is)$/.test(lower)) return word;
  if (lower.endsWith("ies")) return `${word.slice(0, -3)}y`;
  if (/(ches|shes|sses|xes|oes)$/.test(lower)) return word.slice(0, -2);
  if (lower.endsWith("s")) return word.slice(0, -1);
  return word;
}

export function singularizeQuery(query: string): string {
  return query.split(" ").map(singularize).join(" ");
}

/**
 * Drop cooking descriptors and commas, e.g. "Chicken, raw" -> "chicken".
 */
export function simplifyQuery(query: string): string {
  const descriptor = new RegExp(`\\b(${DESCRIPTORS.join("|")})\\b`, "g");
  const simplified = query
    .toLowerCase()
    .replace(/,/g, " ")
    .replace(descriptor, " ")
    .trim()
    .split(/\s+/)
    .join(" ");
  return simplified.length >= MIN_QUERY_LENGTH ? simplified : query;
}

/**
 * A strategy that maps the query to one FoodData Central search. A builder
 * returning null skips the upstream call.
 */
export class FdcQueryStrategy implements SearchStrategy {
  constructor(
    public readonly name: string,
    private readonly search: FdcSearch,
    private readonly buildRequest: RequestBuilder,
    private readonly maxResults: number
  ) {}

  async attempt(query: string): Promise<FoodRecord[]> {
    const request = this.buildRequest(query);
    if (!request) return [];

    const foods = await this.search({
      ...request,
      pageSize: Math.min(this.maxResults * 2, 50),
    });
    return normalizeFoods(foods, this.maxResults);
  }
}

/**
 * Strategies from most curated to most forgiving
 */
export function createDefaultStrategies(
  search: FdcSearch,
  maxResults: number
): SearchStrategy[] {
  const strategy = (name: string, build: RequestBuilder) =>
    new FdcQueryStrategy(name, search, build, maxResults);

  return [
    strategy("exact-primary", (query) => ({
      query: `"${query}"`,
      dataType: [FdcDataType.SR_LEGACY],
      requireAllWords: true,
    })),
    strategy("exact-secondary", (query) => ({
      query: `"${query}"`,
      dataType: [FdcDataType.FOUNDATION, FdcDataType.SURVEY],
      requireAllWords: true,
    })),
    strategy("all-words", (query) => ({
      query,
      dataType: CURATED_TYPES,
      requireAllWords: true,
    })),
    strategy("singular-plural", (query) => {
      const singular = singularizeQuery(query);
      if (singular === query) return null;
      return { query: singular, dataType: CURATED_TYPES, requireAllWords: true };
    }),
    strategy("partial", (query) => ({
      query: simplifyQuery(query),
      requireAllWords: false,
    })),
  ];
}
