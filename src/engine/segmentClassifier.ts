import { z } from "zod";
import { CityTier, IncomeBracket } from "../models/Benchmark";
import { INCOME_BRACKET_THRESHOLDS } from "../utils/constants";
import cityTierData from "../data/cityTiers.json";

/**
 * Segment classification: which benchmark row a profile is compared against.
 */

const CityTierListSchema = z.object({
  tier1: z.array(z.string()),
  tier2: z.array(z.string()),
});

const cityTiers = CityTierListSchema.parse(cityTierData);
const tier1Cities = new Set(cityTiers.tier1.map(normalizeCity));
const tier2Cities = new Set(cityTiers.tier2.map(normalizeCity));

function normalizeCity(city: string): string {
  return city.trim().toLowerCase();
}

/**
 * Classifies a city into tier 1, 2 or 3. Unknown cities are tier 3.
 *
 * @example
 * ```ts
 * classifyCityTier(" Mumbai ") // 1
 * classifyCityTier("Indore")   // 2
 * classifyCityTier("Ooty")     // 3
 * ```
 */
export function classifyCityTier(city: string): CityTier {
  const key = normalizeCity(city);
  if (tier1Cities.has(key)) {
    return 1;
  }
  if (tier2Cities.has(key)) {
    return 2;
  }
  return 3;
}

/**
 * Maps total monthly income onto one of seven half-open bands.
 * Below ₹80,000 is IG1; ₹8,00,000 and above is IG7.
 */
export function classifyIncomeBracket(monthlyIncome: number): IncomeBracket {
  const [t1, t2, t3, t4, t5, t6] = INCOME_BRACKET_THRESHOLDS;
  if (monthlyIncome < t1) return "IG1";
  if (monthlyIncome < t2) return "IG2";
  if (monthlyIncome < t3) return "IG3";
  if (monthlyIncome < t4) return "IG4";
  if (monthlyIncome < t5) return "IG5";
  if (monthlyIncome < t6) return "IG6";
  return "IG7";
}
