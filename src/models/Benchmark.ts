/**
 * Benchmark data structures
 */

export type CityTier = 1 | 2 | 3;

export const INCOME_BRACKETS = ["IG1", "IG2", "IG3", "IG4", "IG5", "IG6", "IG7"] as const;

/**
 * Monthly income bands, lowest first.
 * IG1 < ₹80K, IG2 < ₹1.5L, IG3 < ₹2.5L, IG4 < ₹3.5L, IG5 < ₹5L, IG6 < ₹8L, IG7 the rest.
 */
export type IncomeBracket = (typeof INCOME_BRACKETS)[number];

/**
 * Ideal (min, max) range for a metric
 */
export interface Benchmark {
  min: number;
  max: number;
}

export type BenchmarkRange = [number, number];

export type TieredBenchmark = Record<string, Partial<Record<IncomeBracket, BenchmarkRange>>>;

export type BenchmarkEntry = BenchmarkRange | TieredBenchmark;

export type BenchmarkTable = Record<string, BenchmarkEntry>;

export function isFlatBenchmark(entry: BenchmarkEntry): entry is BenchmarkRange {
  return Array.isArray(entry);
}

export function getTierKey(tier: CityTier): string {
  return `Tier ${tier}`;
}

/**
 * Render a benchmark the way the scoring table shows it
 */
export function formatBenchmark(benchmark: Benchmark | null): string {
  if (!benchmark) {
    return "N/A";
  }
  if (benchmark.min === 0) {
    return `< ${benchmark.max}`;
  }
  return `${benchmark.min} - ${benchmark.max}`;
}
