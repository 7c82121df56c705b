import { z } from "zod";
import {
  Benchmark,
  BenchmarkTable,
  CityTier,
  IncomeBracket,
  getTierKey,
  isFlatBenchmark,
} from "../models/Benchmark";
import benchmarkData from "../data/benchmarks.json";

const RangeSchema = z
  .tuple([z.number(), z.number()])
  .refine(([min, max]) => min <= max, { message: "benchmark min must not exceed max" });

const BenchmarkEntrySchema = z.union([
  RangeSchema,
  z.record(z.string(), z.record(z.string(), RangeSchema)),
]);

const BenchmarkTableSchema = z.record(z.string(), BenchmarkEntrySchema);

/** Parsed once at load; a malformed table fails at startup. */
const benchmarkTable: BenchmarkTable = BenchmarkTableSchema.parse(benchmarkData);

/**
 * Ideal (min, max) range for a metric within a segment.
 * Flat entries apply to every segment; tiered entries are looked up by
 * "Tier n" and then by income bracket. Returns null when nothing matches.
 */
export function resolveBenchmark(
  metricName: string,
  cityTier: CityTier,
  incomeBracket: IncomeBracket
): Benchmark | null {
  const entry = benchmarkTable[metricName];
  if (!entry) {
    return null;
  }

  if (isFlatBenchmark(entry)) {
    return { min: entry[0], max: entry[1] };
  }

  const range = entry[getTierKey(cityTier)]?.[incomeBracket];
  if (!range) {
    return null;
  }
  return { min: range[0], max: range[1] };
}
