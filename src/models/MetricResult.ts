import { InvalidMetricParameterError } from "../utils/errors";

/**
 * Outcome of computing one metric value
 */
export type MetricResult =
  | { ok: true; value: number }
  | { ok: false; error: InvalidMetricParameterError };

export function metricOk(value: number): MetricResult {
  return { ok: true, value };
}

export function metricFailed(error: InvalidMetricParameterError): MetricResult {
  return { ok: false, error };
}
