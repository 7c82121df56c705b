import { MetricName } from "./Metric";

/**
 * Feedback point data structures
 */

/** Metric names plus the special-case points that are not tied to a single metric. */
export type FeedbackSubject = MetricName | "debt_free";

export interface CommendablePoint {
  kind: "commendable";
  metricName: FeedbackSubject;
  header: string;
  currentScenario: string;
}

export interface ImprovementPoint {
  kind: "improvement";
  metricName: FeedbackSubject;
  header: string;
  currentScenario: string;
  actionable: string;
}

export interface ReviewPoint {
  kind: "review";
  metricName: FeedbackSubject;
  header: string;
  currentScenario: string;
}

export type FeedbackPoint = CommendablePoint | ImprovementPoint | ReviewPoint;

export interface FeedbackSections {
  commendable: CommendablePoint[];
  review: ReviewPoint[];
  improvement: ImprovementPoint[];
}
