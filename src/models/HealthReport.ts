import { CommendablePoint, ImprovementPoint, ReviewPoint } from "./FeedbackPoint";
import { PersonalFinanceMetrics } from "./Metric";

/**
 * Health report data structures
 */

export interface ScoringTableRow {
  metric: string;
  weight: number;
  benchmark: string;
  userValue: number | null;
  verdict: string;
  pointsAwarded: number;
}

export type Glossary = Record<string, string>;

export interface HealthReport {
  metrics: PersonalFinanceMetrics;
  commendableAreas: CommendablePoint[];
  reviewAreas: ReviewPoint[];
  areasForImprovement: ImprovementPoint[];
  scoringTable: ScoringTableRow[];
  totalScore: number;
  glossary: Glossary;
  /** Narrative slots filled by an external writer, never by the analyzer */
  profileReview?: string;
  summary?: string;
}
