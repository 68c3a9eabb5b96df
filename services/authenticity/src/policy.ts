import type { ScoringConfig } from "./config.js";
import { DEFAULT_SCORING } from "./config.js";
import type { DetailedChecks, Verdict } from "./types.js";

export type Rating = "EXCELLENT" | "GOOD" | "CAUTION" | "SUSPICIOUS";

type CheckGroup = Readonly<Record<string, boolean>>;

function passRatio(group: CheckGroup): number {
  const values = Object.values(group);
  if (values.length === 0) {
    return 0;
  }
  return values.filter(Boolean).length / values.length;
}

export interface GroupScores {
  integrity: number;
  provenance: number;
  ai: number;
  tampering: number;
}

export function scoreGroups(checks: DetailedChecks): GroupScores {
  const provenanceHits = Object.values(checks.c2pa).some(Boolean);

  return {
    integrity: passRatio(checks.integrity),
    // An absent manifest contributes nothing.
    provenance: provenanceHits ? passRatio(checks.c2pa) : 0,
    ai: passRatio(checks.ai),
    tampering: 1 - passRatio(checks.tampering),
  };
}

export function calculateAuthenticityScore(
  checks: DetailedChecks,
  config: ScoringConfig = DEFAULT_SCORING,
): number {
  const groups = scoreGroups(checks);
  const { weights } = config;

  const overall =
    (groups.integrity * weights.integrity +
      groups.provenance * weights.provenance +
      groups.ai * weights.ai +
      groups.tampering * weights.tampering) *
    100;

  return Math.min(100, overall);
}

type Band = "high" | "moderate" | "low" | "below";

export function scoreBand(score: number, config: ScoringConfig = DEFAULT_SCORING): Band {
  const { thresholds } = config;
  if (score >= thresholds.high) {
    return "high";
  }
  if (score >= thresholds.moderate) {
    return "moderate";
  }
  if (score >= thresholds.low) {
    return "low";
  }
  return "below";
}

const verdictByBand: Record<Band, Verdict> = {
  high: "HIGH_CONFIDENCE_AUTHENTIC",
  moderate: "MODERATE_CONFIDENCE",
  low: "LOW_CONFIDENCE",
  below: "POTENTIALLY_MANIPULATED",
};

const ratingByBand: Record<Band, Rating> = {
  high: "EXCELLENT",
  moderate: "GOOD",
  low: "CAUTION",
  below: "SUSPICIOUS",
};

export function getVerdict(score: number, config: ScoringConfig = DEFAULT_SCORING): Verdict {
  return verdictByBand[scoreBand(score, config)];
}

export function getRating(score: number, config: ScoringConfig = DEFAULT_SCORING): Rating {
  return ratingByBand[scoreBand(score, config)];
}
