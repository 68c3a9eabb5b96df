import type { ScoringConfig } from "./config.js";
import { DEFAULT_SCORING } from "./config.js";
import { scoreBand } from "./policy.js";
import type { AnalysisResult, AuthenticityReport, BatchSummary, ScoreDistribution } from "./types.js";
import { isAnalysisError } from "./types.js";

const SUMMARY_RULE = "=".repeat(60);

const bucketByBand: Record<ReturnType<typeof scoreBand>, keyof ScoreDistribution> = {
  high: "high",
  moderate: "medium",
  low: "low",
  below: "suspicious",
};

export function summarize(
  results: readonly AnalysisResult[],
  config: ScoringConfig = DEFAULT_SCORING,
): BatchSummary | null {
  const reports = results.filter((result): result is AuthenticityReport => !isAnalysisError(result));
  if (reports.length === 0) {
    return null;
  }

  const scoreDistribution: ScoreDistribution = { high: 0, medium: 0, low: 0, suspicious: 0 };
  let total = 0;
  let c2paImages = 0;
  let aiGeneratedImages = 0;

  for (const report of reports) {
    const score = report.authenticityScore;
    total += score;
    scoreDistribution[bucketByBand[scoreBand(score, config)]] += 1;

    if (report.detailedChecks.c2pa.has_c2pa_manifest) {
      c2paImages += 1;
    }
    if (Object.values(report.detailedChecks.ai).some(Boolean)) {
      aiGeneratedImages += 1;
    }
  }

  return {
    totalImages: reports.length,
    averageScore: total / reports.length,
    scoreDistribution,
    c2paImages,
    aiGeneratedImages,
  };
}

export function formatSummary(summary: BatchSummary | null, config: ScoringConfig = DEFAULT_SCORING): string[] {
  if (!summary) {
    return ["No valid images analyzed"];
  }

  const { high, moderate, low } = config.thresholds;
  const distribution = summary.scoreDistribution;

  return [
    SUMMARY_RULE,
    "BATCH ANALYSIS SUMMARY",
    SUMMARY_RULE,
    `Total Images Analyzed: ${summary.totalImages}`,
    `Average Authenticity Score: ${summary.averageScore.toFixed(1)}%`,
    `C2PA-Enabled Images: ${summary.c2paImages}`,
    `AI-Generated Images: ${summary.aiGeneratedImages}`,
    "Score Distribution:",
    `  High Confidence (${high}-100%): ${distribution.high}`,
    `  Medium Confidence (${moderate}-${high - 1}%): ${distribution.medium}`,
    `  Low Confidence (${low}-${moderate - 1}%): ${distribution.low}`,
    `  Suspicious (0-${low - 1}%): ${distribution.suspicious}`,
  ];
}
