import path from "node:path";

import type { ScoringConfig } from "./config.js";
import { DEFAULT_SCORING } from "./config.js";
import { getRating, getVerdict } from "./policy.js";
import { hasField, valueText } from "./checks/metadata.js";
import type { AuthenticityReport, DetailedChecks, MetadataRecord } from "./types.js";

const REPORT_RULE = "=".repeat(50);

export const RECOMMENDATIONS = {
  caution: "Exercise caution when using this image.",
  noProvenance: "No digital provenance data found.",
  multipleEditors: "Multiple editing tools detected - verify source.",
  aiContent: "AI-generated content - verify intended use.",
} as const;

export function getRecommendations(checks: DetailedChecks, score: number): string[] {
  const recommendations: string[] = [];

  if (score < 60) {
    recommendations.push(RECOMMENDATIONS.caution);
  }
  if (!checks.c2pa.has_c2pa_manifest) {
    recommendations.push(RECOMMENDATIONS.noProvenance);
  }
  if (checks.tampering.multiple_editors) {
    recommendations.push(RECOMMENDATIONS.multipleEditors);
  }
  if (checks.ai.explicit_ai_credit && score < 70) {
    recommendations.push(RECOMMENDATIONS.aiContent);
  }

  return recommendations;
}

function fieldOrUnknown(metadata: MetadataRecord, field: string): string {
  return hasField(metadata, field) ? valueText(metadata[field]) : "Unknown";
}

export function buildReport(
  imagePath: string,
  metadata: MetadataRecord,
  score: number,
  checks: DetailedChecks,
  config: ScoringConfig = DEFAULT_SCORING,
  now: Date = new Date(),
): AuthenticityReport {
  const detailedChecks: DetailedChecks = {
    integrity: Object.freeze({ ...checks.integrity }),
    c2pa: Object.freeze({ ...checks.c2pa }),
    ai: Object.freeze({ ...checks.ai }),
    tampering: Object.freeze({ ...checks.tampering }),
  };
  Object.freeze(detailedChecks);

  const recommendations = getRecommendations(checks, score);
  Object.freeze(recommendations);

  return Object.freeze({
    timestamp: now.toISOString(),
    imagePath,
    fileSize: fieldOrUnknown(metadata, "FileSize"),
    fileType: fieldOrUnknown(metadata, "FileType"),
    authenticityScore: score,
    verdict: getVerdict(score, config),
    detailedChecks,
    recommendations,
  });
}

/**
 * Renders a report as display lines: banner, rating, file details, the three
 * key findings, then recommendations when there are any.
 */
export function formatReport(report: AuthenticityReport, config: ScoringConfig = DEFAULT_SCORING): string[] {
  const score = report.authenticityScore;
  const checks = report.detailedChecks;

  const lines = [
    REPORT_RULE,
    "IMAGE AUTHENTICITY REPORT",
    REPORT_RULE,
    `Authenticity Confidence: [${getRating(score, config)}] (${score.toFixed(1)}%)`,
    `Verdict: ${report.verdict}`,
    `File: ${path.basename(report.imagePath)}`,
    `Type: ${report.fileType} | Size: ${report.fileSize}`,
    "",
    "KEY FINDINGS:",
  ];

  lines.push(
    checks.c2pa.has_c2pa_manifest
      ? "[PASS] Digital Provenance: This image has verified origin data"
      : "[FAIL] Digital Provenance: No verified origin data found",
  );
  lines.push(
    Object.values(checks.ai).some(Boolean)
      ? "[AI] AI Indicators: Signs of AI generation detected"
      : "[NATURAL] Natural Image: No clear AI generation signs",
  );
  lines.push(
    Object.values(checks.tampering).some(Boolean)
      ? "[WARNING] Editing Signs: Possible modifications detected"
      : "[OK] Minimal Editing: No significant alterations found",
  );

  if (report.recommendations.length > 0) {
    lines.push("", "RECOMMENDATIONS:");
    for (const recommendation of report.recommendations) {
      lines.push(`* ${recommendation}`);
    }
  }

  return lines;
}

export function quickVerdict(report: AuthenticityReport): string {
  const score = report.authenticityScore;
  const shown = score.toFixed(1);

  if (score >= 70) {
    return `PASS: Likely Authentic (${shown}%)`;
  }
  if (score >= 50) {
    return `WARNING: Use with Caution (${shown}%)`;
  }
  return `FAIL: Potential Issues (${shown}%)`;
}
