import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { MetadataExtractionError } from "../src/clients/metadata.source.js";
import { AuthenticityService } from "../src/services/authenticity.service.js";
import { BatchService, isImageFile } from "../src/services/batch.service.js";
import { formatSummary, summarize } from "../src/summary.js";
import type { AuthenticityReport } from "../src/types.js";
import { FakeMetadataSource, cameraRecord, emptyChecks, minimalRecord, testConfig } from "./fixtures.js";

function reportWithScore(score: number, overrides: Partial<AuthenticityReport> = {}): AuthenticityReport {
  return {
    timestamp: "2025-01-02T03:04:05.000Z",
    imagePath: `/images/${score}.jpg`,
    fileSize: "1 MB",
    fileType: "JPEG",
    authenticityScore: score,
    verdict: "LOW_CONFIDENCE",
    detailedChecks: emptyChecks(),
    recommendations: [],
    ...overrides,
  };
}

describe("summarize", () => {
  it("buckets scores with the verdict bands", () => {
    const withManifest = emptyChecks();
    withManifest.c2pa.has_c2pa_manifest = true;
    const withAi = emptyChecks();
    withAi.ai.digital_source_type = true;

    const summary = summarize([
      reportWithScore(90, { detailedChecks: withManifest }),
      reportWithScore(50, { detailedChecks: withAi }),
      reportWithScore(20),
      { error: "Could not extract metadata" },
    ]);

    expect(summary).not.toBeNull();
    expect(summary?.totalImages).toBe(3);
    expect(summary?.averageScore).toBeCloseTo(53.333, 3);
    expect(summary?.scoreDistribution).toEqual({ high: 1, medium: 0, low: 1, suspicious: 1 });
    expect(summary?.c2paImages).toBe(1);
    expect(summary?.aiGeneratedImages).toBe(1);

    expect(formatSummary(summary)).toEqual([
      "=".repeat(60),
      "BATCH ANALYSIS SUMMARY",
      "=".repeat(60),
      "Total Images Analyzed: 3",
      "Average Authenticity Score: 53.3%",
      "C2PA-Enabled Images: 1",
      "AI-Generated Images: 1",
      "Score Distribution:",
      "  High Confidence (80-100%): 1",
      "  Medium Confidence (60-79%): 0",
      "  Low Confidence (40-59%): 1",
      "  Suspicious (0-39%): 1",
    ]);
  });

  it("reports when nothing could be analyzed", () => {
    const summary = summarize([{ error: "Could not extract metadata" }]);

    expect(summary).toBeNull();
    expect(formatSummary(summary)).toEqual(["No valid images analyzed"]);
  });
});

describe("isImageFile", () => {
  it("filters on extension regardless of case", () => {
    expect(["a.JPG", "b.jpeg", "c.png", "d.TIFF", "e.tif", "f.webp"].every(isImageFile)).toBe(true);
    expect(isImageFile("notes.txt")).toBe(false);
    expect(isImageFile("archive.jpg.zip")).toBe(false);
  });
});

describe("BatchService", () => {
  let directory: string;
  let service: BatchService;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "authenticity-batch-"));
    for (const name of ["a.jpg", "b.PNG", "c.webp", "d.tif", "notes.txt"]) {
      await writeFile(path.join(directory, name), "placeholder");
    }
    await mkdir(path.join(directory, "nested.jpg"));

    const source = new FakeMetadataSource({
      "a.jpg": cameraRecord,
      "b.PNG": minimalRecord,
      "c.webp": new MetadataExtractionError("ExifTool error: corrupt file"),
      "d.tif": new Error("disk read failed"),
    });
    const config = testConfig();
    service = new BatchService(config, new AuthenticityService(config, source));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("analyzes every image and isolates failures", async () => {
    const results = await service.analyzeDirectory(directory);

    expect(results).toHaveLength(4);
    expect(results[0]).toMatchObject({ imagePath: path.join(directory, "a.jpg"), verdict: "MODERATE_CONFIDENCE" });
    expect(results[1]).toMatchObject({ imagePath: path.join(directory, "b.PNG"), verdict: "POTENTIALLY_MANIPULATED" });
    expect(results[2]).toEqual({ error: "Could not extract metadata" });
    expect(results[3]).toEqual({ error: "Failed to analyze d.tif: disk read failed" });
  });

  it("renders reports, errors and the summary", async () => {
    const lines = await service.analyzeDirectoryWithSummary(directory);

    expect(lines[0]).toBe("=".repeat(50));
    expect(lines).toContain("File: a.jpg");
    expect(lines).toContain("File: b.PNG");
    expect(lines).toContain("ERROR: Could not extract metadata");
    expect(lines).toContain("ERROR: Failed to analyze d.tif: disk read failed");

    const summaryStart = lines.indexOf("BATCH ANALYSIS SUMMARY") - 1;
    expect(lines.slice(summaryStart + 3, summaryStart + 4)).toEqual(["Total Images Analyzed: 2"]);
    expect(lines.slice(summaryStart + 5)).toEqual([
      "C2PA-Enabled Images: 1",
      "AI-Generated Images: 1",
      "Score Distribution:",
      "  High Confidence (80-100%): 0",
      "  Medium Confidence (60-79%): 1",
      "  Low Confidence (40-59%): 0",
      "  Suspicious (0-39%): 1",
    ]);
  });

  it("follows symlinked images", async () => {
    const linked = await mkdtemp(path.join(tmpdir(), "authenticity-links-"));
    try {
      await writeFile(path.join(directory, "original.bin"), "placeholder");
      await symlink(path.join(directory, "original.bin"), path.join(linked, "link.jpg"));
      await symlink(path.join(directory, "gone.bin"), path.join(linked, "dangling.png"));

      const config = testConfig();
      const source = new FakeMetadataSource({ "link.jpg": cameraRecord });
      const linkedService = new BatchService(config, new AuthenticityService(config, source));

      const results = await linkedService.analyzeDirectory(linked);

      expect(results).toHaveLength(2);
      expect(results[0]).toEqual({ error: "Could not extract metadata" });
      expect(results[1]).toMatchObject({ imagePath: path.join(linked, "link.jpg"), verdict: "MODERATE_CONFIDENCE" });
    } finally {
      await rm(linked, { recursive: true, force: true });
    }
  });

  it("rejects a missing directory", async () => {
    await expect(service.analyzeDirectory(path.join(directory, "missing"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});
