import { readdir } from "node:fs/promises";
import path from "node:path";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { formatReport } from "../report.js";
import { formatSummary, summarize } from "../summary.js";
import { APP_CONFIG } from "../tokens.js";
import type { AnalysisResult } from "../types.js";
import { isAnalysisError } from "../types.js";
import { AuthenticityService } from "./authenticity.service.js";

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".tiff", ".tif", ".webp"];

export function isImageFile(fileName: string): boolean {
  const lowered = fileName.toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => lowered.endsWith(extension));
}

@Injectable()
export class BatchService {
  private readonly logger = new Logger(BatchService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(AuthenticityService) private readonly authenticity: AuthenticityService,
  ) {}

  async analyzeDirectory(directory: string): Promise<AnalysisResult[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    const images = entries
      // Links are followed by the extractor; a dangling one becomes an error entry.
      .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && isImageFile(entry.name))
      .map((entry) => entry.name)
      .sort();

    this.logger.log(`Analyzing ${images.length} image(s) in ${directory}`);

    const results: AnalysisResult[] = [];
    for (const fileName of images) {
      try {
        results.push(await this.authenticity.analyze(path.join(directory, fileName)));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Skipping ${fileName}: ${message}`);
        results.push({ error: `Failed to analyze ${fileName}: ${message}` });
      }
    }

    return results;
  }

  summarizeLines(results: readonly AnalysisResult[]): string[] {
    return formatSummary(summarize(results, this.config.scoring), this.config.scoring);
  }

  async analyzeDirectoryWithSummary(directory: string): Promise<string[]> {
    const results = await this.analyzeDirectory(directory);

    const lines: string[] = [];
    for (const result of results) {
      if (isAnalysisError(result)) {
        lines.push(`ERROR: ${result.error}`);
        continue;
      }
      lines.push(...formatReport(result, this.config.scoring), "");
    }

    lines.push(...this.summarizeLines(results));
    return lines;
  }
}
