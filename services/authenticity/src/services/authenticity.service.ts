import { Inject, Injectable, Logger } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import { runChecks } from "../checks/index.js";
import { fieldCount } from "../checks/metadata.js";
import type { MetadataSource } from "../clients/metadata.source.js";
import { MetadataExtractionError } from "../clients/metadata.source.js";
import { calculateAuthenticityScore } from "../policy.js";
import { buildReport, formatReport, quickVerdict } from "../report.js";
import { APP_CONFIG, METADATA_SOURCE } from "../tokens.js";
import type { AnalysisResult, AuthenticityReport, MetadataRecord } from "../types.js";
import { isAnalysisError } from "../types.js";

export const EXTRACTION_FAILED = "Could not extract metadata";

@Injectable()
export class AuthenticityService {
  private readonly logger = new Logger(AuthenticityService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(METADATA_SOURCE) private readonly metadataSource: MetadataSource,
  ) {}

  async analyze(imagePath: string): Promise<AnalysisResult> {
    this.logger.log(`Analyzing image: ${imagePath}`);

    const metadata = await this.readMetadata(imagePath);
    if (!metadata || fieldCount(metadata) === 0) {
      return { error: EXTRACTION_FAILED };
    }

    return this.evaluate(imagePath, metadata);
  }

  /** Scores an already extracted record; the same record always yields the same score. */
  evaluate(imagePath: string, metadata: MetadataRecord): AuthenticityReport {
    const checks = runChecks(metadata);
    const score = calculateAuthenticityScore(checks, this.config.scoring);
    return buildReport(imagePath, metadata, score, checks, this.config.scoring);
  }

  async analyzeAndFormat(imagePath: string): Promise<string[]> {
    const result = await this.analyze(imagePath);
    if (isAnalysisError(result)) {
      return [`Error: ${result.error}`];
    }
    return formatReport(result, this.config.scoring);
  }

  async quickCheck(imagePath: string): Promise<string> {
    const result = await this.analyze(imagePath);
    if (isAnalysisError(result)) {
      return `Error analyzing image: ${result.error}`;
    }
    return quickVerdict(result);
  }

  private async readMetadata(imagePath: string): Promise<MetadataRecord | null> {
    try {
      return await this.metadataSource.extract(imagePath);
    } catch (error) {
      if (error instanceof MetadataExtractionError) {
        this.logger.error(`Metadata extraction failed: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
