import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import type { AppConfig } from "../config.js";
import type { MetadataRecord, MetadataValue } from "../types.js";
import { APP_CONFIG } from "../tokens.js";
import { MetadataExtractionError } from "./metadata.source.js";
import type { MetadataSource } from "./metadata.source.js";

export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
}

export interface ExecOutput {
  stdout: string;
  stderr: string;
}

export type ExecFileFn = (file: string, args: string[], options: ExecOptions) => Promise<ExecOutput>;

const execFileAsync = promisify(execFile);

const defaultExec: ExecFileFn = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, { ...options, encoding: "utf8" });
  return { stdout, stderr };
};

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

const outputSchema = z.array(z.record(z.string(), z.unknown())).min(1);

function normalizeValue(value: unknown): MetadataValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) =>
      typeof item === "string" || typeof item === "number" ? item : JSON.stringify(item),
    );
  }
  return JSON.stringify(value) ?? "";
}

function describeFailure(error: unknown, timeoutMs: number): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if ("killed" in error && error.killed === true) {
    return `ExifTool timed out after ${timeoutMs}ms`;
  }
  if ("code" in error && error.code === "ENOENT") {
    return "ExifTool executable not found";
  }
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
  return stderr ? `ExifTool error: ${stderr}` : `ExifTool error: ${error.message}`;
}

@Injectable()
export class ExifToolClient implements MetadataSource {
  private readonly logger = new Logger(ExifToolClient.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly exec: ExecFileFn = defaultExec,
  ) {}

  async extract(imagePath: string): Promise<MetadataRecord> {
    const { path: binary, timeoutMs } = this.config.exiftool;

    let stdout: string;
    try {
      ({ stdout } = await this.exec(binary, ["-j", imagePath], { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES }));
    } catch (error) {
      const message = describeFailure(error, timeoutMs);
      this.logger.error(`Metadata extraction failed for ${imagePath}: ${message}`);
      throw new MetadataExtractionError(message);
    }

    return this.parse(stdout, imagePath);
  }

  private parse(stdout: string, imagePath: string): MetadataRecord {
    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Unparsable ExifTool output for ${imagePath}: ${reason}`);
      throw new MetadataExtractionError("ExifTool returned invalid JSON");
    }

    const parsed = outputSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.error(`Unexpected ExifTool output shape for ${imagePath}`);
      throw new MetadataExtractionError("ExifTool returned no metadata object");
    }

    const [first] = parsed.data;
    const record: Record<string, MetadataValue> = {};
    for (const [key, value] of Object.entries(first)) {
      record[key] = normalizeValue(value);
    }
    return record;
  }
}
