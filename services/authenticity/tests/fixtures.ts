import path from "node:path";

import type { AppConfig } from "../src/config.js";
import { resolveScoringConfig } from "../src/config.js";
import { MetadataExtractionError } from "../src/clients/metadata.source.js";
import type { MetadataSource } from "../src/clients/metadata.source.js";
import type { DetailedChecks, MetadataRecord } from "../src/types.js";

export function testConfig(): AppConfig {
  return {
    port: 0,
    exiftool: { path: "exiftool", timeoutMs: 30000 },
    upload: { maxBytes: 1024 * 1024 },
    scoring: resolveScoringConfig(),
  };
}

/** Camera capture carrying a C2PA manifest; scores 77. */
export const cameraRecord: MetadataRecord = {
  SourceFile: "/images/camera.jpg",
  FileType: "JPEG",
  FileSize: "3.2 MB",
  FileModifyDate: "2024:03:10 12:00:00+00:00",
  FileCreateDate: "2024:03:10 12:00:00+00:00",
  DateTimeOriginal: "2024:03:09 08:15:00",
  Make: "Nikon",
  Model: "Z 6",
  ActiveManifestUrl: "self#jumbf=/c2pa/urn:uuid:1234",
  ClaimSignatureUrl: "self#jumbf=/c2pa/urn:uuid:1234/c2pa.signature",
  ActiveManifestHash: "9f86d081884c7d65",
  ValidationResultsActiveManifestSuccessCode: ["claimSignature.validated", "signingCredential.trusted"],
  Claim_Generator_InfoName: "Camera Firmware",
};

/** Two fields only; scores 22.5. */
export const minimalRecord: MetadataRecord = {
  FileType: "PNG",
  FileSize: "200 kB",
};

export function emptyChecks(): DetailedChecks {
  return {
    integrity: {
      valid_file_type: false,
      reasonable_size: false,
      has_metadata: false,
      consistent_dates: false,
    },
    c2pa: {
      has_c2pa_manifest: false,
      valid_signature: false,
      hash_validation: false,
      ai_disclosure: false,
      validation_passed: false,
    },
    ai: {
      explicit_ai_credit: false,
      generative_actions: false,
      digital_source_type: false,
      creation_tools: false,
    },
    tampering: {
      inconsistent_software: false,
      multiple_editors: false,
      metadata_stripping: false,
      date_anomalies: false,
    },
  };
}

/** Serves records by file name and remembers every path it was asked for. */
export class FakeMetadataSource implements MetadataSource {
  readonly requested: string[] = [];

  constructor(private readonly entries: Record<string, MetadataRecord | Error>) {}

  async extract(imagePath: string): Promise<MetadataRecord> {
    this.requested.push(imagePath);
    const entry = this.entries[path.basename(imagePath)];
    if (entry === undefined) {
      throw new MetadataExtractionError(`no metadata for ${imagePath}`);
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry;
  }
}
