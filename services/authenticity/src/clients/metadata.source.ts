import type { MetadataRecord } from "../types.js";

export class MetadataExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MetadataExtractionError";
  }
}

export interface MetadataSource {
  /** Rejects with {@link MetadataExtractionError} when no metadata can be read. */
  extract(imagePath: string): Promise<MetadataRecord>;
}
