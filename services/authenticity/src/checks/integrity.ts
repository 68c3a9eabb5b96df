import type { IntegrityChecks, MetadataRecord } from "../types.js";
import { fieldCount, hasField, presentValues, valueText } from "./metadata.js";

const VALID_FILE_TYPES = ["PNG", "JPEG", "JPG", "TIFF"];
const DATE_FIELDS = ["FileModifyDate", "FileCreateDate", "DateTimeOriginal"];

const SIZE_BOUNDS = {
  kB: { min: 1, max: 50000 },
  MB: { min: 0.001, max: 50 },
} as const;

const DECIMAL = /^\d+(\.\d+)?$/;

function isReasonableSize(metadata: MetadataRecord): boolean {
  const raw = metadata.FileSize;
  if (!hasField(metadata, "FileSize") || typeof raw !== "string") {
    return false;
  }

  const text = raw.trim();
  for (const unit of ["kB", "MB"] as const) {
    if (!text.endsWith(unit)) {
      continue;
    }
    const magnitude = text.slice(0, -unit.length).trim();
    if (!DECIMAL.test(magnitude)) {
      return false;
    }
    const value = Number(magnitude);
    const bounds = SIZE_BOUNDS[unit];
    return value >= bounds.min && value <= bounds.max;
  }

  return false;
}

export function checkIntegrity(metadata: MetadataRecord): IntegrityChecks {
  const fileType = metadata.FileType;
  const dates = presentValues(metadata, DATE_FIELDS);

  return {
    valid_file_type: typeof fileType === "string" && VALID_FILE_TYPES.includes(fileType),
    reasonable_size: isReasonableSize(metadata),
    has_metadata: fieldCount(metadata) > 5,
    // Decade plausibility only; dates are not parsed.
    consistent_dates: dates.length >= 2 && dates.every((date) => valueText(date).includes("202")),
  };
}
