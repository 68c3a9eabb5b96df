import type { MetadataRecord, MetadataValue, TamperingChecks } from "../types.js";
import { fieldCount, hasField, presentValues, valueText } from "./metadata.js";

const SOFTWARE_FIELDS = ["Software", "ProcessingSoftware", "CreatorTool"];
const DATE_FIELDS = ["DateTimeOriginal", "CreateDate", "ModifyDate"];

function isTruthy(value: MetadataValue): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return Boolean(value);
}

function hasMultipleEditors(metadata: MetadataRecord): boolean {
  const editors = presentValues(metadata, SOFTWARE_FIELDS).filter(isTruthy).map(valueText);
  return new Set(editors).size > 2;
}

/**
 * Years taken from the first four characters of each date mentioning "202",
 * or `undefined` when any date cannot be read that way.
 */
function extractYears(dates: MetadataValue[]): number[] | undefined {
  const years: number[] = [];
  for (const date of dates) {
    if (typeof date !== "string") {
      return undefined;
    }
    if (!date.includes("202")) {
      continue;
    }
    const head = date.slice(0, 4);
    if (!/^\d{4}$/.test(head)) {
      return undefined;
    }
    years.push(Number(head));
  }
  return years;
}

function hasDateAnomalies(metadata: MetadataRecord): boolean {
  const dates = presentValues(metadata, DATE_FIELDS);
  if (dates.length < 2) {
    return false;
  }

  const years = extractYears(dates);
  if (!years || years.length < 2) {
    return false;
  }

  return years.some((year, index) => index > 0 && year < years[index - 1]);
}

export function checkTampering(metadata: MetadataRecord): TamperingChecks {
  return {
    // Reserved: no rule currently sets this.
    inconsistent_software: false,
    multiple_editors: hasMultipleEditors(metadata),
    metadata_stripping: fieldCount(metadata) < 10 && hasField(metadata, "FileType"),
    date_anomalies: hasDateAnomalies(metadata),
  };
}
