import type { MetadataRecord, MetadataValue } from "../types.js";

export function hasField(metadata: MetadataRecord, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(metadata, field);
}

export function fieldCount(metadata: MetadataRecord): number {
  return Object.keys(metadata).length;
}

/** Text form of a metadata value, as used by every substring test. */
export function valueText(value: MetadataValue): string {
  if (value === null) {
    return "";
  }
  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(", ");
  }
  return String(value);
}

export function presentValues(metadata: MetadataRecord, fields: readonly string[]): MetadataValue[] {
  return fields.filter((field) => hasField(metadata, field)).map((field) => metadata[field]);
}

export function containsAny(text: string, needles: readonly string[]): boolean {
  return needles.some((needle) => text.includes(needle));
}
