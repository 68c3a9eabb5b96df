import type { MetadataRecord, ProvenanceChecks } from "../types.js";
import { containsAny, hasField, valueText } from "./metadata.js";

const C2PA_INDICATORS = ["c2pa", "JUMD", "ActiveManifestUrl", "ClaimSignatureUrl"].map((indicator) =>
  indicator.toLowerCase(),
);
const AI_DISCLOSURE_KEYWORDS = ["generative ai", "google ai", "algorithmicmedia", "created"];
const CRITICAL_VALIDATIONS = ["signingCredential", "timeStamp", "claimSignature"];

function hasManifest(metadata: MetadataRecord): boolean {
  return Object.entries(metadata).some(
    ([key, value]) =>
      containsAny(key.toLowerCase(), C2PA_INDICATORS) || containsAny(valueText(value).toLowerCase(), C2PA_INDICATORS),
  );
}

function hasAiDisclosure(metadata: MetadataRecord): boolean {
  return Object.values(metadata).some(
    (value) => value !== null && containsAny(valueText(value).toLowerCase(), AI_DISCLOSURE_KEYWORDS),
  );
}

function validationPassed(metadata: MetadataRecord): boolean {
  if (!hasField(metadata, "ValidationResultsActiveManifestSuccessCode")) {
    return false;
  }
  const value = metadata.ValidationResultsActiveManifestSuccessCode;
  const codes = Array.isArray(value) ? value.map((code) => String(code)) : [valueText(value)];
  return codes.some((code) => containsAny(code, CRITICAL_VALIDATIONS));
}

/**
 * Looks for embedded content-provenance (C2PA) claims. Signature and hash
 * fields are only checked for presence; nothing is verified cryptographically.
 */
export function checkProvenance(metadata: MetadataRecord): ProvenanceChecks {
  return {
    has_c2pa_manifest: hasManifest(metadata),
    valid_signature: hasField(metadata, "ClaimSignatureUrl"),
    hash_validation: hasField(metadata, "ActiveManifestHash"),
    ai_disclosure: hasAiDisclosure(metadata),
    validation_passed: validationPassed(metadata),
  };
}
