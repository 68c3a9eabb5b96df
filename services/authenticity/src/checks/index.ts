import type { DetailedChecks, MetadataRecord } from "../types.js";
import { checkAiIndicators } from "./ai-indicators.js";
import { checkIntegrity } from "./integrity.js";
import { checkProvenance } from "./provenance.js";
import { checkTampering } from "./tampering.js";

export { checkAiIndicators, checkIntegrity, checkProvenance, checkTampering };

export function runChecks(metadata: MetadataRecord): DetailedChecks {
  return {
    integrity: checkIntegrity(metadata),
    c2pa: checkProvenance(metadata),
    ai: checkAiIndicators(metadata),
    tampering: checkTampering(metadata),
  };
}
