import type { AiIndicatorChecks, MetadataRecord } from "../types.js";
import { containsAny, hasField, presentValues, valueText } from "./metadata.js";

const CREDIT_FIELDS = ["Credit", "Creator", "Software", "ProcessingSoftware"];
const AI_CREDIT_TERMS = ["ai", "generative", "stable diffusion", "midjourney", "dall-e", "google ai"];
const GENERATIVE_ACTION_TERMS = ["generative", "created", "ai"];

export function checkAiIndicators(metadata: MetadataRecord): AiIndicatorChecks {
  const credits = presentValues(metadata, CREDIT_FIELDS).map((value) => valueText(value).toLowerCase());

  return {
    explicit_ai_credit: credits.some((credit) => containsAny(credit, AI_CREDIT_TERMS)),
    // ActionsDescription is matched case-sensitively.
    generative_actions:
      hasField(metadata, "ActionsDescription") &&
      containsAny(valueText(metadata.ActionsDescription), GENERATIVE_ACTION_TERMS),
    digital_source_type:
      hasField(metadata, "DigitalSourceType") &&
      valueText(metadata.DigitalSourceType).toLowerCase().includes("algorithmicmedia"),
    creation_tools: hasField(metadata, "Claim_Generator_InfoName"),
  };
}
