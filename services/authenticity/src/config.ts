import { z } from "zod";

export const scoringConfigSchema = z
  .object({
    weights: z.object({
      integrity: z.number().nonnegative(),
      provenance: z.number().nonnegative(),
      ai: z.number().nonnegative(),
      tampering: z.number().nonnegative(),
    }),
    thresholds: z.object({
      high: z.number().min(0).max(100),
      moderate: z.number().min(0).max(100),
      low: z.number().min(0).max(100),
    }),
  })
  .refine(
    ({ thresholds }) => thresholds.high > thresholds.moderate && thresholds.moderate > thresholds.low,
    { message: "thresholds must be strictly descending (high > moderate > low)", path: ["thresholds"] },
  );

export type ScoringConfig = z.infer<typeof scoringConfigSchema>;

export interface ScoringOverrides {
  weights?: Partial<ScoringConfig["weights"]>;
  thresholds?: Partial<ScoringConfig["thresholds"]>;
}

export const DEFAULT_SCORING: ScoringConfig = {
  weights: {
    integrity: 0.3,
    provenance: 0.4,
    ai: 0.2,
    tampering: 0.1,
  },
  thresholds: {
    high: 80,
    moderate: 60,
    low: 40,
  },
};

export const resolveScoringConfig = (partial: ScoringOverrides = {}): ScoringConfig => {
  const merged: ScoringConfig = {
    weights: {
      integrity: partial.weights?.integrity ?? DEFAULT_SCORING.weights.integrity,
      provenance: partial.weights?.provenance ?? DEFAULT_SCORING.weights.provenance,
      ai: partial.weights?.ai ?? DEFAULT_SCORING.weights.ai,
      tampering: partial.weights?.tampering ?? DEFAULT_SCORING.weights.tampering,
    },
    thresholds: {
      high: partial.thresholds?.high ?? DEFAULT_SCORING.thresholds.high,
      moderate: partial.thresholds?.moderate ?? DEFAULT_SCORING.thresholds.moderate,
      low: partial.thresholds?.low ?? DEFAULT_SCORING.thresholds.low,
    },
  };

  return scoringConfigSchema.parse(merged);
};

const appConfigSchema = z.object({
  port: z.number().int().nonnegative(),
  exiftool: z.object({
    path: z.string().min(1),
    timeoutMs: z.number().int().positive(),
  }),
  upload: z.object({
    maxBytes: z.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema> & { scoring: ScoringConfig };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appConfigSchema.parse({
    port: Number(env.PORT ?? "8080"),
    exiftool: {
      path: env.EXIFTOOL_PATH ?? "exiftool",
      timeoutMs: Number(env.EXIFTOOL_TIMEOUT_MS ?? "30000"),
    },
    upload: {
      maxBytes: Number(env.UPLOAD_MAX_BYTES ?? String(50 * 1024 * 1024)),
    },
  });

  return { ...parsed, scoring: resolveScoringConfig() };
}
