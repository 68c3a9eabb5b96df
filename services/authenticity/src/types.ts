export type MetadataScalar = string | number | boolean | null;

export type MetadataValue = MetadataScalar | Array<string | number>;

export type MetadataRecord = Readonly<Record<string, MetadataValue>>;

export type IntegrityChecks = {
  valid_file_type: boolean;
  reasonable_size: boolean;
  has_metadata: boolean;
  consistent_dates: boolean;
};

export type ProvenanceChecks = {
  has_c2pa_manifest: boolean;
  valid_signature: boolean;
  hash_validation: boolean;
  ai_disclosure: boolean;
  validation_passed: boolean;
};

export type AiIndicatorChecks = {
  explicit_ai_credit: boolean;
  generative_actions: boolean;
  digital_source_type: boolean;
  creation_tools: boolean;
};

export type TamperingChecks = {
  inconsistent_software: boolean;
  multiple_editors: boolean;
  metadata_stripping: boolean;
  date_anomalies: boolean;
};

export interface DetailedChecks {
  integrity: IntegrityChecks;
  c2pa: ProvenanceChecks;
  ai: AiIndicatorChecks;
  tampering: TamperingChecks;
}

export type Verdict =
  | "HIGH_CONFIDENCE_AUTHENTIC"
  | "MODERATE_CONFIDENCE"
  | "LOW_CONFIDENCE"
  | "POTENTIALLY_MANIPULATED";

export interface AuthenticityReport {
  timestamp: string;
  imagePath: string;
  fileSize: string;
  fileType: string;
  authenticityScore: number;
  verdict: Verdict;
  detailedChecks: DetailedChecks;
  recommendations: string[];
}

export interface AnalysisError {
  error: string;
}

export type AnalysisResult = AuthenticityReport | AnalysisError;

export interface ScoreDistribution {
  high: number;
  medium: number;
  low: number;
  suspicious: number;
}

export interface BatchSummary {
  totalImages: number;
  averageScore: number;
  scoreDistribution: ScoreDistribution;
  c2paImages: number;
  aiGeneratedImages: number;
}

export function isAnalysisError(result: AnalysisResult): result is AnalysisError {
  return "error" in result;
}
