export type Verdict =
  | 'HIGH_CONFIDENCE_AUTHENTIC'
  | 'MODERATE_CONFIDENCE'
  | 'LOW_CONFIDENCE'
  | 'POTENTIALLY_MANIPULATED';

export interface DetailedChecks {
  integrity: Record<string, boolean>;
  c2pa: Record<string, boolean>;
  ai: Record<string, boolean>;
  tampering: Record<string, boolean>;
}

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

export interface LinesResponse {
  lines: string[];
}

export interface QuickCheckResponse {
  result: string;
}

export interface HealthResponse {
  status: string;
}

export interface UploadOptions {
  fileName: string;
  contentType?: string;
}
