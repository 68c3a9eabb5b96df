import type { AuthenticityReport } from "../types.js";

export class LinesResponseDto {
  lines!: string[];
}

export class QuickCheckResponseDto {
  result!: string;
}

export type AnalyzeResponseDto = AuthenticityReport | LinesResponseDto | QuickCheckResponseDto;
