import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  Query,
  UnprocessableEntityException,
  UploadedFile,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";

import type { AnalyzeResponseDto } from "../dto/analyze-response.dto.js";
import { formatReport, quickVerdict } from "../report.js";
import { AuthenticityService } from "../services/authenticity.service.js";
import { UploadStorage } from "../storage/upload.storage.js";
import { isAnalysisError } from "../types.js";

type ResponseFormat = "report" | "lines" | "quick";

function resolveFormat(value: string | undefined): ResponseFormat {
  const normalized = (value ?? "report").toLowerCase();
  if (normalized === "report" || normalized === "lines" || normalized === "quick") {
    return normalized;
  }
  throw new BadRequestException("format must be one of report, lines, quick");
}

@Controller("analyze")
export class AnalyzeController {
  constructor(
    @Inject(AuthenticityService)
    private readonly authenticityService: AuthenticityService,
    @Inject(UploadStorage)
    private readonly uploads: UploadStorage,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor("image"))
  async analyze(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query("format") format?: string,
  ): Promise<AnalyzeResponseDto> {
    const mode = resolveFormat(format);
    if (!file) {
      throw new BadRequestException("An image upload is required in the 'image' field.");
    }

    const staged = await this.uploads.stage(file.originalname, file.buffer);
    try {
      const result = await this.authenticityService.analyze(staged.path);
      if (isAnalysisError(result)) {
        throw new UnprocessableEntityException(result.error);
      }

      const report = { ...result, imagePath: staged.fileName };
      switch (mode) {
        case "lines":
          return { lines: formatReport(report) };
        case "quick":
          return { result: quickVerdict(report) };
        default:
          return report;
      }
    } finally {
      await staged.release();
    }
  }
}
