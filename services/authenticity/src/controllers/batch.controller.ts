import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Post,
  ValidationPipe,
} from "@nestjs/common";

import type { LinesResponseDto } from "../dto/analyze-response.dto.js";
import { BatchRequestDto } from "../dto/batch-request.dto.js";
import { BatchService } from "../services/batch.service.js";

const MISSING_DIRECTORY_CODES = new Set(["ENOENT", "ENOTDIR"]);

@Controller("batch")
export class BatchController {
  constructor(
    @Inject(BatchService)
    private readonly batchService: BatchService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async analyzeDirectory(
    @Body(new ValidationPipe({ expectedType: BatchRequestDto, whitelist: true, forbidNonWhitelisted: true }))
    body: BatchRequestDto,
  ): Promise<LinesResponseDto> {
    try {
      return { lines: await this.batchService.analyzeDirectoryWithSummary(body.directory) };
    } catch (error) {
      if (error instanceof Error && "code" in error && typeof error.code === "string" && MISSING_DIRECTORY_CODES.has(error.code)) {
        throw new NotFoundException(`directory not found: ${body.directory}`);
      }
      throw error;
    }
  }
}
