import { Module } from "@nestjs/common";
import { MulterModule } from "@nestjs/platform-express";

import { ExifToolClient } from "./clients/exiftool.client.js";
import { AnalyzeController } from "./controllers/analyze.controller.js";
import { BatchController } from "./controllers/batch.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import type { AppConfig } from "./config.js";
import { ConfigModule } from "./config.module.js";
import { AuthenticityService } from "./services/authenticity.service.js";
import { BatchService } from "./services/batch.service.js";
import { UploadStorage } from "./storage/upload.storage.js";
import { APP_CONFIG, METADATA_SOURCE } from "./tokens.js";

const metadataSourceProvider = {
  provide: METADATA_SOURCE,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => new ExifToolClient(config),
};

const uploadStorageProvider = {
  provide: UploadStorage,
  useFactory: () => new UploadStorage(),
};

@Module({
  imports: [
    ConfigModule,
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => ({
        limits: { fileSize: config.upload.maxBytes },
      }),
    }),
  ],
  controllers: [AnalyzeController, BatchController, HealthController],
  providers: [
    metadataSourceProvider,
    uploadStorageProvider,
    AuthenticityService,
    BatchService,
  ],
})
export class AppModule {}
