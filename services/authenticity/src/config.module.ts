import { Module } from "@nestjs/common";

import { loadConfig } from "./config.js";
import { APP_CONFIG } from "./tokens.js";

@Module({
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: () => loadConfig(),
    },
  ],
  exports: [APP_CONFIG],
})
export class ConfigModule {}
