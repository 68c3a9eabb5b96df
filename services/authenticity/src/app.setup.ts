import { ValidationPipe } from "@nestjs/common";
import type { INestApplication } from "@nestjs/common";

/** Request handling shared by the server bootstrap and the HTTP tests. */
export function configureApp(app: INestApplication): INestApplication {
  // Batch requests name a server-side directory; unknown body keys are refused.
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  }));
  app.enableShutdownHooks();
  return app;
}
