import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  const cfg = app.get(ConfigService);
  const corsOrigins = (cfg.get<string>('CORS_ORIGINS') ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  app.enableCors({
    origin: corsOrigins.length ? corsOrigins : true,
    credentials: true,
  });

  // DTO validation (class-validator)
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // strips undeclared fields
      forbidNonWhitelisted: true, // rejects requests that send them
      transform: true,
    }),
  );

  app.enableShutdownHooks();

  const port = Number(cfg.get<string>('PORT') ?? 3000);
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`🚀 Chat API listening on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${String(err)}`);
  process.exit(1);
});
