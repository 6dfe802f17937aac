import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { loadPort } from './config/configuration';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  app.enableCors({
    origin: true,
    credentials: true,
  });
  app.enableShutdownHooks();

  const port = loadPort(process.env);
  await app.listen(port);
  new Logger('Bootstrap').log(`GitHub activity service listening on port ${port}`);
}
void bootstrap();
