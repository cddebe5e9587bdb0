import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('PORT', 3000);
  await app.listen(port);
  Logger.log(`Price estimator listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch(error => {
  Logger.error(
    `Failed to start: ${error instanceof Error ? error.message : 'Unknown error'}`,
    undefined,
    'Bootstrap',
  );
  process.exit(1);
});
