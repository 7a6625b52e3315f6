import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { envFlag } from './config/env-flag.util';
import { SeedService } from './booking/infrastructure/persistence/seed.service';
import { LoggerService } from './booking/infrastructure/logging/logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = app.get(LoggerService);

  app.enableShutdownHooks();
  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );

  // Swagger documentation
  const options = new DocumentBuilder()
    .setTitle('Table Match API')
    .setDescription(
      'Finds restaurants that can seat a group and books tables for it',
    )
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, options);
  SwaggerModule.setup('docs', app, document);

  if (envFlag(true).parse(process.env.SEED_ON_STARTUP)) {
    try {
      await app.get(SeedService).seed();
    } catch (error) {
      logger.error(
        'Failed to seed database',
        error instanceof Error ? error : undefined,
      );
      throw error;
    }
  }

  const port = configService.getOrThrow('app.port', { infer: true });
  await app.listen(port);
  logger.log({ op: 'startup', outcome: 'success', port, docs: '/docs' });
}
void bootstrap();
