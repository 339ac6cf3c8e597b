import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe } from '@nestjs/common';
import cors from 'cors';
import { AppModule } from './app.module';
import { loadServerConfig, printConfig } from './print.config';
import { GlobalHttpExceptionFilter } from './request/exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = loadServerConfig(app.get(ConfigService));

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );

  app.useGlobalFilters(new GlobalHttpExceptionFilter());

  app.use(cors({
    origin: '*',
  }));

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Card Token API')
    .setDescription('Validates gateway card tokens before they are submitted')
    .setVersion('1.0')
    .addTag('card-token')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api', app, document);

  await app.listen(config.port, config.host);

  printConfig(config);
}
void bootstrap();
