import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './common/config/app.config';
import { LedgerExceptionFilter } from './common/filters/ledger-exception.filter';
import { BigIntSerializerInterceptor } from './common/interceptors/bigint-serializer.interceptor';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const config = app.get<AppConfig>(APP_CONFIG);
  const logger = new Logger('Bootstrap');

  // DTO 검증 파이프 전역 설정
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // DTO에 없는 속성 제거
      forbidNonWhitelisted: true, // DTO에 없는 속성 있으면 에러
      transform: true, // 자동 타입 변환
    }),
  );
  app.useGlobalFilters(new LedgerExceptionFilter());
  app.useGlobalInterceptors(new BigIntSerializerInterceptor());
  app.enableShutdownHooks();

  // Swagger 설정
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Quorum Ledger API')
      .setDescription('수수료, 스테이킹, 베스팅, 밸리데이터 합의를 갖춘 토큰 원장')
      .setVersion('1.0')
      .addTag('token', '토큰 / ERC-20 API')
      .addTag('staking', '스테이킹 API')
      .addTag('vesting', '베스팅 API')
      .addTag('governance', '거버넌스 수수료 API')
      .addTag('consensus', '액션 제안 / 확인 API')
      .addTag('admin', '특권 변경 API')
      .addTag('validator', 'Validator 조회 API')
      .addTag('events', '이벤트 로그 API')
      .build(),
  );
  SwaggerModule.setup('api', app, document);

  await app.listen(config.port);
  logger.log(`Application is running on: http://localhost:${config.port}`);
  logger.log(`Swagger UI: http://localhost:${config.port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? (error.stack ?? error.message) : String(error),
  );
  process.exit(1);
});
