import { MiddlewareConsumer, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CardModule } from './card/card.module';
import { RequestLoggerMiddleware } from './middleware/incoming-requests.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    CardModule,
  ],
})
export class AppModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(RequestLoggerMiddleware)
      .forRoutes('*');
  }
}
