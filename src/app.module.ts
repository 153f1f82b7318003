import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { OrderPipelineModule, orderPipelineConfigFromEnv } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    OrderPipelineModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        orderPipelineConfigFromEnv(configService),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
