import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { envSchema } from './env.schema';
import { SCREENER_CONFIG, screenerConfig } from './screener.config';
import { CLOCK, systemClock } from './clock';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [screenerConfig],
      // Raw strings stay in process.env; screenerConfig parses them again into typed values.
      validate: (config) => {
        envSchema.parse(config);
        return config;
      },
    }),
  ],
  providers: [
    {
      provide: SCREENER_CONFIG,
      inject: [screenerConfig.KEY],
      useFactory: (config: ConfigType<typeof screenerConfig>) => config,
    },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [ConfigModule, SCREENER_CONFIG, CLOCK],
})
export class CoreModule {}
