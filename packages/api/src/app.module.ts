import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

import { AppController } from './app.controller';
import { CitationRunsModule } from './citation-runs/citation-runs.module';
import { buildDatabaseOptions } from './config/database.config';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        ...buildDatabaseOptions((key) => configService.get<string>(key)),
        autoLoadEntities: true,
      }),
    }),
    CitationRunsModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
