import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import contentServerConfig from './config/content-server.config';
import indicesConfig from './config/indices.config';
import scheduleConfig from './config/schedule.config';
import typesenseConfig from './config/typesense.config';
import { IndexerModule } from './indexer/indexer.module';
import { SearchModule } from './search/search.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [typesenseConfig, contentServerConfig, indicesConfig, scheduleConfig],
    }),
    IndexerModule.forRoot(),
    SearchModule,
  ],
})
export class AppModule {}
