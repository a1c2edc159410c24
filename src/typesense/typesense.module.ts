import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SEARCH_BACKEND } from './interfaces/search-backend.interface';
import { TypesenseClient, TypesenseClientOptions } from './typesense.client';

@Module({
  providers: [
    {
      provide: SEARCH_BACKEND,
      useFactory: (configService: ConfigService) =>
        new TypesenseClient(configService.getOrThrow<TypesenseClientOptions>('typesense')),
      inject: [ConfigService],
    },
  ],
  exports: [SEARCH_BACKEND],
})
export class TypesenseModule {}
