import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ContentServerClient, ContentServerClientOptions } from './content-server.client';
import { CONTENT_SOURCE } from './interfaces/content-source.interface';

@Module({
  providers: [
    {
      provide: CONTENT_SOURCE,
      useFactory: (configService: ConfigService) =>
        new ContentServerClient(
          configService.getOrThrow<ContentServerClientOptions>('contentServer'),
        ),
      inject: [ConfigService],
    },
  ],
  exports: [CONTENT_SOURCE],
})
export class ContentServerModule {}
