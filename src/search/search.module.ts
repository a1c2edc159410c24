import { Module } from '@nestjs/common';
import { TypesenseModule } from '../typesense/typesense.module';
import { SearchService } from './search.service';

@Module({
  imports: [TypesenseModule],
  providers: [SearchService],
  exports: [SearchService],
})
export class SearchModule {}
