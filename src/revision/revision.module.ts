import { Module } from '@nestjs/common';
import { TypesenseModule } from '../typesense/typesense.module';
import { RevisionService } from './revision.service';

@Module({
  imports: [TypesenseModule],
  providers: [RevisionService],
  exports: [RevisionService],
})
export class RevisionModule {}
