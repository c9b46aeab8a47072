import { Module } from '@nestjs/common';
import { SaveService } from './save.service.js';

@Module({
  providers: [SaveService],
  exports: [SaveService],
})
export class PersistenceModule {}
