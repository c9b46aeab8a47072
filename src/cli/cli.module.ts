import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { PersistenceModule } from '../persistence/persistence.module.js';
import { SessionModule } from '../session/session.module.js';
import { GameCliService } from './game-cli.service.js';

@Module({
  imports: [EngineModule, PersistenceModule, SessionModule],
  providers: [GameCliService],
  exports: [GameCliService],
})
export class CliModule {}
