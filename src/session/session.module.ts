import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { PersistenceModule } from '../persistence/persistence.module.js';
import { CharacterFactoryService } from './character-factory.service.js';
import { GameViewService } from './game-view.service.js';
import { GameSessionService } from './game-session.service.js';

@Module({
  imports: [EngineModule, PersistenceModule],
  providers: [CharacterFactoryService, GameViewService, GameSessionService],
  exports: [GameSessionService],
})
export class SessionModule {}
