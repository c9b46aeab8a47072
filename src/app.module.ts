import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { PersistenceModule } from './persistence/persistence.module.js';
import { SessionModule } from './session/session.module.js';
import { CliModule } from './cli/cli.module.js';

@Module({
  imports: [ConfigModule, ContentModule, EngineModule, PersistenceModule, SessionModule, CliModule],
})
export class AppModule {}
