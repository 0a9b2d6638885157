// src/app.module.ts
import { DynamicModule, Module } from '@nestjs/common';

import type { AppConfig } from './config/app-config.js';
import { AppConfigModule } from './config/config.module.js';
import { AppController } from './app.controller.js';
import { ActivityModule } from './activity/activity.module.js';
import { GithubModule } from './github/github.module.js';

@Module({})
export class AppModule {
  static register(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [AppConfigModule.forRoot(config), GithubModule, ActivityModule],
      controllers: [AppController],
    };
  }
}
