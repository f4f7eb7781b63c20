// examples/src/app.module.ts

import { DynamicModule, Module } from '@nestjs/common';
import { ObservabilityConfig, ObservabilityModule } from '../../src';
import { ChatController } from './chat/chat.controller';
import { ChatService } from './chat/chat.service';

@Module({})
export class AppModule {
  static forRoot(config: ObservabilityConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ObservabilityModule.forRoot({
          LOG_LEVEL: 'info',
          SERVICE_NAME: 'example-app',
          LOG_FORMAT: 'json', // 'pretty' for local development
          enableBodyPreview: true,
          bodyPreviewPaths: ['/chat'],
          ...config
        })
      ],
      controllers: [ChatController],
      providers: [ChatService]
    };
  }
}
