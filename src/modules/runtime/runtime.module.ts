import { DynamicModule, Global, Module } from '@nestjs/common';
import { MOCK_SETTINGS, MockSettings } from '../../config/mock-settings';
import { RuntimeStateService } from './runtime-state.service';

@Global()
@Module({})
export class RuntimeModule {
  static forRoot(settings: MockSettings): DynamicModule {
    return {
      module: RuntimeModule,
      providers: [
        { provide: MOCK_SETTINGS, useValue: settings },
        RuntimeStateService,
      ],
      exports: [MOCK_SETTINGS, RuntimeStateService],
    };
  }
}
