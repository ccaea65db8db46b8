import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { RequestIdInterceptor } from './common/interceptors/request-id.interceptor';
import { envConfigOptions } from './config/environment';
import { MockSettings } from './config/mock-settings';
import { HealthModule } from './modules/health/health.module';
import { ApiKeyGuard } from './modules/pipeline/guards/api-key.guard';
import { FaultInjectionGuard } from './modules/pipeline/guards/fault-injection.guard';
import { RequestCountGuard } from './modules/pipeline/guards/request-count.guard';
import { LatencyInterceptor } from './modules/pipeline/interceptors/latency.interceptor';
import { ProvidersModule } from './modules/providers/providers.module';
import { RuntimeModule } from './modules/runtime/runtime.module';

@Module({})
export class AppModule {
    static forRoot(settings: MockSettings): DynamicModule {
        return {
            module: AppModule,
            imports: [
                // Configuration
                ConfigModule.forRoot(envConfigOptions()),

                // Core modules
                RuntimeModule.forRoot(settings),

                // Feature modules
                HealthModule,
                ProvidersModule.register(settings),
            ],
            providers: [
                // Global exception filter
                {
                    provide: APP_FILTER,
                    useClass: AllExceptionsFilter,
                },
                // Request pipeline, in order: count → auth → fault
                {
                    provide: APP_GUARD,
                    useClass: RequestCountGuard,
                },
                {
                    provide: APP_GUARD,
                    useClass: ApiKeyGuard,
                },
                {
                    provide: APP_GUARD,
                    useClass: FaultInjectionGuard,
                },
                // Global interceptors; latency runs last, right before the handler
                {
                    provide: APP_INTERCEPTOR,
                    useClass: RequestIdInterceptor,
                },
                {
                    provide: APP_INTERCEPTOR,
                    useClass: LoggingInterceptor,
                },
                {
                    provide: APP_INTERCEPTOR,
                    useClass: LatencyInterceptor,
                },
            ],
        };
    }
}
