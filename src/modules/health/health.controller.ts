import { Controller, Get, Header } from '@nestjs/common';

@Controller('health')
export class HealthController {
    /**
     * Liveness check, mounted whatever providers are enabled.
     * Still passes through auth and fault injection.
     */
    @Get()
    @Header('Content-Type', 'text/plain; charset=utf-8')
    health(): string {
        return 'ok';
    }
}
