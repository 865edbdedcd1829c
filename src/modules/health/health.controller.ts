import { Controller, Get, Header } from '@nestjs/common';

@Controller('health')
export class HealthController {
    /**
     * Liveness check. Answers without touching the backend.
     */
    @Get()
    @Header('Access-Control-Allow-Origin', '*')
    health(): { status: 'healthy' } {
        return { status: 'healthy' };
    }
}
