/**
 * @fileoverview Health Controller
 *
 * Public liveness endpoint for load balancers and monitoring.
 */

import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Clock, CLOCK } from '../shared/clock';

export interface HealthStatus {
    status: 'ok';
    timestamp: string;
    uptimeSeconds: number;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
    constructor(@Inject(CLOCK) private readonly clock: Clock) { }

    /**
     * Liveness only; storage reachability is reported by failing requests
     * (503) rather than here.
     */
    @Get()
    @ApiOperation({ summary: 'Liveness check' })
    health(): HealthStatus {
        return {
            status: 'ok',
            timestamp: this.clock.now().toISOString(),
            uptimeSeconds: Math.floor(process.uptime()),
        };
    }
}
