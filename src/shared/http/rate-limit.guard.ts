/**
 * @fileoverview Rate Limit Guard
 *
 * Per-IP fixed-window request limiting for every route except health and
 * metrics.
 *
 * @remarks
 * Windows live in process memory, so each instance counts on its own.
 */

import {
    CanActivate,
    ExecutionContext,
    HttpException,
    HttpStatus,
    Inject,
    Injectable,
    Logger,
    OnApplicationShutdown,
    OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Counter } from 'prom-client';
import type { Request } from 'express';
import { Clock, CLOCK } from '../clock';
import { clientIpOf } from './request-context';

const rateLimitCounter = new Counter({
    name: 'member_directory_rate_limited_total',
    help: 'Requests rejected by the per-IP rate limit',
});

const WINDOW_MS = 60_000;
const CLEANUP_INTERVAL_MS = 5 * 60_000;

/** Paths that are never limited */
const UNLIMITED_PATHS = ['/health', '/metrics'];

interface IpWindow {
    count: number;
    resetAt: number;
}

@Injectable()
export class RateLimitGuard implements CanActivate, OnModuleInit, OnApplicationShutdown {
    private readonly logger = new Logger(RateLimitGuard.name);
    private readonly windows = new Map<string, IpWindow>();
    private readonly requestsPerMinute: number;
    private cleanupTimer: NodeJS.Timeout | null = null;

    constructor(
        @Inject(CLOCK) private readonly clock: Clock,
        configService: ConfigService,
    ) {
        this.requestsPerMinute = configService.get<number>('RATE_LIMIT_PER_MINUTE') ?? 100;
    }

    onModuleInit(): void {
        this.cleanupTimer = setInterval(() => this.cleanup(), CLEANUP_INTERVAL_MS);
        this.cleanupTimer.unref();
    }

    onApplicationShutdown(): void {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = null;
        }
    }

    canActivate(context: ExecutionContext): boolean {
        const req = context.switchToHttp().getRequest<Request>();
        if (UNLIMITED_PATHS.some((path) => req.path === path || req.path.startsWith(`${path}/`))) {
            return true;
        }
        this.checkAndIncrement(clientIpOf(req) ?? 'unknown');
        return true;
    }

    /**
     * Counts one request from the address.
     *
     * @throws HttpException 429 once the address has used up its window
     */
    checkAndIncrement(ipAddress: string): void {
        const now = this.clock.now().getTime();
        let window = this.windows.get(ipAddress);
        if (!window || now >= window.resetAt) {
            window = { count: 0, resetAt: now + WINDOW_MS };
            this.windows.set(ipAddress, window);
        }

        if (window.count >= this.requestsPerMinute) {
            rateLimitCounter.inc();
            this.logger.warn({ msg: 'Rate limit exceeded', ipAddress });
            throw new HttpException('Rate limit exceeded. Please try again later.', HttpStatus.TOO_MANY_REQUESTS);
        }
        window.count++;
    }

    /** Drops windows that have run out */
    cleanup(): number {
        const now = this.clock.now().getTime();
        let removed = 0;
        for (const [ipAddress, window] of this.windows.entries()) {
            if (now >= window.resetAt) {
                this.windows.delete(ipAddress);
                removed++;
            }
        }
        return removed;
    }
}
