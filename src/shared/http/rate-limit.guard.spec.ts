/**
 * @fileoverview Rate Limit Guard Tests
 */

import { ExecutionContext, HttpException, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock } from '../clock';
import { RateLimitGuard } from './rate-limit.guard';

describe('RateLimitGuard', () => {
    const START = new Date('2026-03-01T10:00:00.000Z');

    let now: Date;
    let guard: RateLimitGuard;

    const contextFor = (path: string, ip = '10.0.0.1'): ExecutionContext => ({
        switchToHttp: () => ({
            getRequest: () => ({ path, ip, headers: {} }),
        }),
    }) as unknown as ExecutionContext;

    beforeEach(() => {
        now = START;
        const clock: Clock = { now: () => now };
        guard = new RateLimitGuard(clock, new ConfigService({ RATE_LIMIT_PER_MINUTE: 3 }));
        jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        guard.onApplicationShutdown();
        jest.restoreAllMocks();
    });

    it('should answer 429 once an address uses up its minute', () => {
        for (let request = 0; request < 3; request++) {
            expect(guard.canActivate(contextFor('/members'))).toBe(true);
        }

        let rejection: unknown;
        try {
            guard.canActivate(contextFor('/members'));
        } catch (error) {
            rejection = error;
        }
        expect(rejection).toBeInstanceOf(HttpException);
        expect(rejection).toMatchObject({ status: 429, message: 'Rate limit exceeded. Please try again later.' });
    });

    it('should count each address separately', () => {
        for (let request = 0; request < 3; request++) {
            guard.canActivate(contextFor('/members', '10.0.0.1'));
        }

        expect(guard.canActivate(contextFor('/members', '10.0.0.2'))).toBe(true);
    });

    it('should open a new window after a minute', () => {
        for (let request = 0; request < 3; request++) {
            guard.canActivate(contextFor('/members'));
        }

        now = new Date(START.getTime() + 60_000);

        expect(guard.canActivate(contextFor('/members'))).toBe(true);
    });

    it('should never limit health and metrics', () => {
        for (let request = 0; request < 10; request++) {
            expect(guard.canActivate(contextFor('/health'))).toBe(true);
            expect(guard.canActivate(contextFor('/metrics'))).toBe(true);
        }
    });

    it('should drop windows that have run out', () => {
        guard.checkAndIncrement('10.0.0.1');
        now = new Date(START.getTime() + 30_000);
        guard.checkAndIncrement('10.0.0.2');

        now = new Date(START.getTime() + 60_000);

        expect(guard.cleanup()).toBe(1);
    });
});
