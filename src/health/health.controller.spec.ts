import { HealthController } from './health.controller';

describe('HealthController', () => {
    it('should report ok with the current time', () => {
        const controller = new HealthController({ now: () => new Date('2026-03-01T10:00:00.000Z') });

        expect(controller.health()).toMatchObject({ status: 'ok', timestamp: '2026-03-01T10:00:00.000Z' });
    });
});
