import { describe, it, expect } from 'vitest';
import { formatUptime, UptimeTracker } from '../src/uptime.js';

describe('formatUptime', () => {
    it.each([
        [90061, '1d 1h 1m 1s'],
        [3661, '1h 1m 1s'],
        [61, '1m 1s'],
        [5, '5s'],
        [0, '0s'],
        [86400, '1d 0h 0m 0s'],
        [3600, '1h 0m 0s'],
        [120, '2m 0s'],
        [59.99, '59s'],
    ])('formats %d seconds as %s', (seconds, expected) => {
        expect(formatUptime(seconds)).toBe(expected);
    });

    it('renders components that rebuild the day/hour/minute/second breakdown', () => {
        const pattern = /^(?:(\d+)d (\d+)h (\d+)m (\d+)s|(\d+)h (\d+)m (\d+)s|(\d+)m (\d+)s|(\d+)s)$/;

        for (const seconds of [0, 1, 59, 60, 61, 3599, 3600, 3661, 86399, 86400, 90061, 1_000_000]) {
            const match = pattern.exec(formatUptime(seconds));
            expect(match).not.toBeNull();

            const parts = (match ?? []).slice(1).filter((p): p is string => p !== undefined).map(Number);
            const [d, h, m, s] = [0, 0, 0, 0].slice(parts.length).concat(parts);
            expect(d * 86400 + h * 3600 + m * 60 + s).toBe(seconds);
            expect(h).toBeLessThan(24);
            expect(m).toBeLessThan(60);
            expect(s).toBeLessThan(60);
        }
    });
});

describe('UptimeTracker', () => {
    it('measures seconds since construction on the given clock', () => {
        let clock = 5_000;
        const tracker = new UptimeTracker(() => clock);

        expect(tracker.elapsed()).toBe(0);
        clock = 7_500;
        expect(tracker.elapsed()).toBe(2.5);
    });

    it('never reports a negative duration', () => {
        let clock = 5_000;
        const tracker = new UptimeTracker(() => clock);

        clock = 1_000;
        expect(tracker.elapsed()).toBe(0);
    });

    it('is non-decreasing on the default clock', () => {
        const tracker = new UptimeTracker();
        const first = tracker.elapsed();
        const second = tracker.elapsed();

        expect(first).toBeGreaterThanOrEqual(0);
        expect(second).toBeGreaterThanOrEqual(first);
    });
});
