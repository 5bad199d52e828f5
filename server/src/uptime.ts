/**
 * Uptime tracking and formatting.
 */

const SECONDS_PER_DAY = 86400;
const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_MINUTE = 60;

export class UptimeTracker {
    private readonly startedAt: number;
    private readonly now: () => number;

    /**
     * @param now - Clock in milliseconds. Defaults to the monotonic
     *   `performance.now()`, which never runs backwards.
     */
    constructor(now: () => number = () => performance.now()) {
        this.now = now;
        this.startedAt = now();
    }

    /** Seconds since construction. */
    elapsed(): number {
        return Math.max(0, (this.now() - this.startedAt) / 1000);
    }
}

/**
 * Render seconds as the largest applicable breakdown, e.g. `1d 1h 1m 1s`,
 * `1h 0m 5s`, `2m 0s` or `5s`.
 */
export function formatUptime(seconds: number): string {
    const total = Math.max(0, seconds);
    const days = Math.floor(total / SECONDS_PER_DAY);
    const hours = Math.floor((total % SECONDS_PER_DAY) / SECONDS_PER_HOUR);
    const minutes = Math.floor((total % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
    const secs = Math.floor(total % SECONDS_PER_MINUTE);

    if (days > 0) return `${days}d ${hours}h ${minutes}m ${secs}s`;
    if (hours > 0) return `${hours}h ${minutes}m ${secs}s`;
    if (minutes > 0) return `${minutes}m ${secs}s`;
    return `${secs}s`;
}
