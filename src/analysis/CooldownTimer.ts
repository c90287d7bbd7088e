/**
 * Countdown armed by the component that owns it, advanced by the elapsed
 * tick duration and clamped at zero.
 */
export class CooldownTimer {
    private readonly durationMs: number;
    private remaining = 0;

    constructor(durationMs: number) {
        this.durationMs = durationMs;
    }

    arm(): void {
        this.remaining = this.durationMs;
    }

    advance(dtMs: number): void {
        this.remaining = Math.max(0, this.remaining - dtMs);
    }

    get active(): boolean {
        return this.remaining > 0;
    }

    /** ms left */
    get remainingMs(): number {
        return this.remaining;
    }

    reset(): void {
        this.remaining = 0;
    }
}
