/**
 * SeededRandom - mulberry32 stream owned by a single sampler instance.
 *
 * Two instances with the same seed produce identical sequences; nothing is shared.
 */
export class SeededRandom {
    private state: number;
    private seedValue: number;

    constructor(seed: number = 0) {
        this.seedValue = seed | 0;
        this.state = this.seedValue;
    }

    get seed(): number {
        return this.seedValue;
    }

    /** Restart the stream from a new seed */
    reseed(seed: number): void {
        this.seedValue = seed | 0;
        this.state = this.seedValue;
    }

    /** Uniform value in [0, 1) */
    next(): number {
        this.state = (this.state + 0x6d2b79f5) | 0;
        let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** Uniform value in [min, max) */
    range(min: number, max: number): number {
        return min + this.next() * (max - min);
    }
}
