/**
 * PerlinNoise - seeded 2D gradient noise (improved Perlin, 2002 fade curve)
 *
 * sample() is remapped to [0, 1] so callers can center it with "- 0.5"
 * or stretch it with "* 2 - 1". The permutation table is shuffled from
 * the seed, so equal seeds give equal fields.
 */

import { SeededRandom } from './SeededRandom';

const TABLE_SIZE = 256;

/** 8 unit-ish gradient directions */
const GRADIENTS_X = [1, -1, 1, -1, 1, -1, 0, 0];
const GRADIENTS_Y = [1, 1, -1, -1, 0, 0, 1, -1];

export class PerlinNoise {
    private readonly perm = new Uint8Array(TABLE_SIZE * 2);
    private seedValue: number = 0;

    constructor(seed: number = 0) {
        this.reseed(seed);
    }

    get seed(): number {
        return this.seedValue;
    }

    reseed(seed: number): void {
        this.seedValue = seed | 0;
        const rng = new SeededRandom(this.seedValue);

        const p = new Uint8Array(TABLE_SIZE);
        for (let i = 0; i < TABLE_SIZE; i++) p[i] = i;

        // Fisher-Yates
        for (let i = TABLE_SIZE - 1; i > 0; i--) {
            const j = Math.floor(rng.next() * (i + 1));
            const tmp = p[i];
            p[i] = p[j];
            p[j] = tmp;
        }

        for (let i = 0; i < TABLE_SIZE * 2; i++) {
            this.perm[i] = p[i & (TABLE_SIZE - 1)];
        }
    }

    /** Noise in [0, 1] */
    sample(x: number, y: number): number {
        const value = this.raw(x, y);
        return Math.min(1, Math.max(0, value * 0.5 + 0.5));
    }

    /**
     * Multi-octave sum, normalized back to [0, 1].
     * Frequency doubles per octave; amplitude falls by `persistence`.
     * `z` shifts the x coordinate so separate streams stay independent.
     */
    octave(x: number, y: number, z: number, octaves: number, persistence: number): number {
        const count = Math.max(1, Math.floor(octaves));
        let total = 0;
        let frequency = 1;
        let amplitude = 1;
        let maxValue = 0;

        for (let i = 0; i < count; i++) {
            total += this.sample(x * frequency + z, y * frequency + i * 0.1) * amplitude;
            maxValue += amplitude;
            amplitude *= persistence;
            frequency *= 2;
        }

        return maxValue > 0 ? total / maxValue : 0;
    }

    /** Noise in roughly [-1, 1] */
    private raw(x: number, y: number): number {
        const xf0 = Math.floor(x);
        const yf0 = Math.floor(y);
        const xi = xf0 & (TABLE_SIZE - 1);
        const yi = yf0 & (TABLE_SIZE - 1);
        const xf = x - xf0;
        const yf = y - yf0;

        const perm = this.perm;
        const aa = perm[perm[xi] + yi];
        const ab = perm[perm[xi] + yi + 1];
        const ba = perm[perm[xi + 1] + yi];
        const bb = perm[perm[xi + 1] + yi + 1];

        const u = fade(xf);
        const v = fade(yf);

        const x1 = lerp(grad(aa, xf, yf), grad(ba, xf - 1, yf), u);
        const x2 = lerp(grad(ab, xf, yf - 1), grad(bb, xf - 1, yf - 1), u);

        // 2D gradient noise peaks near ±0.7 with these gradients
        return lerp(x1, x2, v) * Math.SQRT2;
    }
}

function fade(t: number): number {
    return t * t * t * (t * (t * 6 - 15) + 10);
}

function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}

function grad(hash: number, x: number, y: number): number {
    const h = hash & 7;
    return GRADIENTS_X[h] * x + GRADIENTS_Y[h] * y;
}
