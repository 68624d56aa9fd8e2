/**
 * AmplitudeCurve - keyframed scalar curve used for every amplitude/shape modulation
 *
 * Keys follow Babylon's IAnimationKey layout (frame/value/inTangent/outTangent),
 * so animation keys authored for BABYLON.Animation can be passed straight in.
 *
 * Interpolation:
 * - Hermite when the left key has outTangent AND the right key has inTangent
 * - Linear otherwise
 * - Constant outside the key range (clamped to first/last value)
 */

import * as BABYLON from '@babylonjs/core';

export interface CurveKey {
    frame: number;
    value: number;
    inTangent?: number;
    outTangent?: number;
}

/** Anything that maps a normalized input to a scalar */
export interface ScalarCurve {
    evaluate(t: number): number;
}

export class AmplitudeCurve implements ScalarCurve {
    private readonly keys: CurveKey[];

    constructor(keys: ReadonlyArray<CurveKey>) {
        this.keys = keys
            .map((k) => ({ ...k }))
            .sort((a, b) => a.frame - b.frame);
    }

    static constant(value: number): AmplitudeCurve {
        return new AmplitudeCurve([
            { frame: 0, value },
            { frame: 1, value },
        ]);
    }

    static linear(t0: number, v0: number, t1: number, v1: number): AmplitudeCurve {
        return new AmplitudeCurve([
            { frame: t0, value: v0 },
            { frame: t1, value: v1 },
        ]);
    }

    get length(): number {
        return this.keys.length;
    }

    getKeys(): ReadonlyArray<CurveKey> {
        return this.keys;
    }

    evaluate(t: number): number {
        const keys = this.keys;
        const count = keys.length;
        if (count === 0) return 0;

        const first = keys[0];
        const last = keys[count - 1];
        if (count === 1 || t <= first.frame) return first.value;
        if (t >= last.frame) return last.value;

        // find the bracketing pair
        let i = 0;
        while (i < count - 2 && t > keys[i + 1].frame) {
            i++;
        }

        const start = keys[i];
        const end = keys[i + 1];
        const frameDelta = end.frame - start.frame;
        if (frameDelta <= 0) return end.value;

        const gradient = (t - start.frame) / frameDelta;

        if (start.outTangent !== undefined && end.inTangent !== undefined) {
            return BABYLON.Scalar.Hermite(
                start.value,
                start.outTangent * frameDelta,
                end.value,
                end.inTangent * frameDelta,
                gradient
            );
        }

        return BABYLON.Scalar.Lerp(start.value, end.value, gradient);
    }
}

/**
 * Resolve a configured curve, substituting the fallback for a missing or empty one.
 * An empty keyed curve is reported once here, at configuration time.
 */
export function resolveCurve(
    owner: string,
    label: string,
    curve: ScalarCurve | ReadonlyArray<CurveKey> | null | undefined,
    fallback: ReadonlyArray<CurveKey>
): ScalarCurve {
    if (curve === null || curve === undefined) {
        return new AmplitudeCurve(fallback);
    }

    if (isKeyList(curve)) {
        if (curve.length === 0) {
            console.warn(`[${owner}] ${label} has no keys, using default curve`);
            return new AmplitudeCurve(fallback);
        }
        return new AmplitudeCurve(curve);
    }

    if (curve instanceof AmplitudeCurve && curve.length === 0) {
        console.warn(`[${owner}] ${label} has no keys, using default curve`);
        return new AmplitudeCurve(fallback);
    }

    return curve;
}

function isKeyList(curve: ScalarCurve | ReadonlyArray<CurveKey>): curve is ReadonlyArray<CurveKey> {
    return Array.isArray(curve);
}
