/**
 * Path engine contracts
 *
 * One closed union of sampler kinds; every sampler carries its `kind` tag
 * so callers can switch exhaustively instead of relying on class checks.
 */

import type * as BABYLON from '@babylonjs/core';

/** Ordered control points; insertion order is the travel order */
export type PathPoints = ReadonlyArray<BABYLON.Vector3>;

export type PathSamplerKind =
    | 'line'
    | 'arc'
    | 'bounce'
    | 'zigzag'
    | 'lightning'
    | 'organicWave'
    | 'vortex'
    | 'noise'
    | 'wave'
    | 'blend';

/**
 * Sampling contract shared by all path algorithms
 */
export interface PathSampler {
    readonly kind: PathSamplerKind;

    /** True when samples lie exactly on the straight control polyline */
    readonly followsPolyline: boolean;

    /** Position at normalized progress t along the path (new vector) */
    calculatePointOnPath(points: PathPoints, t: number): BABYLON.Vector3;

    /** Allocation-free variant; writes into and returns `result` */
    calculatePointOnPathToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3;

    /** Owner supplied a new point sequence */
    onPathChanged(points: PathPoints): void;

    /** Advance internal animation state; called once per tick before sampling */
    advance(deltaTime: number): void;
}

/**
 * Samplers whose shape depends on a seeded random stream
 */
export interface SeededPathSampler extends PathSampler {
    readonly seed: number;

    /** Re-derive the random stream and regenerate immediately */
    setSeed(seed: number): void;
}

export function isSeededSampler(sampler: PathSampler): sampler is SeededPathSampler {
    return 'setSeed' in sampler && typeof sampler.setSeed === 'function';
}
