import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import type { PathPoints, PathSampler } from '../types';
import { measurePolyline } from './PathMath';

/**
 * Approximate length of the path a sampler actually draws.
 *
 * Straight samplers (and no sampler at all) get the exact polyline sum.
 * Curved samplers are walked at a fixed sample count; samplers never call
 * this themselves, so sampling cannot recurse back into it.
 */
export function estimatePathLength(
    points: PathPoints,
    sampler: PathSampler | null = null,
    sampleCount: number = PATH_FX.SHARED.LENGTH_SAMPLE_COUNT
): number {
    if (points.length < PATH_FX.SHARED.MIN_POINTS) return 0;

    if (!sampler || sampler.followsPolyline) {
        return measurePolyline(points);
    }

    const samples = Math.max(1, Math.floor(sampleCount));
    const prev = sampler.calculatePointOnPath(points, 0);
    const current = new BABYLON.Vector3();
    let length = 0;

    for (let i = 1; i <= samples; i++) {
        sampler.calculatePointOnPathToRef(points, i / samples, current);
        length += BABYLON.Vector3.Distance(prev, current);
        prev.copyFrom(current);
    }

    return length;
}
