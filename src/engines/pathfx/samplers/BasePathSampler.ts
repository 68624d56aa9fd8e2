/**
 * BasePathSampler - shared sampling entry point
 *
 * Every variant goes through calculatePointOnPathToRef, which:
 * - reports fewer than 2 points as a warning and yields the zero vector
 * - pins t <= 0 (and NaN) to the first point and t >= 1 to the last point
 * - otherwise hands off to the variant's sampleToRef with t in (0, 1)
 */

import * as BABYLON from '@babylonjs/core';
import { getPathFxDebugConfig } from '../../../debug/PathFxDebugFlags';
import { PATH_FX } from '../../../shared/design';
import type { PathPoints, PathSampler, PathSamplerKind } from '../types';

export abstract class BasePathSampler implements PathSampler {
    abstract readonly kind: PathSamplerKind;

    /** Console tag, e.g. "ZigZagSampler" */
    protected readonly tag: string;

    /** Last point sequence supplied by the owner */
    protected pathPoints: BABYLON.Vector3[] = [];

    constructor(tag: string) {
        this.tag = tag;
    }

    get followsPolyline(): boolean {
        return false;
    }

    calculatePointOnPath(points: PathPoints, t: number): BABYLON.Vector3 {
        return this.calculatePointOnPathToRef(points, t, new BABYLON.Vector3());
    }

    calculatePointOnPathToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        if (!points || points.length < PATH_FX.SHARED.MIN_POINTS) {
            this.warnDegenerate();
            return result.setAll(0);
        }

        if (Number.isNaN(t) || t <= 0) return result.copyFrom(points[0]);
        if (t >= 1) return result.copyFrom(points[points.length - 1]);

        return this.sampleToRef(points, t, result);
    }

    /**
     * Two-point convenience: sample the straight span start → end
     */
    calculatePoint(start: BABYLON.Vector3, end: BABYLON.Vector3, t: number): BABYLON.Vector3 {
        return this.calculatePointOnPath([start, end], t);
    }

    onPathChanged(points: PathPoints): void {
        this.pathPoints = points.map((p) => p.clone());
    }

    getPathPoints(): PathPoints {
        return this.pathPoints;
    }

    advance(_deltaTime: number): void {
        // static shapes have nothing to advance
    }

    /** Variant math; points.length >= 2 and 0 < t < 1 */
    protected abstract sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3;

    protected warnDegenerate(): void {
        if (getPathFxDebugConfig().quiet) return;
        console.warn(`[${this.tag}] requires at least ${PATH_FX.SHARED.MIN_POINTS} points`);
    }
}
