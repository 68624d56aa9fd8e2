import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import { createSegmentLocation, linearBasePositionToRef, locateSegment } from '../math/PathMath';
import type { PathPoints } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface LineSamplerConfig {
    /** Catmull-Rom through the points instead of straight segments (default: false) */
    smooth?: boolean;
    /** Spline tension 0..1; alpha = 1 - tension (default: 0.5) */
    tension?: number;
}

/**
 * LineSampler - straight segments or a Catmull-Rom spline through the control points.
 *
 * Virtual end points are reflected (p0 = 2·p1 − p2, p3 = 2·p2 − p1)
 * so the first and last segments keep their direction.
 */
export class LineSampler extends BasePathSampler {
    readonly kind = 'line' as const;

    smooth: boolean;
    tension: number;

    private readonly location = createSegmentLocation();
    private readonly p0 = new BABYLON.Vector3();
    private readonly p3 = new BABYLON.Vector3();

    constructor(config: LineSamplerConfig = {}) {
        super('LineSampler');
        this.smooth = config.smooth ?? PATH_FX.LINE.SMOOTH;
        this.tension = config.tension ?? PATH_FX.LINE.TENSION;
    }

    override get followsPolyline(): boolean {
        return !this.smooth;
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        if (!this.smooth) {
            return linearBasePositionToRef(points, t, result, this.location);
        }
        return this.splineToRef(points, t, result);
    }

    private splineToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        const { index, t: segmentT, count } = locateSegment(points.length, t, this.location);

        const p1 = points[index];
        const p2 = points[index + 1];

        if (index === 0) {
            p1.scaleToRef(2, this.p0).subtractInPlace(p2);
        } else {
            this.p0.copyFrom(points[index - 1]);
        }

        if (index >= count - 1) {
            p2.scaleToRef(2, this.p3).subtractInPlace(p1);
        } else {
            this.p3.copyFrom(points[index + 2]);
        }

        const alpha = 1 - this.tension;
        const p0 = this.p0;
        const p3 = this.p3;

        result.set(
            catmullRom(alpha, p0.x, p1.x, p2.x, p3.x, segmentT),
            catmullRom(alpha, p0.y, p1.y, p2.y, p3.y, segmentT),
            catmullRom(alpha, p0.z, p1.z, p2.z, p3.z, segmentT)
        );
        return result;
    }
}

/**
 * One component of the tension-weighted Catmull-Rom cubic between c1 and c2
 */
function catmullRom(alpha: number, c0: number, c1: number, c2: number, c3: number, t: number): number {
    const a = -alpha * c0 + (2 - alpha) * c1 + (alpha - 2) * c2 + alpha * c3;
    const b = 2 * alpha * c0 + (alpha - 3) * c1 + (3 - 2 * alpha) * c2 - alpha * c3;
    const c = -alpha * c0 + alpha * c2;
    return a * t * t * t + b * t * t + c * t + c1;
}
