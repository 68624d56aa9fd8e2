import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import { resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import { arcUpDirectionToRef, createSegmentLocation, globalTangentToRef, locateSegment } from '../math/PathMath';
import type { PathPoints } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface BounceSamplerConfig {
    /** Height of the first bounce (default: 1) */
    height?: number;
    /** Bounces per span (default: 3) */
    count?: number;
    /** Height multiplier applied per successive bounce (default: 0.5) */
    damping?: number;
    flip?: boolean;
    /** Shape of a single bounce over its 0..1 progress */
    curve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    /** Bounce every segment on its own instead of the whole path (default: false) */
    segmented?: boolean;
}

export class BounceSampler extends BasePathSampler {
    readonly kind = 'bounce' as const;

    height: number;
    count: number;
    damping: number;
    flip: boolean;
    segmented: boolean;
    curve: ScalarCurve;

    private readonly location = createSegmentLocation();
    private readonly direction = new BABYLON.Vector3();
    private readonly up = new BABYLON.Vector3();

    constructor(config: BounceSamplerConfig = {}) {
        super('BounceSampler');
        this.height = config.height ?? PATH_FX.BOUNCE.HEIGHT;
        this.count = config.count ?? PATH_FX.BOUNCE.COUNT;
        this.damping = config.damping ?? PATH_FX.BOUNCE.DAMPING;
        this.flip = config.flip ?? PATH_FX.BOUNCE.FLIP;
        this.segmented = config.segmented ?? PATH_FX.BOUNCE.SEGMENTED;
        this.curve = resolveCurve(this.tag, 'curve', config.curve, PATH_FX.BOUNCE.CURVE);
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        const { index, t: segmentT } = locateSegment(points.length, t, this.location);
        BABYLON.Vector3.LerpToRef(points[index], points[index + 1], segmentT, result);

        if (this.segmented) {
            points[index + 1].subtractToRef(points[index], this.direction).normalize();
            return this.applyBounce(result, segmentT);
        }

        globalTangentToRef(points, this.direction);
        return this.applyBounce(result, t);
    }

    private applyBounce(position: BABYLON.Vector3, t: number): BABYLON.Vector3 {
        const count = Math.max(1, Math.floor(this.count));
        const scaled = t * count;
        const bounce = Math.min(Math.floor(scaled), count - 1);
        const progress = scaled - bounce;

        const dampedHeight = this.height * Math.pow(this.damping, bounce);
        let offset = this.curve.evaluate(progress) * dampedHeight;
        if (this.flip) offset = -offset;

        arcUpDirectionToRef(this.direction, this.up);
        this.up.scaleAndAddToRef(offset, position);
        return position;
    }
}
