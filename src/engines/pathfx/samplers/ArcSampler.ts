import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import { arcUpDirectionToRef, createSegmentLocation, locateSegment } from '../math/PathMath';
import type { PathPoints } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface ArcSamplerConfig {
    /** Apex height (default: 1) */
    height?: number;
    /** Arc downward / to the other side (default: false) */
    flip?: boolean;
    /** One arc over the whole first→last span, or one per segment (default: true) */
    singleArc?: boolean;
    /** Where the apex sits along the span, 0..1 (default: 0.5) */
    bias?: number;
}

/**
 * ArcSampler - parabolic lift, offset = height · 4t(1 − t)
 */
export class ArcSampler extends BasePathSampler {
    readonly kind = 'arc' as const;

    height: number;
    flip: boolean;
    singleArc: boolean;
    bias: number;

    private readonly location = createSegmentLocation();
    private readonly direction = new BABYLON.Vector3();
    private readonly up = new BABYLON.Vector3();

    constructor(config: ArcSamplerConfig = {}) {
        super('ArcSampler');
        this.height = config.height ?? PATH_FX.ARC.HEIGHT;
        this.flip = config.flip ?? PATH_FX.ARC.FLIP;
        this.singleArc = config.singleArc ?? PATH_FX.ARC.SINGLE_ARC;
        this.bias = config.bias ?? PATH_FX.ARC.BIAS;
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        if (this.singleArc) {
            const start = points[0];
            const end = points[points.length - 1];
            BABYLON.Vector3.LerpToRef(start, end, t, result);
            end.subtractToRef(start, this.direction).normalize();
            return this.applyLift(result, this.biasedParameter(t));
        }

        const { index, t: segmentT } = locateSegment(points.length, t, this.location);
        const start = points[index];
        const end = points[index + 1];
        BABYLON.Vector3.LerpToRef(start, end, segmentT, result);
        end.subtractToRef(start, this.direction).normalize();
        return this.applyLift(result, segmentT);
    }

    /**
     * Remap t so the parabola peaks at `bias`: [0, bias] → [0, 0.5], [bias, 1] → [0.5, 1]
     */
    private biasedParameter(t: number): number {
        const bias = BABYLON.Scalar.Clamp(this.bias, 0, 1);
        if (bias === 0.5) return t;
        if (t < bias) return t / (2 * bias);
        return 0.5 + (t - bias) / (2 * (1 - bias));
    }

    private applyLift(position: BABYLON.Vector3, t: number): BABYLON.Vector3 {
        let offset = this.height * 4 * t * (1 - t);
        if (this.flip) offset = -offset;

        arcUpDirectionToRef(this.direction, this.up);
        this.up.scaleAndAddToRef(offset, position);
        return position;
    }
}
