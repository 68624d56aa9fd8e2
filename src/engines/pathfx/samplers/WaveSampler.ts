import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import { resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import {
    createSegmentLocation,
    distanceTraveled,
    linearBasePositionToRef,
    localTangentToRef,
    measurePolyline,
    perpendicular2DToRef,
    wrapTime,
} from '../math/PathMath';
import type { PathPoints } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface WaveSamplerConfig {
    amplitude?: number;
    /** Cycles over the span (default: 2) */
    frequency?: number;
    /** Radians (default: 0) */
    phaseOffset?: number;
    /** Phase scroll in radians per second; 0 = static (default: 0) */
    animationSpeed?: number;
    /** Oscillate in the XY perpendicular instead of world up (default: false) */
    horizontal?: boolean;
    amplitudeCurve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    adaptToPathLength?: boolean;
    scaleFrequencyWithPathLength?: boolean;
    /** Phase from true distance travelled rather than raw t (default: true) */
    continuousPhase?: boolean;
}

/**
 * WaveSampler - sinusoidal offset, amplitude · curve(t) · sin(phase)
 */
export class WaveSampler extends BasePathSampler {
    readonly kind = 'wave' as const;

    amplitude: number;
    frequency: number;
    phaseOffset: number;
    animationSpeed: number;
    horizontal: boolean;
    amplitudeCurve: ScalarCurve;
    adaptToPathLength: boolean;
    scaleFrequencyWithPathLength: boolean;
    continuousPhase: boolean;

    private timeOffset = 0;

    private readonly location = createSegmentLocation();
    private readonly tangent = new BABYLON.Vector3();
    private readonly waveDirection = new BABYLON.Vector3();

    constructor(config: WaveSamplerConfig = {}) {
        super('WaveSampler');
        this.amplitude = config.amplitude ?? PATH_FX.WAVE.AMPLITUDE;
        this.frequency = config.frequency ?? PATH_FX.WAVE.FREQUENCY;
        this.phaseOffset = config.phaseOffset ?? PATH_FX.WAVE.PHASE_OFFSET;
        this.animationSpeed = config.animationSpeed ?? PATH_FX.WAVE.ANIMATION_SPEED;
        this.horizontal = config.horizontal ?? PATH_FX.WAVE.HORIZONTAL;
        this.amplitudeCurve = resolveCurve(this.tag, 'amplitudeCurve', config.amplitudeCurve, PATH_FX.WAVE.CURVE);
        this.adaptToPathLength = config.adaptToPathLength ?? PATH_FX.WAVE.ADAPT_TO_PATH_LENGTH;
        this.scaleFrequencyWithPathLength =
            config.scaleFrequencyWithPathLength ?? PATH_FX.WAVE.SCALE_FREQUENCY_WITH_PATH_LENGTH;
        this.continuousPhase = config.continuousPhase ?? PATH_FX.WAVE.CONTINUOUS_PHASE;
    }

    override advance(deltaTime: number): void {
        if (this.animationSpeed === 0) return;
        this.timeOffset = wrapTime(this.timeOffset + deltaTime * this.animationSpeed);
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        linearBasePositionToRef(points, t, result, this.location);

        if (this.horizontal) {
            localTangentToRef(points, t, this.tangent);
            perpendicular2DToRef(this.tangent, this.waveDirection);
        } else {
            this.waveDirection.set(0, 1, 0);
        }

        const pathLength = measurePolyline(points);
        let amplitude = this.amplitude;
        let frequency = this.frequency;

        if (this.adaptToPathLength) {
            amplitude *= Math.min(1, pathLength * PATH_FX.WAVE.LENGTH_SCALE);
            if (this.scaleFrequencyWithPathLength) {
                const span = BABYLON.Vector3.Distance(points[0], points[points.length - 1]);
                frequency *= pathLength / Math.max(PATH_FX.SHARED.EPSILON, span);
            }
        }

        let progress = t;
        if (this.continuousPhase) {
            progress = pathLength > 0 ? distanceTraveled(points, t) / pathLength : 0;
        }
        const phase = progress * frequency * Math.PI * 2 + this.phaseOffset + this.timeOffset;

        const offset = amplitude * this.amplitudeCurve.evaluate(t) * Math.sin(phase);
        this.waveDirection.scaleAndAddToRef(offset, result);
        return result;
    }
}
