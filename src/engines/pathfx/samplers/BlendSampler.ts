import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import { resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import type { PathPoints, PathSampler } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface BlendSamplerConfig {
    a: PathSampler | null;
    b: PathSampler | null;
    /** Mix factor over the transition window (default: linear 0 → 1) */
    blendCurve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    transitionStart?: number;
    transitionEnd?: number;
}

/**
 * BlendSampler - A before the transition window, B after it, curve-mixed inside.
 *
 * Children are shared by reference; path changes and ticks are forwarded to both.
 * A missing child is reported when configured and the blend then samples to zero.
 */
export class BlendSampler extends BasePathSampler {
    readonly kind = 'blend' as const;

    blendCurve: ScalarCurve;
    transitionStart: number;
    transitionEnd: number;

    private a: PathSampler | null = null;
    private b: PathSampler | null = null;

    private readonly pointA = new BABYLON.Vector3();
    private readonly pointB = new BABYLON.Vector3();

    constructor(config: BlendSamplerConfig) {
        super('BlendSampler');
        this.blendCurve = resolveCurve(this.tag, 'blendCurve', config.blendCurve, PATH_FX.BLEND.CURVE);
        this.transitionStart = config.transitionStart ?? PATH_FX.BLEND.TRANSITION_START;
        this.transitionEnd = config.transitionEnd ?? PATH_FX.BLEND.TRANSITION_END;
        this.setChildren(config.a, config.b);
    }

    override get followsPolyline(): boolean {
        return (this.a?.followsPolyline ?? false) && (this.b?.followsPolyline ?? false);
    }

    get samplerA(): PathSampler | null {
        return this.a;
    }

    get samplerB(): PathSampler | null {
        return this.b;
    }

    get isComplete(): boolean {
        return this.a !== null && this.b !== null;
    }

    setChildren(a: PathSampler | null, b: PathSampler | null): void {
        this.a = a;
        this.b = b;
        if (!a || !b) {
            console.error(
                `[${this.tag}] requires two path samplers (a: ${a ? a.kind : 'missing'}, b: ${b ? b.kind : 'missing'})`
            );
            return;
        }
        if (this.pathPoints.length > 0) {
            a.onPathChanged(this.pathPoints);
            b.onPathChanged(this.pathPoints);
        }
    }

    override calculatePointOnPathToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        if (!this.isComplete) {
            return result.setAll(0);
        }
        return super.calculatePointOnPathToRef(points, t, result);
    }

    override onPathChanged(points: PathPoints): void {
        super.onPathChanged(points);
        this.a?.onPathChanged(points);
        this.b?.onPathChanged(points);
    }

    override advance(deltaTime: number): void {
        this.a?.advance(deltaTime);
        this.b?.advance(deltaTime);
    }

    /** Mix factor at t: 0 = pure A, 1 = pure B */
    blendFactor(t: number): number {
        const start = this.transitionStart;
        const end = this.transitionEnd;

        // empty window: hard switch at start
        if (end <= start) return t < start ? 0 : 1;

        if (t < start) return 0;
        if (t > end) return 1;
        return this.blendCurve.evaluate((t - start) / (end - start));
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        const a = this.a;
        const b = this.b;
        if (!a || !b) return result.setAll(0);

        const blend = this.blendFactor(t);
        if (blend <= 0) return a.calculatePointOnPathToRef(points, t, result);
        if (blend >= 1) return b.calculatePointOnPathToRef(points, t, result);

        a.calculatePointOnPathToRef(points, t, this.pointA);
        b.calculatePointOnPathToRef(points, t, this.pointB);
        return BABYLON.Vector3.LerpToRef(this.pointA, this.pointB, blend, result);
    }
}
