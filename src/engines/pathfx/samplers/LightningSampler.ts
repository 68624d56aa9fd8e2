import * as BABYLON from '@babylonjs/core';
import { debugLog } from '../../../debug/PathFxDebugFlags';
import { PATH_FX } from '../../../shared/design';
import { resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import {
    createSegmentLocation,
    linearBasePositionToRef,
    localTangentToRef,
    measurePolyline,
    perpendicular2DToRef,
    smoothStep,
} from '../math/PathMath';
import { SeededRandom } from '../math/SeededRandom';
import type { PathPoints, SeededPathSampler } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface LightningSamplerConfig {
    amplitude?: number;
    /** 0 = soft bends, 1 = hard corners and wide angle spread (default: 0.5) */
    jaggedness?: number;
    /** Seconds between pattern swaps (default: 0.1) */
    strobeFrequency?: number;
    animate?: boolean;
    amplitudeCurve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    /** Number of bolt segments (default: 6) */
    detailLevel?: number;
    seed?: number;
}

/**
 * LightningSampler - jagged bolt that re-strikes every `strobeFrequency` seconds.
 *
 * Offsets are 2D: x runs along the in-plane perpendicular, y along the tangent.
 * Strobe regenerations continue the random stream; setSeed restarts it.
 */
export class LightningSampler extends BasePathSampler implements SeededPathSampler {
    readonly kind = 'lightning' as const;

    amplitude: number;
    jaggedness: number;
    strobeFrequency: number;
    animate: boolean;
    amplitudeCurve: ScalarCurve;
    detailLevel: number;

    private readonly random: SeededRandom;
    private offsets: BABYLON.Vector2[] = [];
    private strobeTimer = 0;

    private readonly location = createSegmentLocation();
    private readonly tangent = new BABYLON.Vector3();
    private readonly perpendicular = new BABYLON.Vector3();
    private readonly offset = new BABYLON.Vector2();

    constructor(config: LightningSamplerConfig = {}) {
        super('LightningSampler');
        this.amplitude = config.amplitude ?? PATH_FX.LIGHTNING.AMPLITUDE;
        this.jaggedness = config.jaggedness ?? PATH_FX.LIGHTNING.JAGGEDNESS;
        this.strobeFrequency = config.strobeFrequency ?? PATH_FX.LIGHTNING.STROBE_FREQUENCY;
        this.animate = config.animate ?? PATH_FX.LIGHTNING.ANIMATE;
        this.amplitudeCurve = resolveCurve(this.tag, 'amplitudeCurve', config.amplitudeCurve, PATH_FX.LIGHTNING.CURVE);
        this.detailLevel = config.detailLevel ?? PATH_FX.LIGHTNING.DETAIL_LEVEL;

        this.random = new SeededRandom(config.seed ?? PATH_FX.LIGHTNING.SEED);
        this.initializeOffsets();
    }

    get seed(): number {
        return this.random.seed;
    }

    setSeed(seed: number): void {
        this.random.reseed(seed);
        this.initializeOffsets();
    }

    getOffsets(): ReadonlyArray<BABYLON.Vector2> {
        return this.offsets;
    }

    override advance(deltaTime: number): void {
        if (!this.animate) return;

        this.strobeTimer += deltaTime;
        if (this.strobeTimer >= this.strobeFrequency) {
            this.ensureInitialized();
            this.generatePattern();
            this.strobeTimer = 0;
        }
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        this.ensureInitialized();
        linearBasePositionToRef(points, t, result, this.location);

        const detail = Math.floor(this.detailLevel);
        if (detail <= 1) return result;

        localTangentToRef(points, t, this.tangent);
        perpendicular2DToRef(this.tangent, this.perpendicular);

        const scaled = t * detail;
        const segment = Math.max(0, Math.min(Math.floor(scaled), detail - 1));
        const offset = this.interpolateOffset(segment, scaled - segment);

        const length = measurePolyline(points);
        this.perpendicular.scaleAndAddToRef(offset.x * length * PATH_FX.LIGHTNING.PERPENDICULAR_SCALE, result);
        this.tangent.scaleAndAddToRef(offset.y * length * PATH_FX.LIGHTNING.TANGENT_SCALE, result);
        return result;
    }

    private interpolateOffset(segment: number, progress: number): BABYLON.Vector2 {
        const from = this.offsets[segment];
        const to = this.offsets[segment + 1];
        const smoothness = 1 - this.jaggedness * 0.8;

        // hard corners near the bolt vertices
        if (smoothness < 0.5 && (progress < 0.2 || progress > 0.8)) {
            return this.offset.copyFrom(progress < 0.5 ? from : to);
        }

        const s = smoothStep(progress);
        return this.offset.set(
            BABYLON.Scalar.Lerp(from.x, to.x, s),
            BABYLON.Scalar.Lerp(from.y, to.y, s)
        );
    }

    private ensureInitialized(): void {
        if (this.offsets.length !== this.segmentCount() + 1) {
            this.initializeOffsets();
        }
    }

    private segmentCount(): number {
        return Math.max(1, Math.floor(this.detailLevel));
    }

    private initializeOffsets(): void {
        this.random.reseed(this.random.seed);
        const count = this.segmentCount();
        this.offsets = [];
        for (let i = 0; i <= count; i++) {
            this.offsets.push(BABYLON.Vector2.Zero());
        }
        this.generatePattern();
    }

    private generatePattern(): void {
        const count = this.offsets.length - 1;
        const spread = this.jaggedness * Math.PI * PATH_FX.LIGHTNING.ANGLE_SPREAD;

        this.offsets[0].set(0, 0);
        this.offsets[count].set(0, 0);

        for (let i = 1; i < count; i++) {
            const maxOffset = this.amplitude * this.amplitudeCurve.evaluate(i / count);
            const baseAngle = i % 2 === 0 ? Math.PI * 0.5 : Math.PI * 1.5;
            const angle = baseAngle + (this.random.next() - 0.5) * spread;

            this.offsets[i].set(
                Math.cos(angle) * maxOffset,
                Math.sin(angle) * maxOffset * PATH_FX.LIGHTNING.Y_DAMPING
            );
        }

        debugLog(this.tag, `Strike pattern generated: ${count} segments`);
    }
}
