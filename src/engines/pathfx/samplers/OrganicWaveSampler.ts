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
    wrapTime,
} from '../math/PathMath';
import { PerlinNoise } from '../math/PerlinNoise';
import { SeededRandom } from '../math/SeededRandom';
import { smoothDampVector2ToRef } from '../math/SmoothDamp';
import type { PathPoints, SeededPathSampler } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface OrganicWaveSamplerConfig {
    amplitude?: number;
    jaggedness?: number;
    animate?: boolean;
    /** Higher = current offsets catch their targets faster (default: 3) */
    chaseSpeed?: number;
    /** Seconds between new target patterns (default: 1.5) */
    targetMoveSpeed?: number;
    /** How far toward the target each chase goal sits, 0..1 (default: 0.7) */
    flowAmount?: number;
    /** Wobble added on top of the chase goal (default: 0.2) */
    microMotion?: number;
    amplitudeCurve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    detailLevel?: number;
    seed?: number;
    adaptToPathLength?: boolean;
}

/**
 * OrganicWaveSampler - offsets that chase periodically regenerated targets.
 *
 * Each interior vertex holds a current offset, a target offset and a
 * smooth-damp velocity. Endpoints stay at zero.
 */
export class OrganicWaveSampler extends BasePathSampler implements SeededPathSampler {
    readonly kind = 'organicWave' as const;

    amplitude: number;
    jaggedness: number;
    animate: boolean;
    chaseSpeed: number;
    targetMoveSpeed: number;
    flowAmount: number;
    microMotion: number;
    amplitudeCurve: ScalarCurve;
    detailLevel: number;
    adaptToPathLength: boolean;

    private readonly random: SeededRandom;
    private readonly noise: PerlinNoise;

    private current: BABYLON.Vector2[] = [];
    private target: BABYLON.Vector2[] = [];
    private velocity: BABYLON.Vector2[] = [];

    private targetTimer = 0;
    private elapsed = 0;

    private readonly location = createSegmentLocation();
    private readonly tangent = new BABYLON.Vector3();
    private readonly perpendicular = new BABYLON.Vector3();
    private readonly goal = new BABYLON.Vector2();

    constructor(config: OrganicWaveSamplerConfig = {}) {
        super('OrganicWaveSampler');
        this.amplitude = config.amplitude ?? PATH_FX.ORGANIC_WAVE.AMPLITUDE;
        this.jaggedness = config.jaggedness ?? PATH_FX.ORGANIC_WAVE.JAGGEDNESS;
        this.animate = config.animate ?? PATH_FX.ORGANIC_WAVE.ANIMATE;
        this.chaseSpeed = config.chaseSpeed ?? PATH_FX.ORGANIC_WAVE.CHASE_SPEED;
        this.targetMoveSpeed = config.targetMoveSpeed ?? PATH_FX.ORGANIC_WAVE.TARGET_MOVE_SPEED;
        this.flowAmount = config.flowAmount ?? PATH_FX.ORGANIC_WAVE.FLOW_AMOUNT;
        this.microMotion = config.microMotion ?? PATH_FX.ORGANIC_WAVE.MICRO_MOTION;
        this.amplitudeCurve = resolveCurve(
            this.tag,
            'amplitudeCurve',
            config.amplitudeCurve,
            PATH_FX.ORGANIC_WAVE.CURVE
        );
        this.detailLevel = config.detailLevel ?? PATH_FX.ORGANIC_WAVE.DETAIL_LEVEL;
        this.adaptToPathLength = config.adaptToPathLength ?? PATH_FX.ORGANIC_WAVE.ADAPT_TO_PATH_LENGTH;

        const seed = config.seed ?? PATH_FX.ORGANIC_WAVE.SEED;
        this.random = new SeededRandom(seed);
        this.noise = new PerlinNoise(seed);
        this.initializeOffsets();
    }

    get seed(): number {
        return this.random.seed;
    }

    setSeed(seed: number): void {
        this.random.reseed(seed);
        this.noise.reseed(seed);
        this.initializeOffsets();
    }

    getCurrentOffsets(): ReadonlyArray<BABYLON.Vector2> {
        return this.current;
    }

    getTargetOffsets(): ReadonlyArray<BABYLON.Vector2> {
        return this.target;
    }

    override advance(deltaTime: number): void {
        if (!this.animate) return;
        this.ensureInitialized();

        this.targetTimer += deltaTime;
        if (this.targetTimer >= this.targetMoveSpeed) {
            this.generateOffsets(this.target);
            this.targetTimer = 0;
        }

        this.elapsed = wrapTime(this.elapsed + deltaTime, PATH_FX.ORGANIC_WAVE.WOBBLE_PERIOD);

        const last = this.current.length - 1;
        const smoothTime = 1 / this.chaseSpeed;
        for (let i = 1; i < last; i++) {
            const current = this.current[i];
            const target = this.target[i];

            this.goal.set(
                BABYLON.Scalar.Lerp(current.x, target.x, this.flowAmount) +
                    Math.sin(this.elapsed * 3 + i * 1.3) * this.microMotion,
                BABYLON.Scalar.Lerp(current.y, target.y, this.flowAmount) +
                    Math.cos(this.elapsed * 2.5 + i * 0.9) * this.microMotion
            );

            smoothDampVector2ToRef(current, this.goal, this.velocity[i], smoothTime, deltaTime, current);
        }

        this.current[0].set(0, 0);
        this.current[last].set(0, 0);
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
        const s = smoothStep(scaled - segment);
        const from = this.current[segment];
        const to = this.current[segment + 1];
        const x = BABYLON.Scalar.Lerp(from.x, to.x, s);
        const y = BABYLON.Scalar.Lerp(from.y, to.y, s);

        const scale = this.adaptToPathLength ? measurePolyline(points) * PATH_FX.ORGANIC_WAVE.LENGTH_SCALE : 1;

        this.perpendicular.scaleAndAddToRef(x * scale, result);
        this.tangent.scaleAndAddToRef(y * scale * PATH_FX.ORGANIC_WAVE.TANGENT_SCALE, result);
        return result;
    }

    private ensureInitialized(): void {
        if (this.current.length !== this.segmentCount() + 1) {
            this.initializeOffsets();
        }
    }

    private segmentCount(): number {
        return Math.max(1, Math.floor(this.detailLevel));
    }

    private initializeOffsets(): void {
        this.random.reseed(this.random.seed);
        const count = this.segmentCount();

        this.current = [];
        this.target = [];
        this.velocity = [];
        for (let i = 0; i <= count; i++) {
            this.current.push(BABYLON.Vector2.Zero());
            this.target.push(BABYLON.Vector2.Zero());
            this.velocity.push(BABYLON.Vector2.Zero());
        }

        this.generateOffsets(this.current);
        this.generateOffsets(this.target);
        this.targetTimer = 0;

        debugLog(this.tag, `Offsets initialized: ${count} segments (seed ${this.random.seed})`);
    }

    private generateOffsets(offsets: BABYLON.Vector2[]): void {
        const count = offsets.length - 1;
        const seed = this.random.seed;

        offsets[0].set(0, 0);
        offsets[count].set(0, 0);

        for (let i = 1; i < count; i++) {
            const position = i / count;
            const maxOffset = this.amplitude * this.amplitudeCurve.evaluate(position);

            const noiseParam = position * 5 + seed * 0.1;
            let angle = this.noise.sample(noiseParam, noiseParam * 0.7) * Math.PI * 2;
            angle += (this.random.next() * 2 - 1) * this.jaggedness * Math.PI * 0.5;

            offsets[i].set(
                Math.cos(angle) * maxOffset,
                Math.sin(angle) * maxOffset * PATH_FX.ORGANIC_WAVE.Y_DAMPING
            );
        }
    }
}
