import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import { resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import {
    createSegmentLocation,
    linearBasePositionToRef,
    localTangentToRef,
    measurePolyline,
    perpendicular2DToRef,
    wrapTime,
} from '../math/PathMath';
import { PerlinNoise } from '../math/PerlinNoise';
import type { PathPoints, SeededPathSampler } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface NoiseSamplerConfig {
    /** Offset along the local right axis (default: 0.5) */
    amountX?: number;
    /** Offset along the local up axis (default: 0.5) */
    amountY?: number;
    /** Offset along the tangent (default: 0) */
    amountZ?: number;
    /** Noise frequency along t (default: 1) */
    scale?: number;
    /** Noise scroll rate per second (default: 0.5) */
    speed?: number;
    amplitudeCurve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    adaptToPathLength?: boolean;
    octaves?: number;
    persistence?: number;
    seed?: number;
}

/**
 * NoiseSampler - layered Perlin displacement in the path's local frame.
 *
 * Frame: right = in-plane perpendicular of the tangent, up = tangent × right.
 * The three axes read three decorrelated noise streams.
 */
export class NoiseSampler extends BasePathSampler implements SeededPathSampler {
    readonly kind = 'noise' as const;

    amountX: number;
    amountY: number;
    amountZ: number;
    scale: number;
    speed: number;
    amplitudeCurve: ScalarCurve;
    adaptToPathLength: boolean;
    octaves: number;
    persistence: number;

    private readonly noise: PerlinNoise;
    private timeOffset = 0;

    private readonly location = createSegmentLocation();
    private readonly tangent = new BABYLON.Vector3();
    private readonly right = new BABYLON.Vector3();
    private readonly up = new BABYLON.Vector3();

    constructor(config: NoiseSamplerConfig = {}) {
        super('NoiseSampler');
        this.amountX = config.amountX ?? PATH_FX.NOISE.AMOUNT_X;
        this.amountY = config.amountY ?? PATH_FX.NOISE.AMOUNT_Y;
        this.amountZ = config.amountZ ?? PATH_FX.NOISE.AMOUNT_Z;
        this.scale = config.scale ?? PATH_FX.NOISE.SCALE;
        this.speed = config.speed ?? PATH_FX.NOISE.SPEED;
        this.amplitudeCurve = resolveCurve(this.tag, 'amplitudeCurve', config.amplitudeCurve, PATH_FX.NOISE.CURVE);
        this.adaptToPathLength = config.adaptToPathLength ?? PATH_FX.NOISE.ADAPT_TO_PATH_LENGTH;
        this.octaves = config.octaves ?? PATH_FX.NOISE.OCTAVES;
        this.persistence = config.persistence ?? PATH_FX.NOISE.PERSISTENCE;
        this.noise = new PerlinNoise(config.seed ?? PATH_FX.NOISE.SEED);
    }

    get seed(): number {
        return this.noise.seed;
    }

    setSeed(seed: number): void {
        this.noise.reseed(seed);
    }

    override advance(deltaTime: number): void {
        this.timeOffset = wrapTime(this.timeOffset + deltaTime * this.speed);
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        linearBasePositionToRef(points, t, result, this.location);

        localTangentToRef(points, t, this.tangent);
        perpendicular2DToRef(this.tangent, this.right);
        BABYLON.Vector3.CrossToRef(this.tangent, this.right, this.up);
        this.up.normalize();

        const amplitude = this.amplitudeCurve.evaluate(t);
        const x = t * this.scale;
        const tau = this.timeOffset;
        const z = this.noise.seed * 0.01;

        const nx = this.octave(x + tau, 0.5, z) * 2 - 1;
        const ny = this.octave(x, 0.5 + tau, z + 10) * 2 - 1;
        const nz = this.octave(x + 0.7, tau * 0.7, z + 20) * 2 - 1;

        const scale = this.adaptToPathLength ? measurePolyline(points) * PATH_FX.NOISE.LENGTH_SCALE : 1;
        const k = amplitude * scale;

        this.right.scaleAndAddToRef(nx * this.amountX * k, result);
        this.up.scaleAndAddToRef(ny * this.amountY * k, result);
        this.tangent.scaleAndAddToRef(nz * this.amountZ * k, result);
        return result;
    }

    private octave(x: number, y: number, z: number): number {
        return this.noise.octave(x, y, z, this.octaves, this.persistence);
    }
}
