/**
 * ParticleFollowPath - drives live particles along a sampled path
 *
 * State machine:
 *   idle ──play()──▶ active ──stop()──▶ idle
 *
 * While active, every host update is followed by an override pass that
 * rewrites each particle's position from its normalized age:
 *   age 0 → range.start, age 1 → range.end
 *
 * Only positions are touched; emission, counts and lifetimes stay with the host
 * (lifetime bounds are set once per path change when synchronization is on).
 */

import * as BABYLON from '@babylonjs/core';
import { debugLog } from '../../../debug/PathFxDebugFlags';
import { PATH_FX } from '../../../shared/design';
import { AmplitudeCurve, resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import { estimatePathLength } from '../math/PathLengthEstimator';
import { PerlinNoise } from '../math/PerlinNoise';
import { RangeRemapper, type PathRangeConfig } from '../math/RangeRemapper';
import type { PathPoints, PathSampler } from '../types';
import type { ParticleFollowState, PathParticle, PathParticleHost } from './types';

type CurveInput = ScalarCurve | ReadonlyArray<CurveKey> | null;

export interface ParticleFollowPathConfig {
    /** Path algorithm to follow (required) */
    sampler: PathSampler | null;
    /** Sub-range of the path mapped onto particle age */
    range?: PathRangeConfig;
    /** Place the emitter on the first path point (default: true) */
    moveEmitterToStart?: boolean;

    /** Units per second used for lifetime sync (default: 5) */
    particleSpeed?: number;
    /** ± fraction applied to the synced lifetime, clamped to 0..1 (default: 0.2) */
    speedVariation?: number;
    /** Set host lifetime bounds from path length / speed (default: true) */
    synchronizeLifetimeWithPath?: boolean;

    useScatter?: boolean;
    /** Hand scatter to the host's noise field instead of offsetting manually (default: false) */
    applyScatterInNoise?: boolean;
    scatterX?: number;
    scatterY?: number;
    scatterZ?: number;
    scatterXOverLifetime?: CurveInput;
    scatterYOverLifetime?: CurveInput;
    scatterZOverLifetime?: CurveInput;
    noiseFrequency?: number;
    noiseSeed?: number;
}

/** Per-axis sampling constants: [age weight, index weight] and which noise input takes the age term */
const SCATTER_AXES = [
    { ageScale: 3.17, indexScale: 0.421, ageOnX: true },
    { ageScale: 2.83, indexScale: 0.273, ageOnX: false },
    { ageScale: 1.53, indexScale: 0.637, ageOnX: true },
] as const;

const AXIS_OFFSET_X = 10.3;
const AXIS_OFFSET_Y = 5.7;

export class ParticleFollowPath<P extends PathParticle = BABYLON.Particle> {
    private static readonly TAG = 'ParticleFollowPath';

    private readonly host: PathParticleHost<P>;
    private readonly sampler: PathSampler | null;
    private readonly range: RangeRemapper;

    moveEmitterToStart: boolean;
    particleSpeed: number;
    speedVariation: number;
    synchronizeLifetimeWithPath: boolean;
    useScatter: boolean;
    applyScatterInNoise: boolean;
    scatterX: number;
    scatterY: number;
    scatterZ: number;
    noiseFrequency: number;

    private readonly scatterCurveInputs: [CurveInput | undefined, CurveInput | undefined, CurveInput | undefined];
    private scatterCurves: [ScalarCurve, ScalarCurve, ScalarCurve];

    private readonly noise: PerlinNoise;
    private noiseSeedValue: number;

    private pathPoints: BABYLON.Vector3[] = [];
    private pathLength = 0;

    private state: ParticleFollowState = 'idle';
    private initialized = false;
    private originalUpdate: ((particles: P[]) => void) | null = null;

    private readonly scratch = new BABYLON.Vector3();

    constructor(host: PathParticleHost<P>, config: ParticleFollowPathConfig) {
        this.host = host;
        this.sampler = config.sampler;
        this.range = new RangeRemapper(config.range);

        this.moveEmitterToStart = config.moveEmitterToStart ?? PATH_FX.PARTICLES.MOVE_EMITTER_TO_START;
        this.particleSpeed = config.particleSpeed ?? PATH_FX.PARTICLES.SPEED;
        this.speedVariation = config.speedVariation ?? PATH_FX.PARTICLES.SPEED_VARIATION;
        this.synchronizeLifetimeWithPath =
            config.synchronizeLifetimeWithPath ?? PATH_FX.PARTICLES.SYNCHRONIZE_LIFETIME;
        this.useScatter = config.useScatter ?? PATH_FX.PARTICLES.USE_SCATTER;
        this.applyScatterInNoise = config.applyScatterInNoise ?? PATH_FX.PARTICLES.SCATTER_IN_NOISE;
        this.scatterX = config.scatterX ?? PATH_FX.PARTICLES.SCATTER_X;
        this.scatterY = config.scatterY ?? PATH_FX.PARTICLES.SCATTER_Y;
        this.scatterZ = config.scatterZ ?? PATH_FX.PARTICLES.SCATTER_Z;
        this.noiseFrequency = config.noiseFrequency ?? PATH_FX.PARTICLES.NOISE_FREQUENCY;

        this.scatterCurveInputs = [
            config.scatterXOverLifetime,
            config.scatterYOverLifetime,
            config.scatterZOverLifetime,
        ];
        this.scatterCurves = [flatCurve(), flatCurve(), flatCurve()];

        this.noiseSeedValue = config.noiseSeed ?? PATH_FX.PARTICLES.NOISE_SEED;
        this.noise = new PerlinNoise(this.noiseSeedValue);

        if (!this.sampler) {
            console.error(`[${ParticleFollowPath.TAG}] No path sampler assigned, positions will not be driven`);
        }
    }

    // ============================================
    // Lifecycle
    // ============================================

    /**
     * One-time setup: validate scatter curves and hook the host update.
     * Safe to call repeatedly.
     */
    initialize(): void {
        if (this.initialized) return;

        const [x, y, z] = this.scatterCurveInputs;
        const flat = PATH_FX.PARTICLES.CURVE;
        this.scatterCurves = [
            resolveCurve(ParticleFollowPath.TAG, 'scatterXOverLifetime', x, flat),
            resolveCurve(ParticleFollowPath.TAG, 'scatterYOverLifetime', y, flat),
            resolveCurve(ParticleFollowPath.TAG, 'scatterZOverLifetime', z, flat),
        ];

        const base = this.host.updateFunction;
        this.originalUpdate = base;
        this.host.updateFunction = (particles: P[]) => {
            base.call(this.host, particles);
            this.updateParticlePositions(particles);
        };

        this.initialized = true;
        debugLog(ParticleFollowPath.TAG, 'Initialized', { sampler: this.sampler?.kind ?? 'missing' });
    }

    /**
     * Replace the followed path.
     * Recomputes length, re-places the emitter and re-syncs lifetimes.
     */
    updatePath(points: PathPoints): void {
        this.initialize();

        this.pathPoints = points.map((p) => p.clone());
        this.sampler?.onPathChanged(this.pathPoints);
        this.pathLength = estimatePathLength(this.pathPoints, this.sampler);

        this.placeEmitter();
        this.configureExternalNoise();
        this.synchronizeLifetime();

        this.updateParticlePositions(this.host.particles);
    }

    play(): void {
        if (this.state === 'active') return;

        this.initialize();
        this.placeEmitter();
        this.host.start();
        this.state = 'active';

        debugLog(ParticleFollowPath.TAG, 'Play', { points: this.pathPoints.length, length: this.pathLength });
    }

    stop(): void {
        if (this.state === 'idle') return;

        this.host.stop();
        this.state = 'idle';

        debugLog(ParticleFollowPath.TAG, 'Stop');
    }

    /**
     * Restore the host's own update function
     */
    dispose(): void {
        this.stop();
        if (this.originalUpdate) {
            this.host.updateFunction = this.originalUpdate;
            this.originalUpdate = null;
        }
        this.initialized = false;
    }

    // ============================================
    // Queries
    // ============================================

    get isPlaying(): boolean {
        return this.state === 'active';
    }

    get currentState(): ParticleFollowState {
        return this.state;
    }

    get isInitialized(): boolean {
        return this.initialized;
    }

    getPathLength(): number {
        return this.pathLength;
    }

    /** Copies of the followed points; the originals stay shared with the sampler */
    getPathPoints(): PathPoints {
        return this.pathPoints.map((p) => p.clone());
    }

    get noiseSeed(): number {
        return this.noiseSeedValue;
    }

    setNoiseSeed(seed: number): void {
        this.noiseSeedValue = seed;
        this.noise.reseed(seed);
    }

    // ============================================
    // Per-frame override
    // ============================================

    /**
     * Write path positions onto live particles.
     * No-op unless active with a sampler and at least 2 points.
     */
    updateParticlePositions(particles: ReadonlyArray<P>): void {
        const sampler = this.sampler;
        if (this.state !== 'active' || !sampler) return;
        if (this.pathPoints.length < PATH_FX.SHARED.MIN_POINTS) return;

        const manualScatter = this.useScatter && !this.applyScatterInNoise;
        const position = this.scratch;

        for (let i = 0; i < particles.length; i++) {
            const particle = particles[i];
            const age = normalizedAge(particle);

            sampler.calculatePointOnPathToRef(this.pathPoints, this.range.remap(age), position);

            if (manualScatter) {
                position.x += this.scatterNoise(0, age, i) * this.scatterX * this.scatterCurves[0].evaluate(age);
                position.y += this.scatterNoise(1, age, i) * this.scatterY * this.scatterCurves[1].evaluate(age);
                position.z += this.scatterNoise(2, age, i) * this.scatterZ * this.scatterCurves[2].evaluate(age);
            }

            particle.position.copyFrom(position);
        }
    }

    /** Centered noise in [-0.5, 0.5] keyed by (axis, age, particle index, seed) */
    private scatterNoise(axis: 0 | 1 | 2, age: number, index: number): number {
        const { ageScale, indexScale, ageOnX } = SCATTER_AXES[axis];
        const ageTerm = age * this.noiseFrequency * ageScale;
        const indexTerm = index * indexScale;

        const seedOffset = this.noiseSeedValue * 0.1;
        const x = (ageOnX ? ageTerm : indexTerm) + seedOffset + axis * AXIS_OFFSET_X;
        const y = (ageOnX ? indexTerm : ageTerm) + seedOffset + axis * AXIS_OFFSET_Y;
        return this.noise.sample(x, y) - 0.5;
    }

    // ============================================
    // Host configuration
    // ============================================

    private placeEmitter(): void {
        if (!this.moveEmitterToStart || this.pathPoints.length === 0) return;

        const start = this.pathPoints[0];
        const emitter = this.host.emitter;
        if (emitter instanceof BABYLON.Vector3) {
            emitter.copyFrom(start);
        } else if (emitter) {
            emitter.position.copyFrom(start);
        } else {
            this.host.emitter = start.clone();
        }
    }

    private configureExternalNoise(): void {
        if (!this.useScatter || !this.applyScatterInNoise) return;

        this.host.noiseStrength.set(this.scatterX, this.scatterY, this.scatterZ);
        if (!this.host.noiseTexture) {
            console.warn(`[${ParticleFollowPath.TAG}] Scatter is delegated to host noise but the host has no noiseTexture`);
        }
    }

    private synchronizeLifetime(): void {
        if (!this.synchronizeLifetimeWithPath) return;
        if (this.particleSpeed <= 0) {
            console.warn(`[${ParticleFollowPath.TAG}] particleSpeed must be positive to sync lifetimes`);
            return;
        }

        const lifetime = Math.max(PATH_FX.PARTICLES.MIN_LIFETIME, this.pathLength / this.particleSpeed);
        const variation = BABYLON.Scalar.Clamp(this.speedVariation, 0, 1);
        this.host.minLifeTime = lifetime * (1 - variation);
        this.host.maxLifeTime = lifetime * (1 + variation);

        debugLog(ParticleFollowPath.TAG, 'Lifetime synchronized', {
            lifetime,
            min: this.host.minLifeTime,
            max: this.host.maxLifeTime,
        });
    }
}

function flatCurve(): ScalarCurve {
    return new AmplitudeCurve(PATH_FX.PARTICLES.CURVE);
}

/**
 * 0 = just born, 1 = expiring. A non-positive or non-finite lifetime,
 * or a non-finite age, counts as expired.
 */
export function normalizedAge(particle: PathParticle): number {
    const { age, lifeTime } = particle;
    if (!Number.isFinite(age) || !Number.isFinite(lifeTime) || lifeTime <= 0) return 1;
    const remaining = lifeTime - age;
    return 1 - remaining / lifeTime;
}
