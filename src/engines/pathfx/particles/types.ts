import type * as BABYLON from '@babylonjs/core';

/**
 * Particle fields the follower reads and writes.
 * Matches BABYLON.Particle: `age` counts up from 0 to `lifeTime`.
 */
export interface PathParticle {
    position: BABYLON.Vector3;
    age: number;
    lifeTime: number;
}

/**
 * The slice of a particle system the follower drives.
 * BABYLON.ParticleSystem satisfies it as-is.
 */
export interface PathParticleHost<P extends PathParticle = BABYLON.Particle> {
    readonly particles: P[];

    /** Per-frame integration hook; the follower runs right after it */
    updateFunction: (particles: P[]) => void;

    emitter: BABYLON.Nullable<BABYLON.AbstractMesh | BABYLON.Vector3>;

    minLifeTime: number;
    maxLifeTime: number;

    /** Strength of the host's own noise field, per axis */
    noiseStrength: BABYLON.Vector3;
    readonly noiseTexture: BABYLON.Nullable<BABYLON.BaseTexture>;

    start(): void;
    stop(): void;
}

export type ParticleFollowState = 'idle' | 'active';
