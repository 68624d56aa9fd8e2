import * as BABYLON from '@babylonjs/core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { PerlinNoise } from '../math';
import { ParticleFollowPath, normalizedAge, type PathParticle, type PathParticleHost } from '../particles';
import { ArcSampler, LineSampler } from '../samplers';
import { expectVectorClose } from './vectorAssertions';

const v = (x: number, y: number, z: number) => new BABYLON.Vector3(x, y, z);
const straight = () => [v(0, 0, 0), v(10, 0, 0)];

function particle(age: number, lifeTime: number): PathParticle {
    return { position: v(0, 0, 0), age, lifeTime };
}

/** In-process stand-in for a BABYLON.ParticleSystem */
class FakeParticleHost implements PathParticleHost<PathParticle> {
    particles: PathParticle[] = [];
    emitter: BABYLON.Nullable<BABYLON.AbstractMesh | BABYLON.Vector3> = v(-1, -1, -1);
    minLifeTime = 1;
    maxLifeTime = 1;
    noiseStrength = v(10, 10, 10);
    noiseTexture: BABYLON.Nullable<BABYLON.BaseTexture> = null;

    readonly integrate = vi.fn((particles: PathParticle[]) => {
        for (const p of particles) {
            p.position.set(99, 99, 99);
        }
    });
    updateFunction: (particles: PathParticle[]) => void = this.integrate;

    readonly start = vi.fn();
    readonly stop = vi.fn();

    tick(): void {
        this.updateFunction(this.particles);
    }
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ParticleFollowPath', () => {
    it('maps particle age onto the path after the host integrates', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(0, 2), particle(1, 2), particle(2, 2)];
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), useScatter: false });

        follow.updatePath(straight());
        follow.play();
        host.tick();

        expect(host.integrate).toHaveBeenCalledTimes(1);
        expectVectorClose(host.particles[0].position, [0, 0, 0]);
        expectVectorClose(host.particles[1].position, [5, 0, 0]);
        expectVectorClose(host.particles[2].position, [10, 0, 0]);
    });

    it('leaves positions to the host while idle', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(1, 2)];
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler() });

        follow.updatePath(straight());
        host.tick();

        expect(follow.currentState).toBe('idle');
        expectVectorClose(host.particles[0].position, [99, 99, 99]);
    });

    it('samples only the configured range', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(0, 1), particle(1, 1)];
        const follow = new ParticleFollowPath(host, {
            sampler: new LineSampler(),
            range: { start: 0.5, end: 1 },
            useScatter: false,
        });

        follow.updatePath(straight());
        follow.play();
        host.tick();

        expectVectorClose(host.particles[0].position, [5, 0, 0]);
        expectVectorClose(host.particles[1].position, [10, 0, 0]);
    });

    it('ignores repeated play and stop calls', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler() });

        follow.play();
        follow.play();
        expect(host.start).toHaveBeenCalledTimes(1);
        expect(follow.isPlaying).toBe(true);

        follow.stop();
        follow.stop();
        expect(host.stop).toHaveBeenCalledTimes(1);
        expect(follow.isPlaying).toBe(false);
    });

    it('wraps the host update only once', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(1, 2)];
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), useScatter: false });

        follow.initialize();
        follow.initialize();
        follow.updatePath(straight());
        follow.play();
        host.tick();

        expect(host.integrate).toHaveBeenCalledTimes(1);
        expect(follow.isInitialized).toBe(true);
    });

    it('synchronizes lifetimes with path length and speed', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, {
            sampler: new LineSampler(),
            particleSpeed: 5,
            speedVariation: 0.2,
        });

        follow.updatePath(straight());

        expect(follow.getPathLength()).toBe(10);
        expect(host.minLifeTime).toBeCloseTo(1.6, 10);
        expect(host.maxLifeTime).toBeCloseTo(2.4, 10);
    });

    it('never syncs below the minimum lifetime', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), speedVariation: 0.2 });

        follow.updatePath([v(0, 0, 0), v(0.1, 0, 0)]);

        expect(host.minLifeTime).toBeCloseTo(0.08, 10);
        expect(host.maxLifeTime).toBeCloseTo(0.12, 10);
    });

    it('caps lifetime variation at the full lifetime', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, {
            sampler: new LineSampler(),
            particleSpeed: 5,
            speedVariation: 1.5,
        });

        follow.updatePath(straight());

        expect(host.minLifeTime).toBe(0);
        expect(host.maxLifeTime).toBe(4);
    });

    it('leaves lifetimes alone when sync is off', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), synchronizeLifetimeWithPath: false });

        follow.updatePath(straight());

        expect(host.minLifeTime).toBe(1);
        expect(host.maxLifeTime).toBe(1);
    });

    it('measures curved samplers along the drawn path', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new ArcSampler({ height: 2 }) });

        follow.updatePath(straight());

        expect(follow.getPathLength()).toBeGreaterThan(10.5);
    });

    it('moves the emitter to the first point', () => {
        const host = new FakeParticleHost();
        const emitter = v(-1, -1, -1);
        host.emitter = emitter;
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler() });

        follow.updatePath([v(1, 2, 3), v(4, 5, 6)]);

        expect(host.emitter).toBe(emitter);
        expectVectorClose(emitter, [1, 2, 3]);
    });

    it('creates an emitter position when the host has none', () => {
        const host = new FakeParticleHost();
        host.emitter = null;
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler() });

        follow.updatePath([v(1, 2, 3), v(4, 5, 6)]);

        expect(host.emitter).toBeInstanceOf(BABYLON.Vector3);
        if (host.emitter instanceof BABYLON.Vector3) {
            expectVectorClose(host.emitter, [1, 2, 3]);
        }
    });

    it('keeps the emitter where it is when not asked to move it', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), moveEmitterToStart: false });

        follow.updatePath([v(1, 2, 3), v(4, 5, 6)]);
        follow.play();

        expect(host.emitter instanceof BABYLON.Vector3 && host.emitter.x).toBe(-1);
    });

    it('adds per-axis scatter from seeded noise', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(0.5, 2), particle(1, 2)];
        const follow = new ParticleFollowPath(host, {
            sampler: new LineSampler(),
            scatterX: 0.2,
            scatterY: 0,
            scatterZ: 0,
            noiseFrequency: 1,
            noiseSeed: 3,
        });

        follow.updatePath(straight());
        follow.play();
        host.tick();

        const noise = new PerlinNoise(3);
        const seedOffset = 3 * 0.1;
        const expectedX = (index: number, age: number) =>
            10 * age + (noise.sample(age * 3.17 + seedOffset, index * 0.421 + seedOffset) - 0.5) * 0.2;

        expect(host.particles[0].position.x).toBeCloseTo(expectedX(0, 0.25), 10);
        expect(host.particles[1].position.x).toBeCloseTo(expectedX(1, 0.5), 10);
        for (const p of host.particles) {
            expect(p.position.y).toBe(0);
            expect(p.position.z).toBe(0);
        }
    });

    it('scales scatter by the over-lifetime curves', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(0.5, 2)];
        const follow = new ParticleFollowPath(host, {
            sampler: new LineSampler(),
            scatterX: 0.5,
            scatterY: 0.5,
            scatterXOverLifetime: [
                { frame: 0, value: 0 },
                { frame: 1, value: 0 },
            ],
            scatterYOverLifetime: [
                { frame: 0, value: 0 },
                { frame: 1, value: 0 },
            ],
        });

        follow.updatePath(straight());
        follow.play();
        host.tick();

        expectVectorClose(host.particles[0].position, [2.5, 0, 0], 10);
    });

    it('repairs empty scatter curves on initialize', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), scatterZOverLifetime: [] });

        follow.initialize();

        expect(warn).toHaveBeenCalledWith('[ParticleFollowPath] scatterZOverLifetime has no keys, using default curve');
    });

    it('hands scatter to the host noise field when configured', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const host = new FakeParticleHost();
        host.particles = [particle(1, 2)];
        const follow = new ParticleFollowPath(host, {
            sampler: new LineSampler(),
            applyScatterInNoise: true,
            scatterX: 0.3,
            scatterY: 0.4,
            scatterZ: 0.5,
        });

        follow.updatePath(straight());
        follow.play();
        host.tick();

        expectVectorClose(host.noiseStrength, [0.3, 0.4, 0.5], 10);
        expect(warn).toHaveBeenCalledWith(
            '[ParticleFollowPath] Scatter is delegated to host noise but the host has no noiseTexture'
        );
        expectVectorClose(host.particles[0].position, [5, 0, 0], 10);
    });

    it('reseeds scatter noise', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), noiseSeed: 1 });
        follow.setNoiseSeed(8);
        expect(follow.noiseSeed).toBe(8);
    });

    it('reports a missing sampler and does not drive positions', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const host = new FakeParticleHost();
        host.particles = [particle(1, 2)];
        const follow = new ParticleFollowPath(host, { sampler: null });

        follow.updatePath(straight());
        follow.play();
        host.tick();

        expect(error).toHaveBeenCalledWith('[ParticleFollowPath] No path sampler assigned, positions will not be driven');
        expectVectorClose(host.particles[0].position, [99, 99, 99]);
    });

    it('sends particles with broken ages to the path end', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(Number.NaN, 2), particle(1, Number.POSITIVE_INFINITY)];
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler(), useScatter: false });

        follow.updatePath(straight());
        follow.play();
        host.tick();

        expectVectorClose(host.particles[0].position, [10, 0, 0]);
        expectVectorClose(host.particles[1].position, [10, 0, 0]);
    });

    it('hands out copies of the followed points', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler() });

        follow.updatePath(straight());
        follow.getPathPoints()[0].set(5, 5, 5);

        expectVectorClose(follow.getPathPoints()[0], [0, 0, 0]);
    });

    it('skips the override with fewer than two points', () => {
        const host = new FakeParticleHost();
        host.particles = [particle(1, 2)];
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler() });

        follow.updatePath([v(1, 1, 1)]);
        follow.play();
        host.tick();

        expectVectorClose(host.particles[0].position, [99, 99, 99]);
    });

    it('restores the host update on dispose', () => {
        const host = new FakeParticleHost();
        const follow = new ParticleFollowPath(host, { sampler: new LineSampler() });

        follow.play();
        expect(host.updateFunction).not.toBe(host.integrate);

        follow.dispose();
        expect(host.updateFunction).toBe(host.integrate);
        expect(host.stop).toHaveBeenCalledTimes(1);
        expect(follow.isInitialized).toBe(false);
    });
});

describe('normalizedAge', () => {
    it('runs from 0 at birth to 1 at expiry', () => {
        expect(normalizedAge(particle(0, 4))).toBe(0);
        expect(normalizedAge(particle(1, 4))).toBe(0.25);
        expect(normalizedAge(particle(4, 4))).toBe(1);
    });

    it('treats a non-positive lifetime as expired', () => {
        expect(normalizedAge(particle(0, 0))).toBe(1);
        expect(normalizedAge(particle(0, -1))).toBe(1);
    });

    it('treats non-finite ages and lifetimes as expired', () => {
        expect(normalizedAge(particle(Number.NaN, 2))).toBe(1);
        expect(normalizedAge(particle(0, Number.NaN))).toBe(1);
        expect(normalizedAge(particle(1, Number.POSITIVE_INFINITY))).toBe(1);
    });
});
