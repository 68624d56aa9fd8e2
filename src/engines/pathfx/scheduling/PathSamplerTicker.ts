/**
 * PathSamplerTicker - advances animated samplers once per frame
 *
 * Runs on scene.onBeforeRenderObservable, which fires before particle
 * systems animate, so every sample taken during the frame sees the
 * already-advanced state.
 */

import * as BABYLON from '@babylonjs/core';
import { debugLog } from '../../../debug/PathFxDebugFlags';
import type { PathSampler } from '../types';

/** Minimal scene surface; BABYLON.Scene satisfies it */
export interface TickSource<T> {
    onBeforeRenderObservable: BABYLON.Observable<T>;
    getEngine(): { getDeltaTime(): number };
}

export class PathSamplerTicker {
    private readonly samplers = new Set<PathSampler>();
    private detach: (() => void) | null = null;

    constructor(samplers: Iterable<PathSampler> = []) {
        for (const sampler of samplers) {
            this.samplers.add(sampler);
        }
    }

    get size(): number {
        return this.samplers.size;
    }

    get isAttached(): boolean {
        return this.detach !== null;
    }

    add(sampler: PathSampler): void {
        this.samplers.add(sampler);
    }

    remove(sampler: PathSampler): boolean {
        return this.samplers.delete(sampler);
    }

    /**
     * Register on the scene's before-render observable.
     * Re-attaching moves the observer to the new scene.
     */
    attach<T>(scene: TickSource<T>): void {
        this.detachFromScene();

        const observer = scene.onBeforeRenderObservable.add(() => {
            this.tick(scene.getEngine().getDeltaTime() / 1000);
        });

        this.detach = () => {
            scene.onBeforeRenderObservable.remove(observer);
        };

        debugLog('PathSamplerTicker', 'Attached', { samplers: this.samplers.size });
    }

    /** Advance every sampler by deltaSeconds */
    tick(deltaSeconds: number): void {
        for (const sampler of this.samplers) {
            sampler.advance(deltaSeconds);
        }
    }

    dispose(): void {
        this.detachFromScene();
        this.samplers.clear();
    }

    private detachFromScene(): void {
        if (!this.detach) return;
        this.detach();
        this.detach = null;
    }
}
