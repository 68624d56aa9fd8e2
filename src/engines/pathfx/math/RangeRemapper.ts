import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';

export interface PathRangeConfig {
    /** Normalized start of the sampled sub-range (default: 0) */
    start?: number;
    /** Normalized end of the sampled sub-range (default: 1) */
    end?: number;
    /** Clamp the remapped value to [0, 1] (default: true) */
    clamp?: boolean;
}

/**
 * Maps a normalized input onto a [start, end] portion of the path.
 * Swapped bounds are reordered rather than rejected.
 */
export class RangeRemapper {
    start: number;
    end: number;
    clamp: boolean;

    constructor(config: PathRangeConfig = {}) {
        this.start = config.start ?? PATH_FX.PARTICLES.RANGE_START;
        this.end = config.end ?? PATH_FX.PARTICLES.RANGE_END;
        this.clamp = config.clamp ?? PATH_FX.PARTICLES.CLAMP_TO_RANGE;
    }

    remap(t: number): number {
        const lo = Math.min(this.start, this.end);
        const hi = Math.max(this.start, this.end);
        const mapped = lo + t * (hi - lo);
        return this.clamp ? BABYLON.Scalar.Clamp(mapped, 0, 1) : mapped;
    }
}
