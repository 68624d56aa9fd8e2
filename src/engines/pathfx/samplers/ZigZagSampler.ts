import * as BABYLON from '@babylonjs/core';
import { debugLog } from '../../../debug/PathFxDebugFlags';
import { PATH_FX } from '../../../shared/design';
import { resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import {
    createSegmentLocation,
    globalTangentToRef,
    locateSegment,
    measurePolyline,
    perpendicular2DToRef,
} from '../math/PathMath';
import { SeededRandom } from '../math/SeededRandom';
import type { PathPoints, SeededPathSampler } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface ZigZagSamplerConfig {
    amplitude?: number;
    /** Fixed zig-zag count when not adaptive (default: 5) */
    segments?: number;
    amplitudeCurve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    /** Offset in the XY perpendicular of the path instead of world up (default: true) */
    alignWithDirection?: boolean;
    /** Per-vertex height jitter, 0..1 (default: 0.2) */
    randomness?: number;
    /** Derive the zig-zag count from path length (default: true) */
    adaptiveSegmentCount?: boolean;
    adaptAmplitudeToPathLength?: boolean;
    segmentsPerUnit?: number;
    /** One pattern over the whole path, or one per segment (default: true) */
    global?: boolean;
    seed?: number;
}

/**
 * ZigZagSampler - alternating ±1 offsets with seeded jitter.
 *
 * The pattern is regenerated whenever the path length drifts by more than
 * REGENERATE_DRIFT from the length it was built for, or when `segments`
 * or `segmentsPerUnit` no longer match the built vertex count.
 */
export class ZigZagSampler extends BasePathSampler implements SeededPathSampler {
    readonly kind = 'zigzag' as const;

    amplitude: number;
    segments: number;
    amplitudeCurve: ScalarCurve;
    alignWithDirection: boolean;
    randomness: number;
    adaptiveSegmentCount: boolean;
    adaptAmplitudeToPathLength: boolean;
    segmentsPerUnit: number;
    global: boolean;

    private readonly random: SeededRandom;
    private offsets: BABYLON.Vector2[] = [];
    private cachedPathLength = 0;
    /** Last build derived its count from path length */
    private lengthDriven = false;

    private readonly location = createSegmentLocation();
    private readonly direction = new BABYLON.Vector3();
    private readonly perpendicular = new BABYLON.Vector3();

    constructor(config: ZigZagSamplerConfig = {}) {
        super('ZigZagSampler');
        this.amplitude = config.amplitude ?? PATH_FX.ZIGZAG.AMPLITUDE;
        this.segments = config.segments ?? PATH_FX.ZIGZAG.SEGMENTS;
        this.amplitudeCurve = resolveCurve(this.tag, 'amplitudeCurve', config.amplitudeCurve, PATH_FX.ZIGZAG.CURVE);
        this.alignWithDirection = config.alignWithDirection ?? PATH_FX.ZIGZAG.ALIGN_WITH_DIRECTION;
        this.randomness = config.randomness ?? PATH_FX.ZIGZAG.RANDOMNESS;
        this.adaptiveSegmentCount = config.adaptiveSegmentCount ?? PATH_FX.ZIGZAG.ADAPTIVE_SEGMENT_COUNT;
        this.adaptAmplitudeToPathLength =
            config.adaptAmplitudeToPathLength ?? PATH_FX.ZIGZAG.ADAPT_AMPLITUDE_TO_PATH_LENGTH;
        this.segmentsPerUnit = config.segmentsPerUnit ?? PATH_FX.ZIGZAG.SEGMENTS_PER_UNIT;
        this.global = config.global ?? PATH_FX.ZIGZAG.GLOBAL;

        this.random = new SeededRandom(config.seed ?? PATH_FX.ZIGZAG.SEED);
        this.regenerate(this.pathPoints);
    }

    get seed(): number {
        return this.random.seed;
    }

    setSeed(seed: number): void {
        this.random.reseed(seed);
        this.regenerate(this.pathPoints);
    }

    /** Current per-vertex offsets (x unused, y = signed height) */
    getOffsets(): ReadonlyArray<BABYLON.Vector2> {
        return this.offsets;
    }

    override onPathChanged(points: PathPoints): void {
        super.onPathChanged(points);
        if (this.adaptiveSegmentCount && points.length >= PATH_FX.SHARED.MIN_POINTS) {
            this.regenerateIfStale(points);
        }
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        if (this.adaptiveSegmentCount) {
            this.regenerateIfStale(points);
        }
        if (this.offsets.length !== this.patternCount() + 1) {
            this.regenerate(points);
        }

        return this.global ? this.globalToRef(points, t, result) : this.segmentedToRef(points, t, result);
    }

    private globalToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        const { index, t: segmentT } = locateSegment(points.length, t, this.location);
        BABYLON.Vector3.LerpToRef(points[index], points[index + 1], segmentT, result);
        globalTangentToRef(points, this.direction);

        const last = this.offsets.length - 1;
        const scaled = t * last;
        const zig = Math.max(0, Math.min(Math.floor(scaled), last - 1));
        const height = BABYLON.Scalar.Lerp(this.offsets[zig].y, this.offsets[zig + 1].y, scaled - zig);

        let amplitude = this.amplitude * this.amplitudeCurve.evaluate(t);
        if (this.adaptAmplitudeToPathLength) {
            amplitude *= Math.min(1, measurePolyline(points) * PATH_FX.ZIGZAG.GLOBAL_LENGTH_SCALE);
        }

        return this.applyOffset(result, height * amplitude);
    }

    private segmentedToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        const { index, t: segmentT, count } = locateSegment(points.length, t, this.location);
        const start = points[index];
        const end = points[index + 1];
        BABYLON.Vector3.LerpToRef(start, end, segmentT, result);
        end.subtractToRef(start, this.direction).normalize();

        const last = this.offsets.length - 1;
        const perSegment = Math.max(PATH_FX.ZIGZAG.MIN_SEGMENTS, Math.floor(last / count));
        const scaled = segmentT * perSegment;
        const sub = Math.floor(scaled);
        const zig = Math.min(index * perSegment + sub, last - 1);
        const height = BABYLON.Scalar.Lerp(this.offsets[zig].y, this.offsets[zig + 1].y, scaled - sub);

        let amplitude = this.amplitude * this.amplitudeCurve.evaluate(index / count + segmentT / count);
        if (this.adaptAmplitudeToPathLength) {
            amplitude *= Math.min(1, BABYLON.Vector3.Distance(start, end) * PATH_FX.ZIGZAG.SEGMENT_LENGTH_SCALE);
        }

        return this.applyOffset(result, height * amplitude);
    }

    private applyOffset(position: BABYLON.Vector3, offset: number): BABYLON.Vector3 {
        if (this.alignWithDirection) {
            perpendicular2DToRef(this.direction, this.perpendicular);
        } else {
            this.perpendicular.set(0, 1, 0);
        }
        this.perpendicular.scaleAndAddToRef(offset, position);
        return position;
    }

    private regenerateIfStale(points: PathPoints): void {
        const length = measurePolyline(points);
        if (Math.abs(length - this.cachedPathLength) > PATH_FX.ZIGZAG.REGENERATE_DRIFT) {
            this.regenerate(points);
        }
    }

    /** Zig-zag count the current settings call for */
    private patternCount(): number {
        if (this.adaptiveSegmentCount && this.lengthDriven) {
            return Math.max(PATH_FX.ZIGZAG.MIN_SEGMENTS, Math.round(this.cachedPathLength * this.segmentsPerUnit));
        }
        return Math.max(1, Math.floor(this.segments));
    }

    private regenerate(points: PathPoints): void {
        this.random.reseed(this.random.seed);

        this.lengthDriven = this.adaptiveSegmentCount && points.length >= PATH_FX.SHARED.MIN_POINTS;
        if (this.lengthDriven) {
            this.cachedPathLength = measurePolyline(points);
        }
        const count = this.patternCount();

        const offsets: BABYLON.Vector2[] = [];
        for (let i = 0; i <= count; i++) {
            if (i === 0 || i === count) {
                offsets.push(BABYLON.Vector2.Zero());
                continue;
            }
            const direction = i % 2 === 0 ? 1 : -1;
            const jitter = this.random.next() * this.randomness * 2 - this.randomness;
            offsets.push(new BABYLON.Vector2(0, direction * (1 + jitter)));
        }
        this.offsets = offsets;

        debugLog(this.tag, `Pattern regenerated: ${count} zig-zags (seed ${this.random.seed})`);
    }
}
