import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import { resolveCurve, type CurveKey, type ScalarCurve } from '../math/AmplitudeCurve';
import {
    createSegmentLocation,
    globalTangentToRef,
    linearBasePositionToRef,
    locateSegment,
    measurePolyline,
    wrapTime,
} from '../math/PathMath';
import type { PathPoints } from '../types';
import { BasePathSampler } from './BasePathSampler';

export interface VortexSamplerConfig {
    startRadius?: number;
    endRadius?: number;
    /** Full turns over the span (default: 3) */
    rotations?: number;
    clockwise?: boolean;
    /** Multiplier on the lerped radius (default: linear 1 → 0) */
    radiusCurve?: ScalarCurve | ReadonlyArray<CurveKey> | null;
    /** Spin rate in radians per second (default: 1) */
    animationSpeed?: number;
    /** One spiral over the whole path, or one per segment (default: true) */
    global?: boolean;
    /** Scale rotations by pathLength / |last − first| (default: true) */
    adaptRotationsToPathLength?: boolean;
}

const WORLD_UP = new BABYLON.Vector3(0, 1, 0);
const WORLD_FORWARD = new BABYLON.Vector3(0, 0, 1);

export class VortexSampler extends BasePathSampler {
    readonly kind = 'vortex' as const;

    startRadius: number;
    endRadius: number;
    rotations: number;
    clockwise: boolean;
    radiusCurve: ScalarCurve;
    animationSpeed: number;
    global: boolean;
    adaptRotationsToPathLength: boolean;

    private timeOffset = 0;

    private readonly location = createSegmentLocation();
    private readonly direction = new BABYLON.Vector3();
    private readonly right = new BABYLON.Vector3();
    private readonly up = new BABYLON.Vector3();

    constructor(config: VortexSamplerConfig = {}) {
        super('VortexSampler');
        this.startRadius = config.startRadius ?? PATH_FX.VORTEX.START_RADIUS;
        this.endRadius = config.endRadius ?? PATH_FX.VORTEX.END_RADIUS;
        this.rotations = config.rotations ?? PATH_FX.VORTEX.ROTATIONS;
        this.clockwise = config.clockwise ?? PATH_FX.VORTEX.CLOCKWISE;
        this.radiusCurve = resolveCurve(this.tag, 'radiusCurve', config.radiusCurve, PATH_FX.VORTEX.CURVE);
        this.animationSpeed = config.animationSpeed ?? PATH_FX.VORTEX.ANIMATION_SPEED;
        this.global = config.global ?? PATH_FX.VORTEX.GLOBAL;
        this.adaptRotationsToPathLength =
            config.adaptRotationsToPathLength ?? PATH_FX.VORTEX.ADAPT_ROTATIONS_TO_PATH_LENGTH;
    }

    /** Accumulated spin in radians */
    get phase(): number {
        return this.timeOffset;
    }

    override advance(deltaTime: number): void {
        if (this.animationSpeed === 0) return;
        this.timeOffset = wrapTime(this.timeOffset + deltaTime * this.animationSpeed);
    }

    protected sampleToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        return this.global ? this.globalToRef(points, t, result) : this.segmentedToRef(points, t, result);
    }

    private globalToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        linearBasePositionToRef(points, t, result, this.location);
        globalTangentToRef(points, this.direction);

        const radius = BABYLON.Scalar.Lerp(this.startRadius, this.endRadius, t) * this.radiusCurve.evaluate(t);

        let rotations = this.rotations;
        if (this.adaptRotationsToPathLength) {
            const span = BABYLON.Vector3.Distance(points[0], points[points.length - 1]);
            rotations *= measurePolyline(points) / Math.max(PATH_FX.SHARED.EPSILON, span);
        }

        return this.applySwirl(result, t * rotations * Math.PI * 2, radius);
    }

    private segmentedToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
        const { index, t: segmentT, count } = locateSegment(points.length, t, this.location);
        const start = points[index];
        const end = points[index + 1];
        BABYLON.Vector3.LerpToRef(start, end, segmentT, result);
        end.subtractToRef(start, this.direction).normalize();

        const segmentNormalized = index / count + segmentT / count;
        const radius =
            BABYLON.Scalar.Lerp(this.startRadius, this.endRadius, segmentNormalized) *
            this.radiusCurve.evaluate(segmentNormalized);

        const segmentLength = BABYLON.Vector3.Distance(start, end);
        const pathLength = Math.max(PATH_FX.SHARED.EPSILON, measurePolyline(points));
        const segmentRotations = ((this.rotations * segmentLength) / pathLength) * count;

        return this.applySwirl(result, segmentT * segmentRotations * Math.PI * 2, radius);
    }

    /**
     * Circle in the plane normal to `direction`: right = up × dir, up' = dir × right
     */
    private applySwirl(position: BABYLON.Vector3, sweep: number, radius: number): BABYLON.Vector3 {
        let angle = sweep + this.timeOffset;
        if (!this.clockwise) angle = -angle;

        BABYLON.Vector3.CrossToRef(WORLD_UP, this.direction, this.right);
        this.right.normalize();
        if (this.right.length() < PATH_FX.SHARED.EPSILON) {
            BABYLON.Vector3.CrossToRef(WORLD_FORWARD, this.direction, this.right);
            this.right.normalize();
        }
        BABYLON.Vector3.CrossToRef(this.direction, this.right, this.up);
        this.up.normalize();

        this.right.scaleAndAddToRef(Math.cos(angle) * radius, position);
        this.up.scaleAndAddToRef(Math.sin(angle) * radius, position);
        return position;
    }
}
