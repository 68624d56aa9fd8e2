/**
 * PathMath - positional helpers shared by every sampler
 *
 * Segmentation is index-proportional: t is split evenly across
 * (points.length - 1) segments regardless of their true lengths.
 * Callers guarantee points.length >= 2.
 */

import * as BABYLON from '@babylonjs/core';
import { PATH_FX } from '../../../shared/design';
import type { PathPoints } from '../types';

export interface SegmentLocation {
    /** Index of the segment start point */
    index: number;
    /** Fraction within the segment */
    t: number;
    /** Total segment count */
    count: number;
}

const WORLD_UP = new BABYLON.Vector3(0, 1, 0);
const WORLD_FORWARD = new BABYLON.Vector3(0, 0, 1);

export function createSegmentLocation(): SegmentLocation {
    return { index: 0, t: 0, count: 1 };
}

/**
 * Segment bracketing t: floor(t * count) clamped to the last segment
 */
export function locateSegment(pointCount: number, t: number, ref: SegmentLocation): SegmentLocation {
    const count = pointCount - 1;
    const scaled = t * count;
    const index = Math.max(0, Math.min(Math.floor(scaled), count - 1));
    ref.index = index;
    ref.t = scaled - index;
    ref.count = count;
    return ref;
}

/**
 * Underlying (pre-offset) position: lerp between the bracketing points
 */
export function linearBasePositionToRef(
    points: PathPoints,
    t: number,
    result: BABYLON.Vector3,
    location: SegmentLocation = createSegmentLocation()
): BABYLON.Vector3 {
    locateSegment(points.length, t, location);
    BABYLON.Vector3.LerpToRef(points[location.index], points[location.index + 1], location.t, result);
    return result;
}

/**
 * Normalized direction of the bracketing segment
 */
export function localTangentToRef(points: PathPoints, t: number, result: BABYLON.Vector3): BABYLON.Vector3 {
    const count = points.length - 1;
    const index = Math.max(0, Math.min(Math.floor(t * count), count - 1));
    points[index + 1].subtractToRef(points[index], result);
    return result.normalize();
}

/**
 * Normalized first-to-last direction
 */
export function globalTangentToRef(points: PathPoints, result: BABYLON.Vector3): BABYLON.Vector3 {
    points[points.length - 1].subtractToRef(points[0], result);
    return result.normalize();
}

/**
 * In-plane (XY) perpendicular of a direction.
 * A direction along Z has no XY perpendicular; world up is used instead.
 */
export function perpendicular2DToRef(direction: BABYLON.Vector3, result: BABYLON.Vector3): BABYLON.Vector3 {
    const x = -direction.y;
    const y = direction.x;
    if (x * x + y * y < 1e-12) {
        return result.copyFrom(WORLD_UP);
    }
    result.set(x, y, 0);
    return result.normalize();
}

/**
 * Offset axis for arcs and bounces: up for mostly horizontal directions,
 * a side vector for mostly vertical ones.
 */
export function arcUpDirectionToRef(direction: BABYLON.Vector3, result: BABYLON.Vector3): BABYLON.Vector3 {
    if (Math.abs(direction.y) < PATH_FX.SHARED.HORIZONTAL_THRESHOLD) {
        return result.copyFrom(WORLD_UP);
    }
    BABYLON.Vector3.CrossToRef(WORLD_FORWARD, direction, result);
    return result.normalize();
}

/**
 * Exact sum of straight segment distances
 */
export function measurePolyline(points: PathPoints): number {
    let length = 0;
    for (let i = 0; i < points.length - 1; i++) {
        length += BABYLON.Vector3.Distance(points[i], points[i + 1]);
    }
    return length;
}

/**
 * True distance covered when index-proportional progress reaches t
 */
export function distanceTraveled(points: PathPoints, t: number): number {
    const location = locateSegment(points.length, t, createSegmentLocation());

    let distance = 0;
    for (let i = 0; i < location.index; i++) {
        distance += BABYLON.Vector3.Distance(points[i], points[i + 1]);
    }
    distance += BABYLON.Vector3.Distance(points[location.index], points[location.index + 1]) * location.t;
    return distance;
}

export function smoothStep(t: number): number {
    return t * t * (3 - 2 * t);
}

/**
 * Keep an accumulator bounded so float precision holds over long sessions
 */
export function wrapTime(value: number, limit: number = PATH_FX.SHARED.TIME_WRAP): number {
    return Math.abs(value) > limit ? value % limit : value;
}
