export { AmplitudeCurve, resolveCurve, type CurveKey, type ScalarCurve } from './AmplitudeCurve';
export { PerlinNoise } from './PerlinNoise';
export { SeededRandom } from './SeededRandom';
export { RangeRemapper, type PathRangeConfig } from './RangeRemapper';
export { estimatePathLength } from './PathLengthEstimator';
export { smoothDampVector2ToRef } from './SmoothDamp';
export {
    createSegmentLocation,
    locateSegment,
    linearBasePositionToRef,
    localTangentToRef,
    globalTangentToRef,
    perpendicular2DToRef,
    arcUpDirectionToRef,
    measurePolyline,
    distanceTraveled,
    smoothStep,
    wrapTime,
    type SegmentLocation,
} from './PathMath';
