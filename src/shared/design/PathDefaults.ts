/**
 * PathDefaults - default tuning for every path sampler and the particle follower
 *
 * Rules:
 * - Sampler configs fall back to these tables, never to inline literals.
 * - Curve defaults are keyframe lists; AmplitudeCurve builds them on demand.
 */

import type { CurveKey } from '../../engines/pathfx/math/AmplitudeCurve';

type Keys = ReadonlyArray<CurveKey>;

const FLAT_ONE: Keys = [
    { frame: 0, value: 1 },
    { frame: 1, value: 1 },
];

/** Rest → peak → rest, with launch/landing slopes of ±2 */
const BOUNCE_SHAPE: Keys = [
    { frame: 0, value: 0, outTangent: 2 },
    { frame: 0.5, value: 1, inTangent: 0, outTangent: 0 },
    { frame: 1, value: 0, inTangent: -2 },
];

const LIGHTNING_ENVELOPE: Keys = [
    { frame: 0, value: 0.2 },
    { frame: 0.5, value: 1 },
    { frame: 1, value: 0.2 },
];

const ORGANIC_ENVELOPE: Keys = [
    { frame: 0, value: 0.5 },
    { frame: 0.5, value: 1 },
    { frame: 1, value: 0.5 },
];

const LINEAR_DOWN: Keys = [
    { frame: 0, value: 1 },
    { frame: 1, value: 0 },
];

const LINEAR_UP: Keys = [
    { frame: 0, value: 0 },
    { frame: 1, value: 1 },
];

export const PATH_FX = {
    // ============================================
    // Shared
    // ============================================
    SHARED: {
        /** Minimum points for any sampling call */
        MIN_POINTS: 2,
        /** Samples used to estimate curved path length */
        LENGTH_SAMPLE_COUNT: 20,
        /** Accumulated time wraps at this magnitude */
        TIME_WRAP: 1000,
        /** |tangent.y| below this counts as a horizontal path (sin 45°) */
        HORIZONTAL_THRESHOLD: 0.707,
        /** Guards against dividing by near-zero lengths */
        EPSILON: 0.001,
    },

    LINE: {
        SMOOTH: false,
        TENSION: 0.5,
    },

    ARC: {
        HEIGHT: 1,
        FLIP: false,
        SINGLE_ARC: true,
        BIAS: 0.5,
    },

    BOUNCE: {
        HEIGHT: 1,
        COUNT: 3,
        DAMPING: 0.5,
        FLIP: false,
        SEGMENTED: false,
        CURVE: BOUNCE_SHAPE,
    },

    ZIGZAG: {
        AMPLITUDE: 0.5,
        SEGMENTS: 5,
        ALIGN_WITH_DIRECTION: true,
        RANDOMNESS: 0.2,
        ADAPTIVE_SEGMENT_COUNT: true,
        ADAPT_AMPLITUDE_TO_PATH_LENGTH: true,
        SEGMENTS_PER_UNIT: 1,
        GLOBAL: true,
        SEED: 0,
        /** Path length drift that forces a new pattern */
        REGENERATE_DRIFT: 0.5,
        /** Amplitude scale per unit of length (global / per segment) */
        GLOBAL_LENGTH_SCALE: 0.1,
        SEGMENT_LENGTH_SCALE: 0.5,
        MIN_SEGMENTS: 2,
        CURVE: FLAT_ONE,
    },

    LIGHTNING: {
        AMPLITUDE: 0.5,
        JAGGEDNESS: 0.5,
        STROBE_FREQUENCY: 0.1,
        ANIMATE: true,
        DETAIL_LEVEL: 6,
        SEED: 0,
        /** Y offsets are damped to avoid knots */
        Y_DAMPING: 0.3,
        ANGLE_SPREAD: 0.8,
        PERPENDICULAR_SCALE: 0.1,
        TANGENT_SCALE: 0.02,
        CURVE: LIGHTNING_ENVELOPE,
    },

    ORGANIC_WAVE: {
        AMPLITUDE: 0.5,
        JAGGEDNESS: 0.3,
        ANIMATE: true,
        CHASE_SPEED: 3,
        TARGET_MOVE_SPEED: 1.5,
        FLOW_AMOUNT: 0.7,
        MICRO_MOTION: 0.2,
        DETAIL_LEVEL: 6,
        SEED: 0,
        ADAPT_TO_PATH_LENGTH: true,
        Y_DAMPING: 0.6,
        TANGENT_SCALE: 0.3,
        LENGTH_SCALE: 0.1,
        /** sin(3τ) and cos(2.5τ) both repeat after 4π */
        WOBBLE_PERIOD: 4 * Math.PI,
        CURVE: ORGANIC_ENVELOPE,
    },

    VORTEX: {
        START_RADIUS: 1,
        END_RADIUS: 0.2,
        ROTATIONS: 3,
        CLOCKWISE: true,
        ANIMATION_SPEED: 1,
        GLOBAL: true,
        ADAPT_ROTATIONS_TO_PATH_LENGTH: true,
        CURVE: LINEAR_DOWN,
    },

    NOISE: {
        AMOUNT_X: 0.5,
        AMOUNT_Y: 0.5,
        AMOUNT_Z: 0,
        SCALE: 1,
        SPEED: 0.5,
        ADAPT_TO_PATH_LENGTH: true,
        OCTAVES: 2,
        PERSISTENCE: 0.5,
        SEED: 0,
        LENGTH_SCALE: 0.1,
        CURVE: FLAT_ONE,
    },

    WAVE: {
        AMPLITUDE: 0.5,
        FREQUENCY: 2,
        PHASE_OFFSET: 0,
        ANIMATION_SPEED: 0,
        HORIZONTAL: false,
        ADAPT_TO_PATH_LENGTH: true,
        SCALE_FREQUENCY_WITH_PATH_LENGTH: true,
        CONTINUOUS_PHASE: true,
        LENGTH_SCALE: 0.2,
        CURVE: FLAT_ONE,
    },

    BLEND: {
        TRANSITION_START: 0.3,
        TRANSITION_END: 0.7,
        CURVE: LINEAR_UP,
    },

    // ============================================
    // Particle follow engine
    // ============================================
    PARTICLES: {
        RANGE_START: 0,
        RANGE_END: 1,
        CLAMP_TO_RANGE: true,
        MOVE_EMITTER_TO_START: true,
        SPEED: 5,
        SPEED_VARIATION: 0.2,
        SYNCHRONIZE_LIFETIME: true,
        MIN_LIFETIME: 0.1,
        USE_SCATTER: true,
        SCATTER_IN_NOISE: false,
        SCATTER_X: 0.2,
        SCATTER_Y: 0.2,
        SCATTER_Z: 0,
        NOISE_FREQUENCY: 1,
        NOISE_SEED: 0,
        CURVE: FLAT_ONE,
    },
} as const;
