/**
 * Path VFX engine
 *
 * Samplers map normalized progress along a control polyline to a 3D point.
 * ParticleFollowPath binds a sampler to a particle system; PathSamplerTicker
 * advances animated samplers once per frame.
 */

// Contracts
export {
    isSeededSampler,
    type PathPoints,
    type PathSampler,
    type PathSamplerKind,
    type SeededPathSampler,
} from './types';

// Math
export {
    AmplitudeCurve,
    resolveCurve,
    PerlinNoise,
    SeededRandom,
    RangeRemapper,
    estimatePathLength,
    measurePolyline,
    distanceTraveled,
    type CurveKey,
    type ScalarCurve,
    type PathRangeConfig,
} from './math';

// Samplers
export {
    BasePathSampler,
    LineSampler,
    ArcSampler,
    BounceSampler,
    ZigZagSampler,
    LightningSampler,
    OrganicWaveSampler,
    VortexSampler,
    NoiseSampler,
    WaveSampler,
    BlendSampler,
    createPathSampler,
    type LineSamplerConfig,
    type ArcSamplerConfig,
    type BounceSamplerConfig,
    type ZigZagSamplerConfig,
    type LightningSamplerConfig,
    type OrganicWaveSamplerConfig,
    type VortexSamplerConfig,
    type NoiseSamplerConfig,
    type WaveSamplerConfig,
    type BlendSamplerConfig,
    type BlendSamplerDescriptor,
    type PathSamplerConfig,
} from './samplers';

// Particles
export {
    ParticleFollowPath,
    normalizedAge,
    type ParticleFollowPathConfig,
    type ParticleFollowState,
    type PathParticle,
    type PathParticleHost,
} from './particles';

// Scheduling
export { PathSamplerTicker, type TickSource } from './scheduling';
