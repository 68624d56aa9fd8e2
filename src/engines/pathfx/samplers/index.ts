export { BasePathSampler } from './BasePathSampler';
export { LineSampler, type LineSamplerConfig } from './LineSampler';
export { ArcSampler, type ArcSamplerConfig } from './ArcSampler';
export { BounceSampler, type BounceSamplerConfig } from './BounceSampler';
export { ZigZagSampler, type ZigZagSamplerConfig } from './ZigZagSampler';
export { LightningSampler, type LightningSamplerConfig } from './LightningSampler';
export { OrganicWaveSampler, type OrganicWaveSamplerConfig } from './OrganicWaveSampler';
export { VortexSampler, type VortexSamplerConfig } from './VortexSampler';
export { NoiseSampler, type NoiseSamplerConfig } from './NoiseSampler';
export { WaveSampler, type WaveSamplerConfig } from './WaveSampler';
export { BlendSampler, type BlendSamplerConfig } from './BlendSampler';
export { createPathSampler, type PathSamplerConfig, type BlendSamplerDescriptor } from './createPathSampler';
