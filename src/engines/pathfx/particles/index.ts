export { ParticleFollowPath, normalizedAge, type ParticleFollowPathConfig } from './ParticleFollowPath';
export type { PathParticle, PathParticleHost, ParticleFollowState } from './types';
