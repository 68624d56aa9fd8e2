/**
 * createPathSampler - build a sampler from a plain tagged config
 *
 * Blend configs nest their children, so a whole composition can be
 * described as data and rebuilt in one call.
 */

import type { PathSampler } from '../types';
import { ArcSampler, type ArcSamplerConfig } from './ArcSampler';
import { BlendSampler, type BlendSamplerConfig } from './BlendSampler';
import { BounceSampler, type BounceSamplerConfig } from './BounceSampler';
import { LightningSampler, type LightningSamplerConfig } from './LightningSampler';
import { LineSampler, type LineSamplerConfig } from './LineSampler';
import { NoiseSampler, type NoiseSamplerConfig } from './NoiseSampler';
import { OrganicWaveSampler, type OrganicWaveSamplerConfig } from './OrganicWaveSampler';
import { VortexSampler, type VortexSamplerConfig } from './VortexSampler';
import { WaveSampler, type WaveSamplerConfig } from './WaveSampler';
import { ZigZagSampler, type ZigZagSamplerConfig } from './ZigZagSampler';

export interface BlendSamplerDescriptor extends Omit<BlendSamplerConfig, 'a' | 'b'> {
    kind: 'blend';
    a: PathSamplerConfig | PathSampler | null;
    b: PathSamplerConfig | PathSampler | null;
}

export type PathSamplerConfig =
    | ({ kind: 'line' } & LineSamplerConfig)
    | ({ kind: 'arc' } & ArcSamplerConfig)
    | ({ kind: 'bounce' } & BounceSamplerConfig)
    | ({ kind: 'zigzag' } & ZigZagSamplerConfig)
    | ({ kind: 'lightning' } & LightningSamplerConfig)
    | ({ kind: 'organicWave' } & OrganicWaveSamplerConfig)
    | ({ kind: 'vortex' } & VortexSamplerConfig)
    | ({ kind: 'noise' } & NoiseSamplerConfig)
    | ({ kind: 'wave' } & WaveSamplerConfig)
    | BlendSamplerDescriptor;

export function createPathSampler(config: PathSamplerConfig): PathSampler {
    switch (config.kind) {
        case 'line':
            return new LineSampler(config);
        case 'arc':
            return new ArcSampler(config);
        case 'bounce':
            return new BounceSampler(config);
        case 'zigzag':
            return new ZigZagSampler(config);
        case 'lightning':
            return new LightningSampler(config);
        case 'organicWave':
            return new OrganicWaveSampler(config);
        case 'vortex':
            return new VortexSampler(config);
        case 'noise':
            return new NoiseSampler(config);
        case 'wave':
            return new WaveSampler(config);
        case 'blend':
            return new BlendSampler({
                ...config,
                a: resolveChild(config.a),
                b: resolveChild(config.b),
            });
        default: {
            const unknownKind: never = config;
            throw new Error(`[createPathSampler] Unknown sampler kind: ${JSON.stringify(unknownKind)}`);
        }
    }
}

function resolveChild(child: PathSamplerConfig | PathSampler | null): PathSampler | null {
    if (child === null) return null;
    if (isSamplerInstance(child)) return child;
    return createPathSampler(child);
}

function isSamplerInstance(value: PathSamplerConfig | PathSampler): value is PathSampler {
    return 'calculatePointOnPathToRef' in value && typeof value.calculatePointOnPathToRef === 'function';
}
