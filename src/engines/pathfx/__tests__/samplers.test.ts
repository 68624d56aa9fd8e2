import * as BABYLON from '@babylonjs/core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { isSeededSampler, type PathSampler } from '../types';
import {
    ArcSampler,
    BlendSampler,
    BounceSampler,
    LineSampler,
    createPathSampler,
    type PathSamplerConfig,
} from '../samplers';
import { expectVectorClose } from './vectorAssertions';

const v = (x: number, y: number, z: number) => new BABYLON.Vector3(x, y, z);
const straight = () => [v(0, 0, 0), v(10, 0, 0)];

const CASES: Array<[string, PathSamplerConfig]> = [
    ['line', { kind: 'line' }],
    ['smooth line', { kind: 'line', smooth: true }],
    ['arc', { kind: 'arc' }],
    ['segmented biased arc', { kind: 'arc', singleArc: false, bias: 0.3 }],
    ['bounce', { kind: 'bounce' }],
    ['segmented bounce', { kind: 'bounce', segmented: true }],
    ['zigzag', { kind: 'zigzag' }],
    ['segmented zigzag', { kind: 'zigzag', global: false }],
    ['lightning', { kind: 'lightning' }],
    ['organic wave', { kind: 'organicWave' }],
    ['vortex', { kind: 'vortex' }],
    ['segmented vortex', { kind: 'vortex', global: false }],
    ['noise', { kind: 'noise', amountZ: 0.5 }],
    ['horizontal wave', { kind: 'wave', horizontal: true }],
    ['blend', { kind: 'blend', a: { kind: 'wave' }, b: { kind: 'vortex' } }],
];

const ALL_KINDS = CASES.map(([, config]) => config);

afterEach(() => {
    vi.restoreAllMocks();
});

describe('sampling contract', () => {
    const points = [v(0, 0, 0), v(4, 1, 0), v(9, -2, 3)];

    it.each(CASES)(
        '%s pins t=0 and t=1 to the end points',
        (_name, config) => {
            const sampler = createPathSampler(config);
            sampler.onPathChanged(points);
            sampler.advance(0.25);

            expectVectorClose(sampler.calculatePointOnPath(points, 0), [0, 0, 0], 10);
            expectVectorClose(sampler.calculatePointOnPath(points, 1), [9, -2, 3], 10);
        }
    );

    it.each(CASES)(
        '%s clamps out-of-range t to the end points',
        (_name, config) => {
            const sampler = createPathSampler(config);
            expectVectorClose(sampler.calculatePointOnPath(points, -0.5), [0, 0, 0], 10);
            expectVectorClose(sampler.calculatePointOnPath(points, 1.5), [9, -2, 3], 10);
        }
    );

    it.each(CASES)(
        '%s reads NaN t as the start and infinite t as the end',
        (_name, config) => {
            const sampler = createPathSampler(config);
            expectVectorClose(sampler.calculatePointOnPath(points, Number.NaN), [0, 0, 0], 10);
            expectVectorClose(sampler.calculatePointOnPath(points, Number.POSITIVE_INFINITY), [9, -2, 3], 10);
            expectVectorClose(sampler.calculatePointOnPath(points, Number.NEGATIVE_INFINITY), [0, 0, 0], 10);
        }
    );

    it.each(CASES)(
        '%s returns the zero vector for degenerate input',
        (_name, config) => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            const sampler = createPathSampler(config);

            expectVectorClose(sampler.calculatePointOnPath([], 0.5), [0, 0, 0], 10);
            expectVectorClose(sampler.calculatePointOnPath([v(3, 3, 3)], 0.5), [0, 0, 0], 10);
            expect(warn).toHaveBeenCalled();
        }
    );

    it('names the sampler in the degenerate-input warning', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        new LineSampler().calculatePointOnPath([v(1, 2, 3)], 0.5);
        expect(warn).toHaveBeenCalledWith('[LineSampler] requires at least 2 points');
    });

    it('writes into the supplied vector', () => {
        const result = v(7, 7, 7);
        const returned = new LineSampler().calculatePointOnPathToRef(straight(), 0.3, result);
        expect(returned).toBe(result);
        expectVectorClose(result, [3, 0, 0]);
    });

    it('samples a two-point span through calculatePoint', () => {
        expectVectorClose(new ArcSampler({ height: 2 }).calculatePoint(v(0, 0, 0), v(10, 0, 0), 0.5), [5, 2, 0]);
    });
});

describe('createPathSampler', () => {
    it('builds one sampler per kind', () => {
        for (const config of ALL_KINDS) {
            expect(createPathSampler(config).kind).toBe(config.kind);
        }
    });

    it('builds nested blend configs', () => {
        const sampler = createPathSampler({
            kind: 'blend',
            a: { kind: 'line' },
            b: { kind: 'blend', a: { kind: 'arc', height: 2 }, b: { kind: 'wave' } },
        });

        expect(sampler).toBeInstanceOf(BlendSampler);
        if (!(sampler instanceof BlendSampler)) return;
        expect(sampler.samplerA).toBeInstanceOf(LineSampler);
        expect(sampler.samplerB?.kind).toBe('blend');
    });

    it('accepts existing sampler instances as blend children', () => {
        const arc = new ArcSampler();
        const sampler = createPathSampler({ kind: 'blend', a: arc, b: { kind: 'line' } });
        expect(sampler instanceof BlendSampler && sampler.samplerA).toBe(arc);
    });

    it('reports which samplers are seeded', () => {
        const seeded = ALL_KINDS.filter((config) => isSeededSampler(createPathSampler(config))).map((c) => c.kind);
        expect(new Set(seeded)).toEqual(new Set(['zigzag', 'lightning', 'organicWave', 'noise']));
    });
});

describe('LineSampler', () => {
    it('returns the exact midpoint of a straight two-point path', () => {
        const p = new LineSampler().calculatePointOnPath(straight(), 0.5);
        expect(p.x).toBe(5);
        expect(p.y).toBe(0);
        expect(p.z).toBe(0);
    });

    it('follows collinear points unchanged when smoothed', () => {
        const sampler = new LineSampler({ smooth: true });
        expectVectorClose(sampler.calculatePointOnPath([v(0, 0, 0), v(5, 0, 0), v(10, 0, 0)], 0.25), [2.5, 0, 0]);
    });

    it('bends through a corner when smoothed', () => {
        const sampler = new LineSampler({ smooth: true, tension: 0.5 });
        expectVectorClose(sampler.calculatePointOnPath([v(0, 0, 0), v(10, 0, 0), v(10, 10, 0)], 0.25), [
            5.625, -0.625, 0,
        ]);
    });

    it('only follows the polyline when not smoothed', () => {
        expect(new LineSampler().followsPolyline).toBe(true);
        expect(new LineSampler({ smooth: true }).followsPolyline).toBe(false);
    });
});

describe('ArcSampler', () => {
    it('lifts the midpoint by the full height', () => {
        expectVectorClose(new ArcSampler({ height: 2, bias: 0.5 }).calculatePointOnPath(straight(), 0.5), [5, 2, 0]);
    });

    it('flips the arc', () => {
        expectVectorClose(new ArcSampler({ height: 2, flip: true }).calculatePointOnPath(straight(), 0.5), [5, -2, 0]);
    });

    it('moves the apex with bias', () => {
        expectVectorClose(new ArcSampler({ bias: 0.25 }).calculatePointOnPath(straight(), 0.25), [2.5, 1, 0]);
    });

    it('arcs sideways on vertical paths', () => {
        expectVectorClose(new ArcSampler().calculatePointOnPath([v(0, 0, 0), v(0, 10, 0)], 0.5), [-1, 5, 0]);
    });

    it('arcs every segment in segmented mode', () => {
        const sampler = new ArcSampler({ singleArc: false });
        const points = [v(0, 0, 0), v(10, 0, 0), v(20, 0, 0)];
        expectVectorClose(sampler.calculatePointOnPath(points, 0.25), [5, 1, 0]);
        expectVectorClose(sampler.calculatePointOnPath(points, 0.75), [15, 1, 0]);
    });
});

describe('BounceSampler', () => {
    it('decays successive peaks geometrically', () => {
        const sampler = new BounceSampler({ count: 3, damping: 0.5, height: 1 });
        const points = straight();

        expect(sampler.calculatePointOnPath(points, 1 / 6).y).toBeCloseTo(1, 5);
        expect(sampler.calculatePointOnPath(points, 1 / 2).y).toBeCloseTo(0.5, 5);
        expect(sampler.calculatePointOnPath(points, 5 / 6).y).toBeCloseTo(0.25, 5);
    });

    it('touches down between bounces', () => {
        const sampler = new BounceSampler();
        expect(sampler.calculatePointOnPath(straight(), 1 / 3).y).toBeCloseTo(0, 5);
    });

    it('restarts damping on every segment when segmented', () => {
        const sampler = new BounceSampler({ count: 1, segmented: true });
        const points = [v(0, 0, 0), v(10, 0, 0), v(20, 0, 0)];
        expectVectorClose(sampler.calculatePointOnPath(points, 0.25), [5, 1, 0]);
        expectVectorClose(sampler.calculatePointOnPath(points, 0.75), [15, 1, 0]);
    });

    it('bounces downward when flipped', () => {
        const sampler = new BounceSampler({ count: 1, flip: true });
        expectVectorClose(sampler.calculatePointOnPath(straight(), 0.5), [5, -1, 0]);
    });
});

describe('BlendSampler', () => {
    const points = straight();
    const a = () => new LineSampler();
    const b = () => new ArcSampler({ height: 2 });

    it("returns A's result before the window and B's after it", () => {
        const sampler = new BlendSampler({ a: a(), b: b(), transitionStart: 0.3, transitionEnd: 0.7 });
        const early = sampler.calculatePointOnPath(points, 0.1);
        const late = sampler.calculatePointOnPath(points, 0.9);
        const expectedEarly = a().calculatePointOnPath(points, 0.1);
        const expectedLate = b().calculatePointOnPath(points, 0.9);

        expect([early.x, early.y, early.z]).toEqual([expectedEarly.x, expectedEarly.y, expectedEarly.z]);
        expect([late.x, late.y, late.z]).toEqual([expectedLate.x, expectedLate.y, expectedLate.z]);
    });

    it('mixes by the blend curve inside the window', () => {
        const sampler = new BlendSampler({ a: a(), b: b() });
        expect(sampler.blendFactor(0.5)).toBeCloseTo(0.5, 10);
        expectVectorClose(sampler.calculatePointOnPath(points, 0.5), [5, 1, 0]);
    });

    it('switches hard when the window is empty', () => {
        const sampler = new BlendSampler({ a: a(), b: b(), transitionStart: 0.5, transitionEnd: 0.5 });
        expectVectorClose(sampler.calculatePointOnPath(points, 0.4), [4, 0, 0]);
        const expected = b().calculatePointOnPath(points, 0.6);
        expectVectorClose(sampler.calculatePointOnPath(points, 0.6), [expected.x, expected.y, expected.z]);
    });

    it('reports a missing child and samples to zero', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const sampler = new BlendSampler({ a: a(), b: null });

        expect(error).toHaveBeenCalledWith('[BlendSampler] requires two path samplers (a: line, b: missing)');
        expect(sampler.isComplete).toBe(false);
        expectVectorClose(sampler.calculatePointOnPath(points, 0), [0, 0, 0], 10);
        expectVectorClose(sampler.calculatePointOnPath(points, 0.5), [0, 0, 0], 10);
    });

    it('forwards path changes and ticks to both children', () => {
        const first = new LineSampler();
        const second: PathSampler = new ArcSampler();
        const advance = vi.spyOn(second, 'advance');
        const sampler = new BlendSampler({ a: first, b: second });

        sampler.onPathChanged(points);
        sampler.advance(0.5);

        expect(first.getPathPoints()).toHaveLength(2);
        expect(advance).toHaveBeenCalledWith(0.5);
    });
});
