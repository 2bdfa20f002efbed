import { describe, expect, it } from 'vitest';
import { renderLineGroup } from './line-group.js';

const BASE = { x: 0, y: 0, lineHeight: 10, width: 100, lineWidth: 0.3 };

describe('renderLineGroup', () => {
    it('draws only the baseline without proportions', () => {
        const segments = renderLineGroup({ x: 5, y: 20, lineHeight: 7, width: 100, distances: [], lineWidth: 0.3 });
        expect(segments).toEqual([
            { x1: 5, y1: 27, x2: 105, y2: 27, lineWidth: 0.3, kind: 'ruling' }
        ]);
    });

    it('draws the ruled lines followed by both borders', () => {
        const segments = renderLineGroup({ ...BASE, distances: [5, 5] });
        expect(segments).toEqual([
            { x1: 0, y1: 0, x2: 100, y2: 0, lineWidth: 0.3, kind: 'ruling' },
            { x1: 0, y1: 5, x2: 100, y2: 5, lineWidth: 0.3, kind: 'ruling' },
            { x1: 0, y1: 10, x2: 100, y2: 10, lineWidth: 0.3, kind: 'ruling' },
            { x1: 0, y1: 0, x2: 0, y2: 10, lineWidth: 0.3, kind: 'border' },
            { x1: 100, y1: 0, x2: 100, y2: 10, lineWidth: 0.3, kind: 'border' }
        ]);
    });

    it('draws two lines for a single proportion', () => {
        const segments = renderLineGroup({ ...BASE, y: 3, distances: [10] });
        expect(segments.filter(s => s.kind === 'ruling').map(s => s.y1)).toEqual([3, 13]);
    });

    it('spreads forward slanted guides across the width', () => {
        const segments = renderLineGroup({ ...BASE, x: 5, y: 5, width: 190, distances: [], slant: { angle: 60, count: 10 } });
        const guides = segments.filter(s => s.kind === 'slant');
        const run = 10 / Math.sqrt(3);
        const step = (190 - run) / 9;

        expect(guides).toHaveLength(10);
        guides.forEach((guide, i) => {
            expect(guide.x1).toBeCloseTo(5 + step * i, 9);
            expect(guide.x2 - guide.x1).toBeCloseTo(run, 9);
            expect(guide.y1).toBe(15);
            expect(guide.y2).toBe(5);
        });
        // The last guide ends on the right edge
        expect(guides[9].x2).toBeCloseTo(195, 9);
    });

    it('mirrors guides for angles above 90 degrees', () => {
        const segments = renderLineGroup({ ...BASE, distances: [], slant: { angle: 120, count: 2 } });
        const run = 10 / Math.sqrt(3);
        const guides = segments.filter(s => s.kind === 'slant');

        expect(guides).toHaveLength(2);
        expect(guides[0].x1).toBeCloseTo(run, 9);
        expect(guides[0].y1).toBe(10);
        expect(guides[0].x2).toBe(0);
        expect(guides[0].y2).toBe(0);
        expect(guides[1].x1).toBeCloseTo(100, 9);
        expect(guides[1].x2).toBeCloseTo(100 - run, 9);
    });

    it('treats 90 degrees as upright forward guides', () => {
        const guides = renderLineGroup({ ...BASE, distances: [5, 5], slant: { angle: 90, count: 3 } })
            .filter(s => s.kind === 'slant');
        expect(guides.map(g => [g.x1, g.y1, g.x2, g.y2])).toEqual([
            [0, 10, 0, 0],
            [50, 10, 50, 0],
            [100, 10, 100, 0]
        ]);
    });

    it('places a single guide at the left edge', () => {
        const guides = renderLineGroup({ ...BASE, x: 12, distances: [], slant: { angle: 90, count: 1 } })
            .filter(s => s.kind === 'slant');
        expect(guides).toEqual([
            { x1: 12, y1: 10, x2: 12, y2: 0, lineWidth: 0.3, kind: 'slant' }
        ]);
    });

    it('draws no guides when the count is zero', () => {
        const segments = renderLineGroup({ ...BASE, distances: [], slant: { angle: 60, count: 0 } });
        expect(segments).toHaveLength(1);
    });

    it('emits guides after the ruling and borders', () => {
        const segments = renderLineGroup({ ...BASE, distances: [2, 1, 2], slant: { angle: 60, count: 4 } });
        expect(segments.map(s => s.kind)).toEqual([
            'ruling', 'ruling', 'ruling', 'ruling', 'border', 'border', 'slant', 'slant', 'slant', 'slant'
        ]);
    });
});
