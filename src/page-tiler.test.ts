import { describe, expect, it } from 'vitest';
import { tilePage } from './page-tiler.js';
import { InvalidInputError } from './errors.js';
import type { PageLayoutParameters } from './interfaces.js';

const A4_LAYOUT: PageLayoutParameters = {
    page: { width: 210, height: 297 },
    margins: { top: 5, right: 15, bottom: 15, left: 5 },
    lineHeight: 10,
    lineSpacing: 5,
    proportions: [1, 1, 1],
    lineWidth: 0.3
};

describe('tilePage', () => {
    it('fills an A4 page with whole line groups', () => {
        const groups = tilePage(A4_LAYOUT);

        expect(groups).toHaveLength(Math.floor((277 - 10) / 15) + 1);
        expect(groups).toHaveLength(18);
        expect(groups.map(g => g.y)).toEqual(Array.from({ length: 18 }, (_, i) => 5 + 15 * i));
        for (const group of groups) {
            expect(group.x).toBe(5);
            expect(group.y + 10).toBeLessThan(297 - 15);
        }
    });

    it('spans the printable width', () => {
        const [first] = tilePage(A4_LAYOUT);
        expect(first.segments[0]).toEqual({ x1: 5, y1: 5, x2: 195, y2: 5, lineWidth: 0.3, kind: 'ruling' });
    });

    it('skips a group whose bottom lands exactly on the bottom margin', () => {
        const groups = tilePage({
            ...A4_LAYOUT,
            page: { width: 100, height: 100 },
            margins: { top: 0, right: 0, bottom: 0, left: 0 },
            lineSpacing: 0
        });
        expect(groups).toHaveLength(9);
        expect(groups[8].y).toBe(80);
    });

    it('produces nothing when a single group does not fit', () => {
        const groups = tilePage({ ...A4_LAYOUT, page: { width: 210, height: 30 } });
        expect(groups).toEqual([]);
    });

    it('passes slant guides to every group', () => {
        const groups = tilePage({ ...A4_LAYOUT, slant: { angle: 60, count: 10 } });
        for (const group of groups) {
            expect(group.segments.filter(s => s.kind === 'slant')).toHaveLength(10);
        }
    });

    it('returns the same layout for the same inputs', () => {
        const params = { ...A4_LAYOUT, slant: { angle: 75, count: 10 } };
        expect(tilePage(params)).toEqual(tilePage(params));
    });

    it('rejects layouts that cannot advance down the page', () => {
        expect(() => tilePage({ ...A4_LAYOUT, lineHeight: 0 })).toThrow(InvalidInputError);
        expect(() => tilePage({ ...A4_LAYOUT, proportions: [0, 0, 0] })).toThrow(InvalidInputError);
    });
});
