import type { LineGroupParameters, Segment, SlantSpec } from './interfaces.js';

/**
 * Computes the segments of one line group: the ruled lines, the borders on
 * both sides and the slanted helper lines. Nothing is drawn here.
 */
export function renderLineGroup(params: LineGroupParameters): Segment[] {
    const { x, y, lineHeight, width, distances, lineWidth, slant } = params;
    const segments: Segment[] = [];

    const horizontal = (atY: number): Segment => ({
        x1: x, y1: atY, x2: x + width, y2: atY, lineWidth, kind: 'ruling'
    });
    const vertical = (atX: number): Segment => ({
        x1: atX, y1: y, x2: atX, y2: y + lineHeight, lineWidth, kind: 'border'
    });

    if (distances.length === 0) {
        // Just the baseline
        segments.push(horizontal(y + lineHeight));
    } else {
        let cursor = y;
        segments.push(horizontal(cursor));
        for (const d of distances) {
            cursor += d;
            segments.push(horizontal(cursor));
        }

        // Close the group on the left and right
        segments.push(vertical(x));
        segments.push(vertical(x + width));
    }

    if (slant) {
        segments.push(...slantedGuides(params, slant));
    }

    return segments;
}

function slantedGuides(params: LineGroupParameters, slant: SlantSpec): Segment[] {
    const { x, y, lineHeight, width, lineWidth } = params;
    const { angle, count } = slant;
    const guides: Segment[] = [];
    if (count < 1) {
        return guides;
    }

    // Horizontal run of one guide across the full line height
    const theta = Math.PI * (90 - angle) / 180;
    const run = Math.abs(lineHeight * Math.tan(theta));

    // A single guide starts at the left edge
    const step = count > 1 ? (width - run) / (count - 1) : 0;

    for (let i = 0; i < count; i++) {
        const startX = x + step * i;
        if (angle <= 90) {
            guides.push({
                x1: startX, y1: y + lineHeight, x2: startX + run, y2: y, lineWidth, kind: 'slant'
            });
        } else {
            guides.push({
                x1: startX + run, y1: y + lineHeight, x2: startX, y2: y, lineWidth, kind: 'slant'
            });
        }
    }

    return guides;
}
