import type { LineGroup, PageLayoutParameters } from './interfaces.js';
import { resolveProportions } from './proportions.js';
import { renderLineGroup } from './line-group.js';
import { InvalidInputError } from './errors.js';

/**
 * Repeats line groups down the printable area of a page. A group is only
 * placed when its bottom edge stays strictly above the bottom margin.
 */
export function tilePage(params: PageLayoutParameters): LineGroup[] {
    const { page, margins, lineHeight, lineSpacing, proportions, slant, lineWidth } = params;

    if (!(lineHeight > 0) || lineSpacing < 0) {
        throw new InvalidInputError(`cannot tile lines of height ${lineHeight} with spacing ${lineSpacing}`);
    }

    const distances = resolveProportions(proportions, lineHeight);
    const width = page.width - margins.right - margins.left;
    const bottom = page.height - margins.bottom;
    const x = margins.left;

    const groups: LineGroup[] = [];
    for (let y = margins.top; y + lineHeight < bottom; y += lineHeight + lineSpacing) {
        groups.push({
            x,
            y,
            segments: renderLineGroup({ x, y, lineHeight, width, distances, lineWidth, slant })
        });
    }
    return groups;
}
