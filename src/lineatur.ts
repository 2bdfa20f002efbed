import type { DrawingSurface, LineaturOptions } from './interfaces.js';
import { pageGeometry } from './paper-sizes.js';
import { tilePage } from './page-tiler.js';
import { drawLineGroups } from './pdf-surface.js';

export interface RenderSummary {
    pages: number;
    groupsPerPage: number;
}

// Every page carries the same layout, so it is computed once
export function renderLineatur(options: LineaturOptions, surface: DrawingSurface): RenderSummary {
    const groups = tilePage({
        page: pageGeometry(options.paper, options.orientation),
        margins: options.margins,
        lineHeight: options.lineHeight,
        lineSpacing: options.lineSpacing,
        proportions: options.proportions,
        slant: options.slant,
        lineWidth: options.lineWidth
    });

    for (let page = 0; page < options.pages; page++) {
        surface.addPage();
        drawLineGroups(surface, groups);
    }

    return { pages: options.pages, groupsPerPage: groups.length };
}
