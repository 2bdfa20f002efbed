import type { SlantSpec } from './interfaces.js';
import { UnknownPresetError } from './errors.js';

// Traditional lineatur proportions, see https://de.wikipedia.org/wiki/Lineatur
export interface Preset {
    name: string;
    script: string;
    proportions: number[];
    slant?: SlantSpec;
}

const PRESETS: readonly Preset[] = [
    { name: 'kurrent', script: 'Deutsche Kurrentschrift', proportions: [2, 1, 2], slant: { angle: 60, count: 10 } },
    { name: 'suetterlin', script: 'Sütterlinschrift', proportions: [1, 1, 1] },
    { name: 'offenbach', script: 'Offenbacher Schrift', proportions: [2, 3, 2], slant: { angle: 75, count: 10 } },
    { name: 'latin', script: 'Offenbacher Schrift, Lateinische Ausgangsschrift', proportions: [3, 4, 3] },
    { name: 'copperplate', script: 'Copperplate', proportions: [3, 2, 3], slant: { angle: 52, count: 10 } },
];

export function listPresets(): readonly Preset[] {
    return PRESETS;
}

export function lookupPreset(name: string): Preset {
    const preset = PRESETS.find(p => p.name === name);
    if (!preset) {
        throw new UnknownPresetError(name, PRESETS.map(p => p.name));
    }
    return {
        ...preset,
        proportions: [...preset.proportions],
        slant: preset.slant ? { ...preset.slant } : undefined
    };
}
