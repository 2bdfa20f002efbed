import { InvalidInputError } from './errors.js';

/**
 * Turns relative line proportions (e.g. 2:3:2) into absolute distances that
 * add up to `lineHeight`. No proportions means a single baseline, so the
 * result is empty too.
 */
export function resolveProportions(proportions: readonly number[], lineHeight: number): number[] {
    if (proportions.length === 0) {
        return [];
    }

    const sum = proportions.reduce((total, p) => total + p, 0);
    if (sum === 0) {
        throw new InvalidInputError(`line proportions ${proportions.join(':')} add up to zero`);
    }

    return proportions.map(p => lineHeight * p / sum);
}
