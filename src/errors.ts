// Base class for every problem caused by the user's input
export class LineaturError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class UnknownPaperSizeError extends LineaturError {
    readonly paperSize: string;

    constructor(paperSize: string, known: readonly string[]) {
        super(`paper size "${paperSize}" is unknown (possible values: ${known.join(', ')})`);
        this.paperSize = paperSize;
    }
}

export class MalformedNumberListError extends LineaturError {
    readonly option: string;
    readonly value: string;

    constructor(option: string, value: string) {
        super(`wrong arguments for ${option}: ${value}`);
        this.option = option;
        this.value = value;
    }
}

export class WrongArityError extends LineaturError {
    readonly option: string;
    readonly value: string;

    constructor(option: string, value: string, allowed: readonly number[]) {
        super(`wrong number of arguments for ${option}: ${value} (expected ${allowed.join(' or ')} values)`);
        this.option = option;
        this.value = value;
    }
}

export class InvalidOptionValueError extends LineaturError {}

export class UnknownPresetError extends LineaturError {
    constructor(preset: string, known: readonly string[]) {
        super(`preset "${preset}" is unknown (possible values: ${known.join(', ')})`);
    }
}

// Raised by the geometry itself, e.g. when proportions add up to zero
export class InvalidInputError extends LineaturError {}
