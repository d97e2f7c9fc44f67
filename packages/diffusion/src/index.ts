import {
    type HashOptions,
    MerkleDamgardHasher,
    parseBitString,
    type SymbolUnit,
    toBitString
} from '@mdhash/core';

/** A message, digest or bit string to compare. */
export type BitSource = Uint8Array | string;

export interface DiffusionOptions {
    /** How `Uint8Array` inputs are read. Strings are always bit strings. */
    unit?: SymbolUnit;
}

export interface DiffusionReport {
    readonly totalBits: number;
    readonly differentBits: number;
    /** `100 * differentBits / totalBits`, or 0 when nothing was compared. */
    readonly percentage: number;
    /** First input, right-padded with zeros to `totalBits`. */
    readonly left: string;
    readonly right: string;
    /** `^` under every differing bit, a space elsewhere. */
    readonly markers: string;
}

// ---------------------------------------------------------------------------
// Measurement
// ---------------------------------------------------------------------------

function render(source: BitSource, unit: SymbolUnit): string {
    if (typeof source === 'string') {
        return toBitString(parseBitString(source), 'bit');
    }
    return toBitString(source, unit);
}

/**
 * Compare two inputs bit by bit. The shorter rendering is padded with zero
 * bits on the right so inputs of any length can be compared.
 * @throws InvalidInputError when a string input is not a bit string.
 */
export function measureDiffusion(a: BitSource, b: BitSource, options: DiffusionOptions = {}): DiffusionReport {
    const unit = options.unit ?? 'byte';
    const first = render(a, unit);
    const second = render(b, unit);
    const totalBits = Math.max(first.length, second.length);
    const left = first.padEnd(totalBits, '0');
    const right = second.padEnd(totalBits, '0');

    let differentBits = 0;
    let markers = '';
    for (let i = 0; i < totalBits; i++) {
        const differs = left[i] !== right[i];
        if (differs) {
            differentBits++;
        }
        markers += differs ? '^' : ' ';
    }

    const percentage = totalBits === 0 ? 0 : (differentBits / totalBits) * 100;
    return { totalBits, differentBits, percentage, left, right, markers };
}

export interface FormatOptions {
    /** Append the aligned bit-by-bit visualization. */
    visual?: boolean;
}

/**
 * Render a report as text lines joined with `\n`.
 */
export function formatDiffusionReport(report: DiffusionReport, options: FormatOptions = {}): string {
    const lines = [
        `Total bits compared: ${report.totalBits}`,
        `Different bits: ${report.differentBits}`,
        `Diffusion percentage: ${report.percentage.toFixed(2)}%`
    ];
    if (options.visual) {
        lines.push(
            'Bit differences (^ marks different bits):',
            `1: ${report.left}`,
            `2: ${report.right}`,
            `   ${report.markers}`
        );
    }
    return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Experiments
// ---------------------------------------------------------------------------

export interface MessageFlipResult {
    readonly original: Uint8Array;
    readonly modified: Uint8Array;
    readonly originalDigest: Uint8Array;
    readonly modifiedDigest: Uint8Array;
    readonly input: DiffusionReport;
    readonly output: DiffusionReport;
}

/**
 * Flip bit `bitIndex` of `message` (counted MSB-first across bytes in byte
 * mode) and hash both versions from the same IV.
 */
export function messageFlipExperiment(message: Uint8Array, options: HashOptions, bitIndex: number): MessageFlipResult {
    const hasher = new MerkleDamgardHasher(options);
    const { unit } = hasher.config;
    const width = unit === 'bit' ? message.length : message.length * 8;
    if (!Number.isInteger(bitIndex) || bitIndex < 0 || bitIndex >= width) {
        throw new RangeError(`Bit index ${bitIndex} is outside a ${width}-bit message`);
    }

    const modified = message.slice();
    if (unit === 'bit') {
        modified[bitIndex] ^= 1;
    } else {
        modified[bitIndex >> 3] ^= 0x80 >> (bitIndex & 7);
    }

    const originalDigest = hasher.fork().update(message).finalize();
    const modifiedDigest = hasher.fork().update(modified).finalize();
    return {
        original: message,
        modified,
        originalDigest,
        modifiedDigest,
        input: measureDiffusion(message, modified, { unit }),
        output: measureDiffusion(originalDigest, modifiedDigest, { unit })
    };
}

export interface LengthFlipResult {
    readonly length: number;
    readonly modifiedLength: number;
    readonly originalDigest: Uint8Array;
    readonly modifiedDigest: Uint8Array;
    readonly output: DiffusionReport;
}

/**
 * Hash `message`, then fork from the captured initial state and hash it again
 * with bit `bit` of the length field flipped. Only the final block differs.
 */
export function lengthFlipExperiment(message: Uint8Array, options: HashOptions, bit = 0): LengthFlipResult {
    if (!Number.isInteger(bit) || bit < 0 || bit >= 53) {
        throw new RangeError(`Length bit ${bit} is outside 0..52`);
    }

    const hasher = new MerkleDamgardHasher(options).update(message);
    const length = hasher.consumed;
    const weight = 2 ** bit;
    const modifiedLength = Math.floor(length / weight) % 2 === 0 ? length + weight : length - weight;
    const originalDigest = hasher.finalize();
    const modifiedDigest = hasher.fork().update(message).finalize({ length: modifiedLength });
    return {
        length,
        modifiedLength,
        originalDigest,
        modifiedDigest,
        output: measureDiffusion(originalDigest, modifiedDigest, { unit: hasher.config.unit })
    };
}
