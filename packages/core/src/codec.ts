import type { SymbolUnit } from '@mdhash/types';
import { InvalidInputError } from './errors.js';

/**
 * How a message is cut into blocks and how its length is recorded.
 */
export interface BlockLayout {
    readonly unit: SymbolUnit;
    /** Block width B, in symbols. */
    readonly blockWidth: number;
    /**
     * Width of the length field, in symbols. Byte mode defaults to a single
     * byte; bit mode defaults to the minimal binary representation.
     */
    readonly lengthWidth?: number | undefined;
}

// ---------------------------------------------------------------------------
// Length field
// ---------------------------------------------------------------------------

/**
 * Encode a message length as symbols of `unit`.
 *
 * Values that do not fit in `lengthWidth` keep only their low-order symbols.
 * `length` must be a non-negative safe integer.
 */
export function encodeLength(length: number, unit: SymbolUnit, lengthWidth?: number): Uint8Array {
    if (!Number.isSafeInteger(length) || length < 0) {
        throw new InvalidInputError(`Message length must be a non-negative integer, got ${length}`);
    }

    if (unit === 'byte') {
        const width = lengthWidth ?? 1;
        const out = new Uint8Array(width);
        let rest = length;
        for (let i = width - 1; i >= 0 && rest > 0; i--) {
            out[i] = rest % 256;
            rest = Math.floor(rest / 256);
        }
        return out;
    }

    let digits = length.toString(2);
    if (lengthWidth !== undefined) {
        digits = digits.length > lengthWidth ? digits.slice(-lengthWidth) : digits.padStart(lengthWidth, '0');
    }
    return Uint8Array.from(digits, (d) => (d === '1' ? 1 : 0));
}

/**
 * Read a dedicated length block back as an unsigned big-endian integer.
 */
export function decodeLengthBlock(block: Uint8Array, unit: SymbolUnit): number {
    const radix = unit === 'bit' ? 2 : 256;
    return block.reduce((acc, symbol) => acc * radix + symbol, 0);
}

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

/** The encoding right-aligned in a zeroed block; overlong encodings keep their low end. */
function lengthBlock(encoding: Uint8Array, blockWidth: number): Uint8Array {
    const block = new Uint8Array(blockWidth);
    const kept = encoding.length > blockWidth ? encoding.subarray(encoding.length - blockWidth) : encoding;
    block.set(kept, blockWidth - kept.length);
    return block;
}

/**
 * Blocks that close a message of `length` symbols whose unconsumed tail is
 * `tail` (`tail.length < blockWidth`; empty when the last chunk was full).
 */
export function finalBlocks(tail: Uint8Array, length: number, layout: BlockLayout): Uint8Array[] {
    const { blockWidth, unit, lengthWidth } = layout;
    const encoding = encodeLength(length, unit, lengthWidth);

    if (tail.length === 0) {
        return [lengthBlock(encoding, blockWidth)];
    }

    const last = new Uint8Array(blockWidth);
    last.set(tail);

    if (encoding.length > blockWidth - tail.length) {
        return [last, lengthBlock(encoding, blockWidth)];
    }

    last.set(encoding, tail.length);
    return [last];
}

/**
 * Lazily yield every block of `message`: full chunks in order, then the
 * length-carrying final block(s). An empty message yields one block.
 */
export function* splitBlocks(message: Uint8Array, layout: BlockLayout): Generator<Uint8Array, void, undefined> {
    const { blockWidth } = layout;
    const full = message.length - (message.length % blockWidth);
    for (let offset = 0; offset < full; offset += blockWidth) {
        yield message.slice(offset, offset + blockWidth);
    }
    yield* finalBlocks(message.subarray(full), message.length, layout);
}

/** Number of blocks `splitBlocks` yields for a message of `length` symbols. */
export function countBlocks(length: number, layout: BlockLayout): number {
    const { blockWidth, unit, lengthWidth } = layout;
    const tailLength = length % blockWidth;
    const fullBlocks = (length - tailLength) / blockWidth;
    if (tailLength === 0) {
        return fullBlocks + 1;
    }
    const encodingLength = encodeLength(length, unit, lengthWidth).length;
    return fullBlocks + (encodingLength > blockWidth - tailLength ? 2 : 1);
}
