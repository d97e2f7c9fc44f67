import type { SymbolUnit } from '@mdhash/types';
import { InvalidInputError } from './errors.js';

/** Largest symbol value representable in `unit`. */
export function maxSymbol(unit: SymbolUnit): number {
    return unit === 'bit' ? 1 : 0xff;
}

/**
 * Throws `InvalidInputError` if any element lies outside the unit's alphabet.
 */
export function assertSymbols(symbols: Uint8Array, unit: SymbolUnit): void {
    if (unit === 'byte') {
        return;
    }
    const index = symbols.findIndex((s) => s > 1);
    if (index !== -1) {
        throw new InvalidInputError(`Expected a bit (0 or 1) at index ${index}, got ${symbols[index]}`);
    }
}

/**
 * Parse a string over `{'0', '1'}` into bit symbols.
 */
export function parseBitString(text: string): Uint8Array {
    const bits = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === '0') {
            bits[i] = 0;
        } else if (char === '1') {
            bits[i] = 1;
        } else {
            throw new InvalidInputError(`Invalid bit character ${JSON.stringify(char)} at index ${i}`);
        }
    }
    return bits;
}

/**
 * Pack bits MSB-first. A trailing partial byte is padded with zero bits on the right.
 */
export function bitsToBytes(bits: Uint8Array): Uint8Array {
    const bytes = new Uint8Array(Math.ceil(bits.length / 8));
    bits.forEach((bit, i) => {
        if (bit === 1) {
            bytes[i >> 3] |= 0x80 >> (i & 7);
        }
    });
    return bytes;
}

/** Expand every byte into 8 bits, MSB first. */
export function bytesToBits(bytes: Uint8Array): Uint8Array {
    const bits = new Uint8Array(bytes.length * 8);
    bytes.forEach((byte, i) => {
        for (let j = 0; j < 8; j++) {
            bits[i * 8 + j] = (byte >> (7 - j)) & 1;
        }
    });
    return bits;
}

/** Binary rendering; bytes render as 8 zero-padded bits each. */
export function toBitString(symbols: Uint8Array, unit: SymbolUnit): string {
    if (unit === 'bit') {
        return symbols.join('');
    }
    return Array.from(symbols)
        .map((b) => b.toString(2).padStart(8, '0'))
        .join('');
}

/** Lowercase hex, two characters per byte. Bit symbols are packed first. */
export function toHex(symbols: Uint8Array, unit: SymbolUnit = 'byte'): string {
    const bytes = unit === 'bit' ? bitsToBytes(symbols) : symbols;
    return Array.from(bytes)
        .map((b) => b.toString(16).padStart(2, '0'))
        .join('');
}

export function fromHex(hex: string): Uint8Array {
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new InvalidInputError(`Invalid hex string ${JSON.stringify(hex)}`);
    }
    const bytes = new Uint8Array(hex.length / 2);
    for (let i = 0; i < hex.length; i += 2) {
        bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16);
    }
    return bytes;
}
