import type { MixingStrategy, SymbolUnit } from '@mdhash/types';

/** Default right-rotation applied to each state byte. */
export const DEFAULT_ROTATION = 3;

/**
 * Rotate the bits of an 8-bit value to the right. `positions` is taken mod 8.
 */
export function rotateRight8(value: number, positions: number): number {
    const shift = positions % 8;
    const byte = value & 0xff;
    return ((byte >>> shift) | (byte << (8 - shift))) & 0xff;
}

/**
 * Byte-oriented compression: rotate the working state byte, XOR in the block
 * byte, then add the step's original state byte modulo 256. When the block is
 * wider than the state, block byte `i` lands on position `i mod W`.
 */
export function rotateXorAddMixing(rotation: number = DEFAULT_ROTATION): MixingStrategy {
    return {
        name: `rotate-xor-add(${rotation})`,
        unit: 'byte',
        mix(state, block) {
            const next = state.slice();
            for (let i = 0; i < block.length; i++) {
                const position = i % state.length;
                const rotated = rotateRight8(next[position], rotation);
                next[position] = ((rotated ^ block[i]) + state[position]) & 0xff;
            }
            return next;
        }
    };
}

/**
 * Bit-oriented compression: `next[k mod W] = state[k mod W] XOR block[k]`.
 * Every write reads the step's original state, so the last block bit mapped
 * to a position decides it.
 */
export function xorMixing(): MixingStrategy {
    return {
        name: 'xor',
        unit: 'bit',
        mix(state, block) {
            const next = state.slice();
            for (let k = 0; k < block.length; k++) {
                const position = k % state.length;
                next[position] = state[position] ^ block[k];
            }
            return next;
        }
    };
}

/** The strategy a configuration gets when it names none. */
export function defaultMixing(unit: SymbolUnit, rotation: number = DEFAULT_ROTATION): MixingStrategy {
    return unit === 'bit' ? xorMixing() : rotateXorAddMixing(rotation);
}
