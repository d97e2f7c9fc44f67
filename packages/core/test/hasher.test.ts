import type { LogEntry, Logger, MixingStrategy } from '@mdhash/types';
import { describe, expect, it, vi } from 'vitest';
import {
    bitsToBytes,
    createAlgorithm,
    hash,
    hashBits,
    hashChunks,
    hashHex,
    hashStream,
    InvalidConfigurationError,
    InvalidInputError,
    LogLevel,
    MerkleDamgardHasher,
    PRESETS,
    parseBitString,
    rotateXorAddMixing
} from '../src/index.js';

const MESSAGE = '01111010011111110100101111111011';

class RecordingLogger implements Logger {
    readonly entries: LogEntry[] = [];

    log(entry: LogEntry): void {
        this.entries.push(entry);
    }
}

// ---------------------------------------------------------------------------
// Reference scenarios
// ---------------------------------------------------------------------------

describe('bit-oriented construction', () => {
    it('hashes the reference message to 11001110', () => {
        const digest = hashBits(MESSAGE, { ...PRESETS.bits, iv: parseBitString('01101010') });
        expect(digest.join('')).toBe('11001110');
    });

    it('uses 01101010 as the fixed 8-bit IV', () => {
        expect(hashBits(MESSAGE, PRESETS.bits).join('')).toBe('11001110');
    });

    it('returns the IV for an empty message under xor mixing', () => {
        expect(hashBits('', PRESETS.bits).join('')).toBe('01101010');
    });

    it('renders bit digests as packed hex', () => {
        expect(new MerkleDamgardHasher(PRESETS.bits).updateBits(MESSAGE).digest('hex')).toBe('ce');
    });
});

describe('byte-oriented construction', () => {
    it('hashes an empty message as a single zero block', () => {
        const mixing = rotateXorAddMixing();
        let expected: Uint8Array = Uint8Array.of(0x6a);
        for (let round = 0; round < 3; round++) {
            expected = mixing.mix(expected, Uint8Array.of(0, 0));
        }
        const digest = hash(new Uint8Array(0), PRESETS.bytes);
        expect(Array.from(digest)).toEqual(Array.from(expected));
        expect(Array.from(digest)).toEqual([66]);
    });

    it('packs a bit string into bytes before hashing', () => {
        const digest = new MerkleDamgardHasher(PRESETS.bytes).updateBits(MESSAGE).finalize();
        expect(Array.from(digest)).toEqual([0x98]);
    });

    it('applies the configured number of rounds', () => {
        expect(Array.from(hash(new Uint8Array(0), { ...PRESETS.bytes, rounds: 1 }))).toEqual([96]);
    });

    it('applies the configured rotation', () => {
        expect(Array.from(hash(new Uint8Array(0), { ...PRESETS.bytes, rounds: 1, rotation: 0 }))).toEqual([62]);
    });

    it('hashes from an explicit IV', () => {
        const digest = hash(new TextEncoder().encode('abcdefg'), {
            digestWidth: 2,
            blockWidth: 2,
            iv: Uint8Array.of(1, 2)
        });
        expect(Array.from(digest)).toEqual([14, 226]);
    });

    it('renders byte digests as hex', () => {
        expect(hashHex(new TextEncoder().encode('abcdefg'), { digestWidth: 4, blockWidth: 4 })).toBe('c9ea9531');
    });
});

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

describe('digest properties', () => {
    it('is deterministic', () => {
        const message = new TextEncoder().encode('determinism');
        expect(Array.from(hash(message, PRESETS.file))).toEqual(Array.from(hash(message, PRESETS.file)));
    });

    it('always has the digest width', () => {
        for (let length = 0; length < 45; length++) {
            const message = new Uint8Array(length).fill(length);
            expect(hash(message, PRESETS.bytes)).toHaveLength(1);
            expect(hash(message, { digestWidth: 3, blockWidth: 5 })).toHaveLength(3);
            expect(hash(message, { digestWidth: 6, blockWidth: 2 })).toHaveLength(6);
        }
    });
});

// ---------------------------------------------------------------------------
// Streaming hasher
// ---------------------------------------------------------------------------

describe('MerkleDamgardHasher streaming', () => {
    it('matches one-shot for uneven chunks', () => {
        const message = new TextEncoder().encode('hello streaming world');
        const hasher = new MerkleDamgardHasher(PRESETS.file);
        hasher.update(message.subarray(0, 3)).update(message.subarray(3, 17)).update(message.subarray(17));
        expect(Array.from(hasher.finalize())).toEqual(Array.from(hash(message, PRESETS.file)));
    });

    it('folds only complete blocks while updating', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bits).updateBits(MESSAGE.slice(0, 20));
        expect(hasher.blocksProcessed).toBe(1);
        expect(hasher.consumed).toBe(20);
        hasher.updateBits(MESSAGE.slice(20));
        expect(hasher.blocksProcessed).toBe(2);
        expect(hasher.consumed).toBe(32);
    });

    it('finalize does not consume state', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bits);
        hasher.updateBits(MESSAGE.slice(0, 10));
        hasher.finalize();
        hasher.updateBits(MESSAGE.slice(10));
        expect(hasher.finalize().join('')).toBe('11001110');
        expect(hasher.finalize().join('')).toBe('11001110');
    });

    it('writes an overridden length field', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bits).updateBits(MESSAGE);
        expect(hasher.finalize({ length: 33 }).join('')).toBe('11001111');
    });

    it('rejects an overridden length that is not a non-negative integer', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bits).updateBits(MESSAGE);
        expect(() => hasher.finalize({ length: -1 })).toThrow(InvalidInputError);
        expect(() => hasher.finalize({ length: 1.5 })).toThrow(InvalidInputError);
        expect(() => hasher.finalize({ length: NaN })).toThrow(InvalidInputError);
        expect(hasher.finalize().join('')).toBe('11001110');
    });

    it('rejects a mixing strategy that changes the state width', () => {
        const grow: MixingStrategy = { name: 'grow', unit: 'byte', mix: (state) => Uint8Array.from([...state, 0]) };
        const hasher = new MerkleDamgardHasher({ digestWidth: 1, blockWidth: 2, mixing: grow });
        expect(() => hasher.finalize()).toThrow(InvalidConfigurationError);
        expect(() => hasher.update(new Uint8Array(2))).toThrow(
            'Invalid hash configuration: mixing grow returned 2 symbols, expected 1'
        );
    });

    it('reset restores the initial state', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bits);
        hasher.updateBits('1111000011110000');
        hasher.reset();
        expect(hasher.state.join('')).toBe('01101010');
        expect(hasher.consumed).toBe(0);
        hasher.updateBits(MESSAGE);
        expect(hasher.finalize().join('')).toBe('11001110');
    });

    it('rejects non-bit symbols without changing state', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bits);
        expect(() => hasher.update(Uint8Array.of(0, 1, 2))).toThrow(InvalidInputError);
        expect(hasher.consumed).toBe(0);
        expect(() => hasher.updateBits('01x')).toThrow(InvalidInputError);
    });

    it('throws after digest', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bytes);
        hasher.digest();
        expect(() => hasher.update(new Uint8Array(1))).toThrow('Hasher has already been digested');
        expect(() => hasher.finalize()).toThrow('Hasher has already been digested');
        expect(() => hasher.digest()).toThrow('Hasher has already been digested');
    });

    it('exposes copies of its state', () => {
        const hasher = new MerkleDamgardHasher(PRESETS.bytes);
        hasher.initialState[0] = 0;
        hasher.state[0] = 0;
        expect(Array.from(hasher.initialState)).toEqual([0x6a]);
        expect(Array.from(hasher.state)).toEqual([0x6a]);
    });
});

describe('MerkleDamgardHasher.fork', () => {
    it('starts from the captured initial state, not the live one', () => {
        let calls = 0;
        const hasher = new MerkleDamgardHasher({
            ...PRESETS.file,
            ivSource: 'random',
            random: (size) => new Uint8Array(size).fill(++calls)
        });
        hasher.update(new TextEncoder().encode('some content that moves the state'));

        const fork = hasher.fork();
        expect(calls).toBe(1);
        expect(Array.from(fork.state)).toEqual(Array.from(hasher.initialState));
        expect(Array.from(fork.initialState)).toEqual(new Array(20).fill(1));
        expect(fork.consumed).toBe(0);
    });

    it('reproduces the same digest for the same message', () => {
        const message = new TextEncoder().encode('fork me');
        const hasher = new MerkleDamgardHasher({ ...PRESETS.file, ivSource: 'random' }).update(message);
        expect(Array.from(hasher.fork().update(message).finalize())).toEqual(Array.from(hasher.finalize()));
    });

    it('keeps a custom rotation', () => {
        const hasher = new MerkleDamgardHasher({ ...PRESETS.bytes, rounds: 1, rotation: 0 });
        const fork = hasher.fork();
        expect(fork.config.rotation).toBe(0);
        expect(Array.from(fork.finalize())).toEqual([62]);
    });

    it('keeps a custom mixing strategy', () => {
        const mixing = rotateXorAddMixing(0);
        const fork = new MerkleDamgardHasher({ ...PRESETS.bytes, rounds: 1, mixing }).fork();
        expect(fork.config.mixing).toBe(mixing);
        expect(fork.config.rotation).toBeUndefined();
        expect(Array.from(fork.finalize())).toEqual([62]);
    });
});

describe('logging', () => {
    it('logs every folded block and the digest at debug level', () => {
        const logger = new RecordingLogger();
        hashBits(MESSAGE, { ...PRESETS.bits, logger });
        expect(logger.entries).toHaveLength(4);
        expect(logger.entries.every((entry) => entry.level === LogLevel.DEBUG)).toBe(true);
        expect(logger.entries[0].message).toBe('block 0111101001111111: 01101010 -> 00010101');
        expect(logger.entries[3].message).toBe('digest 11001110 after 32 symbols');
    });

    it('skips debug messages when the logger records nothing below info', () => {
        const logger = { level: LogLevel.INFO, log: vi.fn() };
        const digest = hashBits(MESSAGE, { ...PRESETS.bits, logger });
        expect(logger.log).not.toHaveBeenCalled();
        expect(digest.join('')).toBe('11001110');
    });
});

// ---------------------------------------------------------------------------
// One-shot helpers
// ---------------------------------------------------------------------------

describe('hashChunks', () => {
    it('pulls chunks until null', () => {
        const chunks = [Uint8Array.of(0x7a), Uint8Array.of(0x7f, 0x4b), Uint8Array.of(0xfb)];
        let index = 0;
        const digest = hashChunks(() => chunks[index++] ?? null, PRESETS.bytes);
        expect(Array.from(digest)).toEqual([0x98]);
    });

    it('handles an immediately exhausted supplier', () => {
        expect(Array.from(hashChunks(() => null, PRESETS.bytes))).toEqual([66]);
    });
});

describe('hashStream', () => {
    it('hashes an async iterable', async () => {
        async function* gen() {
            yield Uint8Array.of(0x7a, 0x7f);
            yield Uint8Array.of(0x4b, 0xfb);
        }
        const digest = await hashStream(gen(), PRESETS.bytes);
        expect(Array.from(digest)).toEqual([0x98]);
    });
});

describe('createAlgorithm', () => {
    it('has correct metadata', () => {
        const algorithm = createAlgorithm(PRESETS.bytes);
        expect(algorithm.name).toBe('merkle-damgard/rotate-xor-add(3)/1x2');
        expect(algorithm.unit).toBe('byte');
        expect(algorithm.digestLength).toBe(1);
        expect(algorithm.blockLength).toBe(2);
    });

    it('hash matches hash()', () => {
        const message = bitsToBytes(parseBitString(MESSAGE));
        expect(Array.from(createAlgorithm(PRESETS.bytes).hash(message))).toEqual(
            Array.from(hash(message, PRESETS.bytes))
        );
    });

    it('shares one random IV across hashers', () => {
        const algorithm = createAlgorithm({ ...PRESETS.file, ivSource: 'random' });
        const message = new TextEncoder().encode('shared iv');
        const first = algorithm.createHasher().update(message).finalize();
        expect(Array.from(algorithm.hash(message))).toEqual(Array.from(first));
    });

    it('stream matches hash', async () => {
        const algorithm = createAlgorithm(PRESETS.bits);
        async function* gen() {
            yield parseBitString(MESSAGE);
        }
        expect((await algorithm.stream(gen())).join('')).toBe('11001110');
    });
});
