import { type HashAlgorithm, type Hasher, LogLevel } from '@mdhash/types';
import { finalBlocks } from './codec.js';
import { type HashOptions, type ResolvedHashConfig, resolveConfig } from './config.js';
import { InvalidConfigurationError } from './errors.js';
import { assertSymbols, bitsToBytes, parseBitString, toBitString, toHex } from './symbols.js';

export interface FinalizeOptions {
    /** Length written into the length field. Defaults to the symbols consumed. */
    length?: number;
}

/** Pull-style chunk source: returns the next chunk, or `null` once exhausted. */
export type ChunkSupplier = () => Uint8Array | null;

// ---------------------------------------------------------------------------
// Streaming hasher
// ---------------------------------------------------------------------------

/**
 * Merkle–Damgård hasher: the state starts at the IV and every block is folded
 * in with `rounds` applications of the mixing step. The state after the
 * length-carrying final block is the digest.
 *
 * Usage:
 * ```ts
 * const hasher = new MerkleDamgardHasher({ unit: 'byte', digestWidth: 1, blockWidth: 2 });
 * hasher.update(chunk1);
 * hasher.update(chunk2);
 * const digest = hasher.finalize(); // 1 byte
 * ```
 */
export class MerkleDamgardHasher implements Hasher {
    readonly config: ResolvedHashConfig;
    private readonly snapshot: Uint8Array;
    private current: Uint8Array;
    private pending: Uint8Array;
    private pendingLength = 0;
    private consumedLength = 0;
    private folded = 0;
    private retired = false;
    private readonly tracing: boolean;

    /**
     * @throws InvalidConfigurationError when the options are unusable.
     */
    constructor(options: HashOptions) {
        this.config = resolveConfig(options);
        this.snapshot = this.config.iv.slice();
        this.current = this.snapshot.slice();
        this.pending = new Uint8Array(this.config.blockWidth);
        this.tracing = (this.config.logger.level ?? LogLevel.DEBUG) <= LogLevel.DEBUG;
    }

    /** Copy of the IV this run started from. */
    get initialState(): Uint8Array {
        return this.snapshot.slice();
    }

    /** Copy of the running state. */
    get state(): Uint8Array {
        return this.current.slice();
    }

    /** Symbols fed through `update()` since construction or the last reset. */
    get consumed(): number {
        return this.consumedLength;
    }

    /** Full blocks folded into the running state so far. */
    get blocksProcessed(): number {
        return this.folded;
    }

    /**
     * Feed symbols into the hasher. Completed blocks are folded immediately.
     * @throws InvalidInputError when a symbol is outside the unit's alphabet.
     * @returns `this` for chaining.
     */
    update(data: Uint8Array): this {
        this.assertUsable();
        assertSymbols(data, this.config.unit);

        const { blockWidth } = this.config;
        let offset = 0;
        while (offset < data.length) {
            const take = Math.min(blockWidth - this.pendingLength, data.length - offset);
            this.pending.set(data.subarray(offset, offset + take), this.pendingLength);
            this.pendingLength += take;
            offset += take;
            if (this.pendingLength === blockWidth) {
                this.current = this.fold(this.current, this.pending);
                this.folded++;
                this.pendingLength = 0;
            }
        }
        this.consumedLength += data.length;
        return this;
    }

    /**
     * Feed a `'0'`/`'1'` string. In byte mode the bits are packed into bytes first.
     */
    updateBits(text: string): this {
        const bits = parseBitString(text);
        return this.update(this.config.unit === 'bit' ? bits : bitsToBytes(bits));
    }

    /**
     * Close a copy of the run and return the digest.
     * The hasher is NOT consumed — `update()` may continue afterwards.
     */
    finalize(options: FinalizeOptions = {}): Uint8Array {
        this.assertUsable();
        const length = options.length ?? this.consumedLength;
        const tail = this.pending.subarray(0, this.pendingLength);

        let state = this.current;
        for (const block of finalBlocks(tail, length, this.config)) {
            state = this.fold(state, block);
        }

        if (this.tracing) {
            this.config.logger.log({
                level: LogLevel.DEBUG,
                message: `digest ${toBitString(state, this.config.unit)} after ${length} symbols`
            });
        }
        return state.slice();
    }

    /**
     * Restore the initial state and forget everything consumed.
     * @returns `this` for chaining.
     */
    reset(): this {
        this.assertUsable();
        this.current = this.snapshot.slice();
        this.pendingLength = 0;
        this.consumedLength = 0;
        this.folded = 0;
        return this;
    }

    /**
     * A fresh hasher with the same configuration, starting from this run's
     * captured initial state rather than its live state.
     */
    fork(): MerkleDamgardHasher {
        const { unit, digestWidth, blockWidth, rounds, rotation, lengthWidth, mixing, logger } = this.config;
        return new MerkleDamgardHasher({
            unit,
            digestWidth,
            blockWidth,
            rounds,
            lengthWidth,
            logger,
            ...(rotation === undefined ? { mixing } : { rotation }),
            iv: this.snapshot.slice()
        });
    }

    /**
     * Consumptive finalize — the hasher must not be used afterwards.
     *
     * - `digest()` → `Uint8Array` (raw symbols)
     * - `digest('hex')` → `string` (lowercase hex)
     */
    digest(): Uint8Array;
    digest(encoding: 'hex'): string;
    digest(encoding?: 'hex'): Uint8Array | string {
        const result = this.finalize();
        this.retired = true;
        if (encoding === 'hex') {
            return toHex(result, this.config.unit);
        }
        return result;
    }

    private fold(state: Uint8Array, block: Uint8Array): Uint8Array {
        const { mixing, rounds, unit, digestWidth, logger } = this.config;
        let next = state;
        for (let round = 0; round < rounds; round++) {
            next = mixing.mix(next, block);
            if (next.length !== digestWidth) {
                const message = `${mixing.name} returned ${next.length} symbols, expected ${digestWidth}`;
                throw new InvalidConfigurationError(`Invalid hash configuration: mixing ${message}`, [
                    { field: 'mixing', message, code: 'invalid_length' }
                ]);
            }
        }
        if (this.tracing) {
            logger.log({
                level: LogLevel.DEBUG,
                message: `block ${toBitString(block, unit)}: ${toBitString(state, unit)} -> ${toBitString(next, unit)}`
            });
        }
        return next;
    }

    private assertUsable(): void {
        if (this.retired) {
            throw new Error('Hasher has already been digested');
        }
    }
}

// ---------------------------------------------------------------------------
// One-shot helpers
// ---------------------------------------------------------------------------

/** Hash a complete message of symbols. */
export function hash(message: Uint8Array, options: HashOptions): Uint8Array {
    return new MerkleDamgardHasher(options).update(message).finalize();
}

/** Hash a complete message and render the digest as lowercase hex. */
export function hashHex(message: Uint8Array, options: HashOptions): string {
    return new MerkleDamgardHasher(options).update(message).digest('hex');
}

/** Hash a `'0'`/`'1'` string. */
export function hashBits(text: string, options: HashOptions): Uint8Array {
    return new MerkleDamgardHasher(options).updateBits(text).finalize();
}

/**
 * Hash chunks pulled from `next` until it returns `null`.
 */
export function hashChunks(next: ChunkSupplier, options: HashOptions): Uint8Array {
    const hasher = new MerkleDamgardHasher(options);
    for (let chunk = next(); chunk !== null; chunk = next()) {
        hasher.update(chunk);
    }
    return hasher.finalize();
}

/**
 * Hash an async iterable of chunks.
 */
export async function hashStream(source: AsyncIterable<Uint8Array>, options: HashOptions): Promise<Uint8Array> {
    const hasher = new MerkleDamgardHasher(options);
    for await (const chunk of source) {
        hasher.update(chunk);
    }
    return hasher.finalize();
}

// ---------------------------------------------------------------------------
// HashAlgorithm implementation
// ---------------------------------------------------------------------------

/**
 * Bind a configuration into a `HashAlgorithm`. The IV is resolved once here,
 * so a random IV is shared by every hasher the algorithm creates.
 */
export function createAlgorithm(options: HashOptions): HashAlgorithm {
    const prototype = new MerkleDamgardHasher(options);
    const { unit, digestWidth, blockWidth, mixing } = prototype.config;
    return {
        name: `merkle-damgard/${mixing.name}/${digestWidth}x${blockWidth}`,
        unit,
        digestLength: digestWidth,
        blockLength: blockWidth,
        hash: (data) => prototype.fork().update(data).finalize(),
        createHasher: () => prototype.fork(),
        stream: async (source) => {
            const hasher = prototype.fork();
            for await (const chunk of source) {
                hasher.update(chunk);
            }
            return hasher.finalize();
        }
    };
}
