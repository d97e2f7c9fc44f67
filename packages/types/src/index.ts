/**
 * The alphabet a run works in. In `'bit'` mode every symbol is 0 or 1,
 * in `'byte'` mode every symbol is an unsigned 8-bit value.
 */
export type SymbolUnit = 'bit' | 'byte';

/**
 * An incremental Merkle–Damgård hasher. Messages, blocks, state and digest
 * are all `Uint8Array`s of symbols of the configured unit.
 */
export interface Hasher {
    /** Feed symbols into the hasher. Returns `this` for chaining. */
    update(data: Uint8Array): this;
    /** Close a copy of the run and return the digest. The hasher stays usable. */
    finalize(): Uint8Array;
    /** Restore the captured initial state and forget everything consumed. */
    reset(): this;

    /**
     * Consumptive finalize — returns the digest and retires the hasher.
     *
     * - `digest()` → `Uint8Array` (raw symbols)
     * - `digest('hex')` → `string` (lowercase hex)
     */
    digest(): Uint8Array;
    digest(encoding: 'hex'): string;
}

/**
 * A configured hash construction that provides both one-shot and streaming APIs.
 */
export interface HashAlgorithm {
    readonly name: string;
    readonly unit: SymbolUnit;
    /** The digest width in symbols. */
    readonly digestLength: number;
    /** The block width in symbols. */
    readonly blockLength: number;
    /** Compute a digest in one shot. */
    hash(data: Uint8Array): Uint8Array;
    /** Create an incremental hasher starting from this algorithm's IV. */
    createHasher(): Hasher;
    /** Hash an async iterable of chunks. */
    stream(source: AsyncIterable<Uint8Array>): Promise<Uint8Array>;
}

/**
 * The per-block compression function: combines the current state with one
 * block into a new state of the same width.
 */
export interface MixingStrategy {
    readonly name: string;
    readonly unit: SymbolUnit;
    /** Must not mutate its arguments and must return exactly `state.length` symbols. */
    mix(state: Uint8Array, block: Uint8Array): Uint8Array;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevel = {
    DEBUG: 1,
    INFO: 2,
    WARN: 3,
    ERROR: 4,
    QUIET: 5
} as const;

export type LogEntry =
    | { level: typeof LogLevel.DEBUG; message: string }
    | { level: typeof LogLevel.INFO; message: string }
    | { level: typeof LogLevel.WARN; message: string; reason?: unknown }
    | { level: typeof LogLevel.ERROR; message: string; reason?: unknown };

/** Sink for diagnostic messages emitted while hashing. */
export interface Logger {
    /** Lowest level this logger records. Absent means every level. */
    readonly level?: LogLevel;
    log(entry: LogEntry): void;
}
