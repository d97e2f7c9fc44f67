import { randomBytes } from 'node:crypto';
import type { Logger, MixingStrategy, SymbolUnit } from '@mdhash/types';
import { z } from 'zod';
import { InvalidConfigurationError, type ValidationIssue } from './errors.js';
import { VoidLogger } from './logger.js';
import { DEFAULT_ROTATION, defaultMixing } from './mixing.js';
import { bytesToBits, fromHex, maxSymbol } from './symbols.js';

export const DEFAULT_ROUNDS = 3;

export const HashConfigSchema = z.object({
    unit: z.enum(['bit', 'byte']).default('byte'),
    digestWidth: z.number().int().min(1),
    blockWidth: z.number().int().min(1),
    rounds: z.number().int().min(1).default(DEFAULT_ROUNDS),
    rotation: z.number().int().min(0).default(DEFAULT_ROTATION),
    lengthWidth: z.number().int().min(1).optional(),
    ivSource: z.enum(['fixed', 'random']).default('fixed'),
    iv: z.custom<Uint8Array>((value) => value instanceof Uint8Array, 'Expected a Uint8Array').optional()
});

/** Supplies `size` random bytes. */
export type RandomSource = (size: number) => Uint8Array;

/**
 * Options accepted by every hashing entry point. `rotation` only configures
 * the default byte strategy: it is rejected in bit mode and next to a custom
 * `mixing`.
 */
export type HashOptions = z.input<typeof HashConfigSchema> & {
    /** Randomness for `ivSource: 'random'`. Defaults to `node:crypto`. */
    random?: RandomSource;
    /** Overrides the unit's default compression step. */
    mixing?: MixingStrategy;
    logger?: Logger;
};

export interface ResolvedHashConfig {
    readonly unit: SymbolUnit;
    readonly digestWidth: number;
    readonly blockWidth: number;
    readonly rounds: number;
    /** Rotation of the default byte strategy; `undefined` when it does not apply. */
    readonly rotation: number | undefined;
    readonly lengthWidth: number | undefined;
    readonly iv: Uint8Array;
    readonly mixing: MixingStrategy;
    readonly logger: Logger;
}

export const PRESETS = {
    /** 8-bit digest over 16-bit blocks, XOR mixing. */
    bits: { unit: 'bit', digestWidth: 8, blockWidth: 16 },
    /** 1-byte digest over 2-byte blocks with a 1-byte length field. */
    bytes: { unit: 'byte', digestWidth: 1, blockWidth: 2 },
    /** 160-bit digest over 160-bit blocks with a 64-bit length field. */
    file: { unit: 'byte', digestWidth: 20, blockWidth: 20, lengthWidth: 8 }
} as const satisfies Record<string, HashOptions>;

// ---------------------------------------------------------------------------
// Initialization vectors
// ---------------------------------------------------------------------------

const FIXED_IV_SEED = fromHex('6a09e667bb67ae853c6ef372a54ff53a510e527f9b05688c1f83d9ab5be0cd19');

/**
 * The well-known constant IV: the seed bytes (or their bits) repeated to `width`.
 */
export function fixedIv(width: number, unit: SymbolUnit): Uint8Array {
    const seed = unit === 'bit' ? bytesToBits(FIXED_IV_SEED) : FIXED_IV_SEED;
    return Uint8Array.from({ length: width }, (_, i) => seed[i % seed.length]);
}

/**
 * Draw `width` symbols from `random`. Bit mode keeps the low bit of each byte.
 */
export function randomIv(width: number, unit: SymbolUnit, random: RandomSource = randomBytes): Uint8Array {
    const bytes = random(width);
    if (bytes.length !== width) {
        throw new InvalidConfigurationError(`Random source returned ${bytes.length} bytes, expected ${width}`, [
            { field: 'random', message: 'unexpected length', code: 'invalid_length' }
        ]);
    }
    return unit === 'bit' ? Uint8Array.from(bytes, (b) => b & 1) : Uint8Array.from(bytes);
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function invalid(issue: ValidationIssue): InvalidConfigurationError {
    return new InvalidConfigurationError(`Invalid hash configuration: ${issue.field} ${issue.message}`, [issue]);
}

/**
 * Validate options and settle every default, including the IV.
 * Throws `InvalidConfigurationError` on the first unusable setting.
 */
export function resolveConfig(options: HashOptions): ResolvedHashConfig {
    const parsed = HashConfigSchema.safeParse(options);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => ({
            field: issue.path.join('.') || '(root)',
            message: issue.message,
            code: issue.code
        }));
        const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
        throw new InvalidConfigurationError(`Invalid hash configuration: ${summary}`, issues);
    }
    const config = parsed.data;

    let iv: Uint8Array;
    if (config.iv !== undefined) {
        if (config.iv.length !== config.digestWidth) {
            throw invalid({
                field: 'iv',
                message: `must hold ${config.digestWidth} symbols, got ${config.iv.length}`,
                code: 'invalid_length'
            });
        }
        if (config.iv.some((s) => s > maxSymbol(config.unit))) {
            throw invalid({ field: 'iv', message: `must only contain ${config.unit} symbols`, code: 'invalid_symbol' });
        }
        iv = Uint8Array.from(config.iv);
    } else if (config.ivSource === 'random') {
        iv = randomIv(config.digestWidth, config.unit, options.random);
    } else {
        iv = fixedIv(config.digestWidth, config.unit);
    }

    const rotates = config.unit === 'byte' && options.mixing === undefined;
    if (!rotates && options.rotation !== undefined) {
        throw invalid({
            field: 'rotation',
            message: options.mixing === undefined ? 'does not apply in bit mode' : 'does not apply to a custom mixing strategy',
            code: 'unused_option'
        });
    }

    const mixing = options.mixing ?? defaultMixing(config.unit, config.rotation);
    if (mixing.unit !== config.unit) {
        throw invalid({
            field: 'mixing',
            message: `works on ${mixing.unit} symbols but the configuration uses ${config.unit}`,
            code: 'unit_mismatch'
        });
    }

    return {
        unit: config.unit,
        digestWidth: config.digestWidth,
        blockWidth: config.blockWidth,
        rounds: config.rounds,
        rotation: rotates ? config.rotation : undefined,
        lengthWidth: config.lengthWidth,
        iv,
        mixing,
        logger: options.logger ?? new VoidLogger()
    };
}
