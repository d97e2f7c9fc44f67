export type { HashAlgorithm, Hasher, LogEntry, Logger, MixingStrategy, SymbolUnit } from '@mdhash/types';
export { LogLevel } from '@mdhash/types';
export { type BlockLayout, countBlocks, decodeLengthBlock, encodeLength, finalBlocks, splitBlocks } from './codec.js';
export {
    DEFAULT_ROUNDS,
    fixedIv,
    type HashOptions,
    HashConfigSchema,
    PRESETS,
    type RandomSource,
    type ResolvedHashConfig,
    randomIv,
    resolveConfig
} from './config.js';
export {
    InvalidConfigurationError,
    InvalidInputError,
    isMdHashError,
    MdHashError,
    SourceReadError,
    type ValidationIssue
} from './errors.js';
export { type FileDigest, hashFile } from './file.js';
export {
    type ChunkSupplier,
    createAlgorithm,
    type FinalizeOptions,
    hash,
    hashBits,
    hashChunks,
    hashHex,
    hashStream,
    MerkleDamgardHasher
} from './hasher.js';
export { ConsoleLogger, VoidLogger } from './logger.js';
export { DEFAULT_ROTATION, defaultMixing, rotateRight8, rotateXorAddMixing, xorMixing } from './mixing.js';
export {
    assertSymbols,
    bitsToBytes,
    bytesToBits,
    fromHex,
    maxSymbol,
    parseBitString,
    toBitString,
    toHex
} from './symbols.js';
