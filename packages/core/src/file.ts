import { createReadStream } from 'node:fs';
import { LogLevel } from '@mdhash/types';
import type { HashOptions } from './config.js';
import { SourceReadError } from './errors.js';
import { MerkleDamgardHasher } from './hasher.js';
import { bytesToBits, toHex } from './symbols.js';

export interface FileDigest {
    readonly digest: Uint8Array;
    readonly hex: string;
    /** Message length in symbols: bytes in byte mode, bits in bit mode. */
    readonly length: number;
    /** The hasher that produced the digest, kept for `fork()` experiments. */
    readonly hasher: MerkleDamgardHasher;
}

/**
 * Stream a file through a hasher in block-sized reads.
 * @throws SourceReadError when the file cannot be opened or read to the end.
 */
export async function hashFile(path: string, options: HashOptions): Promise<FileDigest> {
    const hasher = new MerkleDamgardHasher(options);
    const { unit, blockWidth, logger } = hasher.config;
    const highWaterMark = unit === 'byte' ? blockWidth : Math.max(1, Math.ceil(blockWidth / 8));

    try {
        for await (const chunk of createReadStream(path, { highWaterMark })) {
            if (!(chunk instanceof Uint8Array)) {
                throw new TypeError('Expected binary chunks from the file stream');
            }
            hasher.update(unit === 'bit' ? bytesToBits(chunk) : chunk);
        }
    } catch (error) {
        logger.log({ level: LogLevel.ERROR, message: `Reading ${path} failed`, reason: error });
        throw new SourceReadError(path, error);
    }

    const digest = hasher.finalize();
    return { digest, hex: toHex(digest, unit), length: hasher.consumed, hasher };
}
