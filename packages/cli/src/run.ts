import {
    ConsoleLogger,
    fromHex,
    type HashOptions,
    hashFile,
    isMdHashError,
    LogLevel,
    MerkleDamgardHasher,
    PRESETS,
    parseBitString,
    toBitString,
    toHex
} from '@mdhash/core';
import { formatDiffusionReport, measureDiffusion } from '@mdhash/diffusion';
import pc from 'picocolors';
import { type CliArgs, HELP, parseArgs } from './args.js';

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
    /** Colorize output. Defaults to picocolors' terminal detection. */
    color?: boolean;
}

type Colors = ReturnType<typeof pc.createColors>;

function buildOptions(args: CliArgs): HashOptions {
    const unit = args.unit ?? 'byte';
    const preset = args.file !== undefined && unit === 'byte' ? PRESETS.file : unit === 'bit' ? PRESETS.bits : PRESETS.bytes;
    return {
        ...preset,
        ...(args.digestWidth !== undefined ? { digestWidth: args.digestWidth } : {}),
        ...(args.blockWidth !== undefined ? { blockWidth: args.blockWidth } : {}),
        ...(args.rounds !== undefined ? { rounds: args.rounds } : {}),
        ...(args.rotation !== undefined ? { rotation: args.rotation } : {}),
        ...(args.lengthWidth !== undefined ? { lengthWidth: args.lengthWidth } : {}),
        ...(args.iv !== undefined ? { iv: unit === 'bit' ? parseBitString(args.iv) : fromHex(args.iv) } : {}),
        ...(args.randomIv ? { ivSource: 'random' as const } : {}),
        ...(args.verbose ? { logger: new ConsoleLogger(LogLevel.DEBUG) } : {})
    };
}

function hashMessage(args: CliArgs, bits: string, io: CliIO, c: Colors): void {
    const hasher = new MerkleDamgardHasher(buildOptions(args));
    const { unit } = hasher.config;

    io.out(`${c.bold('IV:')}       ${toBitString(hasher.initialState, unit)}`);
    io.out(`${c.bold('Message1:')} ${bits}`);
    const digest1 = hasher.fork().updateBits(bits).finalize();
    io.out(`${c.bold('Digest1:')}  ${c.cyan(toBitString(digest1, unit))}`);

    if (args.compare === undefined) {
        return;
    }

    io.out(`${c.bold('Message2:')} ${args.compare}`);
    const digest2 = hasher.fork().updateBits(args.compare).finalize();
    io.out(`${c.bold('Digest2:')}  ${c.cyan(toBitString(digest2, unit))}`);

    io.out('');
    io.out('Comparing input messages:');
    io.out(formatDiffusionReport(measureDiffusion(bits, args.compare), { visual: args.visual }));
    io.out('');
    io.out('Comparing output digests:');
    io.out(formatDiffusionReport(measureDiffusion(digest1, digest2, { unit }), { visual: args.visual }));
}

async function hashPath(args: CliArgs, path: string, io: CliIO, c: Colors): Promise<void> {
    const result = await hashFile(path, buildOptions(args));
    const { unit } = result.hasher.config;

    io.out(`${c.bold('Initialization Vector:')} ${toHex(result.hasher.initialState, unit)}`);
    io.out(`${c.bold('Digest:')} ${c.cyan(result.hex)}`);

    // Same run, only the length field of the final block differs.
    const modified = result.hasher.finalize({ length: result.length + 1 });
    io.out(`${c.bold('Modified Digest:')} ${c.cyan(toHex(modified, unit))}`);

    io.out('');
    io.out('Diffusion Analysis (changing only the length field by 1):');
    io.out(formatDiffusionReport(measureDiffusion(result.digest, modified, { unit }), { visual: args.visual }));
}

/**
 * Run the command line and resolve to the process exit code.
 * Errors raised by the hash packages are printed; anything else propagates.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
    const c = pc.createColors(io.color ?? pc.isColorSupported);
    try {
        const args = parseArgs(argv);
        if (args.help || (args.bits === undefined && args.file === undefined)) {
            io.out(HELP);
            return args.help ? 0 : 1;
        }
        if (args.file !== undefined) {
            await hashPath(args, args.file, io, c);
        } else if (args.bits !== undefined) {
            hashMessage(args, args.bits, io, c);
        }
        return 0;
    } catch (error) {
        if (isMdHashError(error)) {
            io.err(`${c.red('Error:')} ${error.message}`);
            return 1;
        }
        throw error;
    }
}
