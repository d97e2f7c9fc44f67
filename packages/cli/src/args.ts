import { InvalidInputError, type SymbolUnit } from '@mdhash/core';

export interface CliArgs {
    readonly bits?: string;
    readonly compare?: string;
    readonly file?: string;
    readonly unit?: SymbolUnit;
    readonly digestWidth?: number;
    readonly blockWidth?: number;
    readonly rounds?: number;
    readonly rotation?: number;
    readonly lengthWidth?: number;
    readonly iv?: string;
    readonly randomIv: boolean;
    readonly visual: boolean;
    readonly verbose: boolean;
    readonly help: boolean;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

function integer(flag: string, value: string | undefined): number {
    if (value === undefined || !/^\d+$/.test(value)) {
        throw new InvalidInputError(`${flag} expects a non-negative integer, got ${value ?? 'nothing'}`);
    }
    return Number.parseInt(value, 10);
}

function text(flag: string, value: string | undefined): string {
    if (value === undefined) {
        throw new InvalidInputError(`${flag} expects a value`);
    }
    return value;
}

/**
 * Parse command-line arguments (without the node executable and script path).
 * @throws InvalidInputError on unknown flags or missing values.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const args: Mutable<CliArgs> = { randomIv: false, visual: false, verbose: false, help: false };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = argv[i + 1];

        switch (arg) {
            case '--bits':
                args.bits = text(arg, next);
                i++;
                break;
            case '--compare':
                args.compare = text(arg, next);
                i++;
                break;
            case '--file':
                args.file = text(arg, next);
                i++;
                break;
            case '--unit':
                if (next !== 'bit' && next !== 'byte') {
                    throw new InvalidInputError(`--unit expects bit or byte, got ${next ?? 'nothing'}`);
                }
                args.unit = next;
                i++;
                break;
            case '--digest-width':
                args.digestWidth = integer(arg, next);
                i++;
                break;
            case '--block-width':
                args.blockWidth = integer(arg, next);
                i++;
                break;
            case '--rounds':
                args.rounds = integer(arg, next);
                i++;
                break;
            case '--rotation':
                args.rotation = integer(arg, next);
                i++;
                break;
            case '--length-width':
                args.lengthWidth = integer(arg, next);
                i++;
                break;
            case '--iv':
                args.iv = text(arg, next);
                i++;
                break;
            case '--random-iv':
                args.randomIv = true;
                break;
            case '--visual':
                args.visual = true;
                break;
            case '--verbose':
                args.verbose = true;
                break;
            case '--help':
                args.help = true;
                break;
            default:
                throw new InvalidInputError(`Unknown option ${arg}`);
        }
    }

    if (args.bits !== undefined && args.file !== undefined) {
        throw new InvalidInputError('--bits and --file cannot be combined');
    }
    if (args.compare !== undefined && args.bits === undefined) {
        throw new InvalidInputError('--compare requires --bits');
    }
    return args;
}

export const HELP = `
mdhash — Merkle–Damgård teaching hash

Usage: mdhash (--bits <0101…> [--compare <0101…>] | --file <path>) [options]

Options:
  --bits <string>         Hash a message given as a bit string
  --compare <string>      Second bit string to compare against --bits
  --file <path>           Hash a file and show a length-flip comparison
  --unit bit|byte         Symbol unit (default: byte)
  --digest-width <n>      State width W in symbols
  --block-width <n>       Block width B in symbols
  --rounds <n>            Mixing rounds per block (default: 3)
  --rotation <n>          Bits rotated per mixing step, byte unit only (default: 3)
  --length-width <n>      Width of the length field in symbols
  --iv <value>            IV as hex (byte unit) or bits (bit unit)
  --random-iv             Draw the IV from node:crypto
  --visual                Print aligned bit differences
  --verbose               Log every folded block
  --help                  Show this help message
`;
