// src/cli.ts
import { FdReader, FdWriter } from './io.js';
import type { ByteReader, ByteWriter } from './io.js';
import { VirtualMachine } from './interp.js';
import { Program } from './program.js';
import { DEFAULT_CELLS } from './types.js';

export const VERSION = '1.0.0';

export const USAGE = `
Brainfuck Interpreter

Usage: bfvm [options] <PROGRAM>

Options:
  --cells, -c       Number of cells on the tape, greater than 0 [default: ${DEFAULT_CELLS}]
  --extensible, -e  Grow the tape when the head moves past its end
  --verbose, -v     Trace every executed instruction to stderr
  --list, -l        Print the parsed instructions instead of running them
  --version, -V     Show version
  --help, -h        Show this help
`;

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export interface RunCommand {
    kind: 'run';
    file: string;
    cells: number;
    extensible: boolean;
    verbose: boolean;
    list: boolean;
}

export type Command = RunCommand | { kind: 'help' } | { kind: 'version' };

const parseCells = (value: string | undefined): number => {
    if (value === undefined) {
        throw new UsageError('--cells requires a value');
    }
    if (!/^\d+$/.test(value)) {
        throw new UsageError(`Invalid cell count '${value}'`);
    }
    const cells = Number(value);
    if (cells === 0 || !Number.isSafeInteger(cells)) {
        throw new UsageError('Cell count must be greater than 0');
    }
    return cells;
};

export function parseArgs(args: readonly string[]): Command {
    let file: string | null = null;
    let cells = DEFAULT_CELLS;
    let extensible = false;
    let verbose = false;
    let list = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            return { kind: 'help' };
        } else if (arg === '--version' || arg === '-V') {
            return { kind: 'version' };
        } else if (arg === '--cells' || arg === '-c') {
            i++;
            cells = parseCells(args[i]);
        } else if (arg.startsWith('--cells=')) {
            cells = parseCells(arg.slice('--cells='.length));
        } else if (arg === '--extensible' || arg === '-e') {
            extensible = true;
        } else if (arg === '--verbose' || arg === '-v') {
            verbose = true;
        } else if (arg === '--list' || arg === '-l') {
            list = true;
        } else if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option '${arg}'`);
        } else if (file !== null) {
            throw new UsageError(`Unexpected argument '${arg}'`);
        } else {
            file = arg;
        }
    }

    if (file === null) {
        throw new UsageError('No input file specified');
    }
    return { kind: 'run', file, cells, extensible, verbose, list };
}

export interface CliStreams {
    input: ByteReader;
    output: ByteWriter;
    log: (message: string) => void;
    error: (message: string) => void;
}

const defaultStreams = (): CliStreams => ({
    input: new FdReader(),
    output: new FdWriter(),
    log: message => console.log(message),
    error: message => console.error(message),
});

/** Runs the command line and returns the process exit status. */
export function main(args: readonly string[], streams: CliStreams = defaultStreams()): number {
    let command: Command;
    try {
        command = parseArgs(args);
    } catch (err) {
        streams.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        streams.log(USAGE);
        return 1;
    }

    if (command.kind === 'help') {
        streams.log(USAGE);
        return 0;
    }
    if (command.kind === 'version') {
        streams.log(`bfvm ${VERSION}`);
        return 0;
    }

    try {
        const program = Program.fromFile(command.file).validate();
        if (command.list) {
            for (const line of program.listing()) {
                streams.log(line);
            }
            return 0;
        }

        const vm = new VirtualMachine(program, {
            cells: command.cells,
            extensible: command.extensible,
            trace: command.verbose ? line => streams.error(`${program.name}: ${line}`) : undefined,
        });
        vm.run(streams.input, streams.output);
        return 0;
    } catch (err) {
        streams.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        return 1;
    }
}
