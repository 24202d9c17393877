import { readFile } from 'node:fs/promises';
import { Session } from '../classes/Session';
import { ReportPrinter } from '../classes/report-printer';
import { ConfigError, InputReadError, UsageError } from '../classes/exceptions';
import { DEFAULT_CONFIG, loadConfig, type LineCalcConfig } from '../utils/config';
import { setDebug } from '../utils/debug';
import { errorMessage } from '../utils/errorFormatter';
import { parseCliArgs, USAGE } from './args';

export interface CliIO {
    stdout: { write(text: string): unknown };
    stderr: { write(text: string): unknown };
    readStdin(): Promise<string>;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

async function readInput(path: string | null, io: CliIO): Promise<string> {
    try {
        return path === null ? await io.readStdin() : await readFile(path, 'utf8');
    } catch (error) {
        throw new InputReadError(`Failed to read ${path ?? 'standard input'}: ${errorMessage(error)}`);
    }
}

/**
 * Run the command line. Line faults are part of the report and still exit 0.
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[], io: CliIO): Promise<number> {
    try {
        const args = parseCliArgs(argv);
        if (args.help) {
            io.stdout.write(`${USAGE}\n`);
            return EXIT_OK;
        }

        const config: LineCalcConfig = args.configPath ? await loadConfig(args.configPath) : DEFAULT_CONFIG;
        setDebug(args.debug || config.debug);

        const source = await readInput(args.input, io);
        if (source.trim().length === 0) {
            io.stderr.write('Error: No input provided\n');
            return EXIT_FAILURE;
        }

        const printer = new ReportPrinter({
            ...config.render,
            showInput: args.showInput ?? config.render.showInput,
            errorContext: args.errorContext ?? config.render.errorContext
        });
        const report = new Session().run(source);
        io.stdout.write(printer.print(report, source));
        return EXIT_OK;
    } catch (error) {
        if (error instanceof UsageError) {
            io.stderr.write(`Error: ${error.message}\n${USAGE}\n`);
            return EXIT_USAGE;
        }
        if (error instanceof InputReadError || error instanceof ConfigError) {
            io.stderr.write(`Error: ${error.message}\n`);
            return EXIT_FAILURE;
        }
        throw error;
    }
}
