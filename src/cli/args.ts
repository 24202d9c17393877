import { UsageError } from '../classes/exceptions';

export interface CliArgs {
    input: string | null; // path, or null for standard input
    configPath: string | null;
    showInput: boolean | null; // null: keep the configured value
    errorContext: boolean | null;
    debug: boolean;
    help: boolean;
}

export const USAGE = [
    'Usage: linecalc [options] [file]',
    '',
    'Runs each line of <file> (or standard input when omitted or "-") and prints the report.',
    '',
    'Options:',
    '  --config <path>  JSON5 configuration file',
    '  --no-input       do not echo the input text',
    '  --context        show a caret under the fault position of each failed line',
    '  --debug          enable debug logging',
    '  -h, --help       show this help'
].join('\n');

export function parseCliArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        input: null,
        configPath: null,
        showInput: null,
        errorContext: null,
        debug: false,
        help: false
    };
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const token = argv[i];
        if (token === '--config') {
            const next = argv[i + 1];
            if (typeof next !== 'string' || next.trim() === '') {
                throw new UsageError('--config requires a path');
            }
            args.configPath = next;
            i += 1;
            continue;
        }
        if (token === '--no-input') {
            args.showInput = false;
            continue;
        }
        if (token === '--context') {
            args.errorContext = true;
            continue;
        }
        if (token === '--debug') {
            args.debug = true;
            continue;
        }
        if (token === '-h' || token === '--help') {
            args.help = true;
            continue;
        }
        if (token.startsWith('-') && token !== '-') {
            throw new UsageError(`Unknown option ${token}`);
        }
        positional.push(token);
    }

    if (positional.length > 1) {
        throw new UsageError(`Expected at most one input file, got ${positional.length}`);
    }
    const [input] = positional;
    if (input !== undefined && input !== '-') {
        args.input = input;
    }

    return args;
}
