/**
 * Exception classes for failures outside line processing
 *
 * Line-level faults are never thrown; these cover the command-line wrapper.
 */

/**
 * The program text could not be obtained (unreadable file or stdin)
 */
export class InputReadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InputReadError';
    }
}

/**
 * A configuration file could not be read, parsed or validated
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Bad command line
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}
