/**
 * Configuration loading for LineCalc
 * Configuration files are JSON5
 */

import { readFile } from 'node:fs/promises';
import JSON5 from 'json5';
import { ConfigError } from '../classes/exceptions';
import { errorMessage } from './errorFormatter';

export interface RenderOptions {
    showInput: boolean; // echo the input text before the output
    showValues: boolean; // "x = 5" instead of "x" in the variables list
    errorContext: boolean; // caret snippet under faulted lines
    separator: string;
}

export interface LineCalcConfig {
    debug: boolean;
    render: RenderOptions;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
    showInput: true,
    showValues: true,
    errorContext: false,
    separator: '-------------------------------------------'
};

export const DEFAULT_CONFIG: LineCalcConfig = {
    debug: false,
    render: DEFAULT_RENDER_OPTIONS
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(record: Record<string, unknown>, key: string, field: string, fallback: boolean): boolean {
    const value = record[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== 'boolean') {
        throw new ConfigError(`'${field}' must be a boolean`);
    }
    return value;
}

function readString(record: Record<string, unknown>, key: string, field: string, fallback: string): string {
    const value = record[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== 'string') {
        throw new ConfigError(`'${field}' must be a string`);
    }
    return value;
}

/**
 * Parse configuration text. Missing fields take their defaults, unknown keys are ignored.
 *
 * @throws ConfigError if the text is not JSON5 or a field has the wrong type
 */
export function parseConfig(text: string): LineCalcConfig {
    let parsed: unknown;
    try {
        parsed = JSON5.parse(text);
    } catch (error) {
        throw new ConfigError(`Invalid JSON5: ${errorMessage(error)}`);
    }

    if (!isRecord(parsed)) {
        throw new ConfigError('Configuration must be an object');
    }

    const render = parsed.render ?? {};
    if (!isRecord(render)) {
        throw new ConfigError("'render' must be an object");
    }

    return {
        debug: readBoolean(parsed, 'debug', 'debug', DEFAULT_CONFIG.debug),
        render: {
            showInput: readBoolean(render, 'showInput', 'render.showInput', DEFAULT_RENDER_OPTIONS.showInput),
            showValues: readBoolean(render, 'showValues', 'render.showValues', DEFAULT_RENDER_OPTIONS.showValues),
            errorContext: readBoolean(render, 'errorContext', 'render.errorContext', DEFAULT_RENDER_OPTIONS.errorContext),
            separator: readString(render, 'separator', 'render.separator', DEFAULT_RENDER_OPTIONS.separator)
        }
    };
}

/**
 * Read and parse a configuration file
 *
 * @throws ConfigError if the file cannot be read or parsed
 */
export async function loadConfig(path: string): Promise<LineCalcConfig> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        throw new ConfigError(`Cannot read configuration file ${path}: ${errorMessage(error)}`);
    }
    return parseConfig(text);
}
