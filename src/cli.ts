#!/usr/bin/env node
/**
 * linecalc command-line entry point
 */

import { main } from './cli/main';

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf8');
}

main(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    readStdin
}).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    }
);
