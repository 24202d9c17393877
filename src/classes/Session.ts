/**
 * Session - one complete run over a multi-line program
 *
 * Every run starts from a fresh variable store; nothing carries over between runs.
 */

import { LineProcessor } from './LineProcessor';
import { createEnvironment } from '../types/Environment.type';
import type { SessionReport } from '../types/Report.type';
import { debugLog } from '../utils/debug';

export class Session {
    /**
     * Process every line of `source` in order and build the report.
     * Lines are separated by '\n'; a trailing '\r' is trimmed with the rest
     * of the surrounding whitespace.
     */
    run(source: string): SessionReport {
        const environment = createEnvironment();
        const processor = new LineProcessor(environment);

        const lines = source.split('\n');
        debugLog('Session', `run started (${lines.length} lines)`);

        lines.forEach((line, index) => {
            processor.process(line, index + 1);
        });

        const variables = new Map<string, bigint>();
        for (const name of environment.usedVariables) {
            const value = environment.variables.get(name);
            if (value !== undefined) {
                variables.set(name, value);
            }
        }

        debugLog('Session', `run finished`, {
            outcomes: environment.outcomes.length,
            errors: environment.errors.length
        });

        return {
            outcomes: environment.outcomes,
            variables,
            errors: environment.errors
        };
    }
}
