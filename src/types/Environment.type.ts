import type { LineOutcome } from './Report.type';

export type VariableStore = Map<string, bigint>;

/**
 * Mutable state threaded through one session run
 */
export interface Environment {
    variables: VariableStore;
    usedVariables: Set<string>; // names bound by a successful assignment
    errors: string[]; // "Line n: message", in line order
    outcomes: LineOutcome[];
}

export function createEnvironment(): Environment {
    return {
        variables: new Map(),
        usedVariables: new Set(),
        errors: [],
        outcomes: []
    };
}
