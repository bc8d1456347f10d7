#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createProgram } from './commands';
import { loadEnv } from './config';
import { reportError } from './output';

/**
 * Runs the CLI and resolves to the process exit code: 0 on success, 1 on any
 * failure. Usage errors are printed by commander itself.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
    try {
        loadEnv();
        await createProgram().exitOverride().parseAsync(argv);
        return 0;
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? 0 : 1;
        }
        reportError(error);
        return 1;
    }
}

if (require.main === module) {
    void main().then((code) => process.exit(code));
}
