import execa from 'execa';

export interface ProcessResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface RunOptions {
    cwd?: string;
    /** Forward the child's output to this terminal instead of capturing it. */
    inherit?: boolean;
}

/**
 * The single capability every stage uses to reach an external tool.
 * Rejects only when the process cannot be started at all.
 */
export interface ProcessRunner {
    run(command: string, args: string[], options?: RunOptions): Promise<ProcessResult>;
}

// typed as a number, but absent when the child never started or died on a signal
function exitCodeOf(result: { exitCode?: number | null }): number | undefined {
    return typeof result.exitCode === 'number' ? result.exitCode : undefined;
}

/**
 * Spawns real processes through execa, which resolves `mvn.cmd` and escapes
 * arguments for cmd.exe on Windows without going through a shell.
 */
export function createProcessRunner(): ProcessRunner {
    return {
        async run(command, args, options = {}) {
            const { cwd = process.cwd(), inherit = false } = options;

            const result = await execa(command, args, {
                cwd,
                stdin: 'ignore',
                stdout: inherit ? 'inherit' : 'pipe',
                stderr: inherit ? 'inherit' : 'pipe',
                reject: false,
            });

            const exitCode = exitCodeOf(result);
            if (exitCode === undefined) {
                if (result.signal) {
                    return { exitCode: 128, stdout: result.stdout ?? '', stderr: result.stderr ?? '' };
                }
                throw new Error(`Could not start ${command}`, { cause: result });
            }

            return {
                exitCode,
                stdout: result.stdout ?? '',
                stderr: result.stderr ?? '',
            };
        },
    };
}
