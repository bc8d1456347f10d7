import ora from 'ora';
import { PackagerError } from './errors';
import type { ProcessRunner } from './process';
import type { ToolCommands } from '../types/packaging';

interface ToolProbe {
    label: string;
    command: string;
    args: string[];
}

export function toolProbes(tools: ToolCommands): ToolProbe[] {
    return [
        { label: 'Maven', command: tools.maven, args: ['-v'] },
        { label: 'jpackage', command: tools.jpackage, args: ['--version'] },
    ];
}

/**
 * Confirms both tools start and answer a version query. A probe that fails
 * for any reason counts as the tool being unavailable.
 */
export async function checkTools(runner: ProcessRunner, tools: ToolCommands, cwd: string): Promise<void> {
    for (const probe of toolProbes(tools)) {
        const spinner = ora(`Checking ${probe.label} (${probe.command})...`).start();

        let exitCode: number | undefined;
        let cause: unknown;
        try {
            exitCode = (await runner.run(probe.command, probe.args, { cwd })).exitCode;
        } catch (error) {
            cause = error;
        }

        if (exitCode !== 0) {
            spinner.fail(`${probe.label} is not available`);
            const detail = exitCode === undefined ? 'could not be started' : `exited with code ${exitCode}`;
            throw new PackagerError('ToolNotFound', `${probe.label} (${probe.command}) ${detail}`, {
                exitCode,
                hint: `Ensure ${probe.command} is installed and on your PATH.`,
                cause,
            });
        }

        spinner.succeed(`${probe.label} found`);
    }
}
