import { PackagerError } from './errors';
import type { ProcessRunner } from './process';
import type { ToolCommands } from '../types/packaging';

export const BUILD_ARGS = ['clean', 'package'];

/* only the exit code decides whether the build worked */
export async function runBuild(runner: ProcessRunner, tools: ToolCommands, cwd: string): Promise<void> {
    let exitCode: number;
    try {
        ({ exitCode } = await runner.run(tools.maven, BUILD_ARGS, { cwd, inherit: true }));
    } catch (error) {
        throw new PackagerError('BuildFailed', `Could not start ${tools.maven}`, { cause: error });
    }

    if (exitCode !== 0) {
        throw new PackagerError('BuildFailed', `Maven build failed with exit code ${exitCode}`, {
            exitCode,
            hint: 'Fix the build errors above and run jpkg again.',
        });
    }
}
