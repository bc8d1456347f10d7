import { promises as fs } from 'fs';
import { PackagerError } from './errors';
import type { ProcessRunner } from './process';
import type { BuildArtifact, Platform, ProjectMetadata, ToolCommands } from '../types/packaging';

export interface JpackageInput {
    metadata: ProjectMetadata;
    platform: Platform;
    artifact: BuildArtifact;
    mainClass: string;
    destination: string;
    vendor: string;
    description: string;
    licenseFile: string;
    icon?: string;
}

export function platformArgs(platform: Platform, name: string): string[] {
    switch (platform) {
        case 'windows':
            return ['--win-per-user-install', '--win-shortcut-prompt', '--win-dir-chooser', '--win-menu'];
        case 'linux':
            return ['--linux-shortcut', '--linux-package-name', name.toLowerCase()];
        case 'macos':
            return ['--mac-package-name', name];
    }
}

/**
 * Assembles the jpackage argument list. The order is fixed: common options,
 * then the icon when one was found, then the platform-specific options.
 */
export function buildJpackageArgs(input: JpackageInput): string[] {
    const { metadata, artifact } = input;

    const args = [
        '--name', metadata.name,
        '--app-version', metadata.version,
        '--input', artifact.directory,
        '--main-jar', artifact.fileName,
        '--main-class', input.mainClass,
        '--dest', input.destination,
        '--vendor', input.vendor,
        '--description', input.description,
        '--license-file', input.licenseFile,
    ];

    if (input.icon !== undefined) {
        args.push('--icon', input.icon);
    }

    args.push(...platformArgs(input.platform, metadata.name));
    return args;
}

export async function runJpackage(
    runner: ProcessRunner,
    tools: ToolCommands,
    args: string[],
    destination: string,
    cwd: string
): Promise<void> {
    await fs.mkdir(destination, { recursive: true });

    let exitCode: number;
    try {
        ({ exitCode } = await runner.run(tools.jpackage, args, { cwd, inherit: true }));
    } catch (error) {
        throw new PackagerError('PackagingFailed', `Could not start ${tools.jpackage}`, { cause: error });
    }

    if (exitCode !== 0) {
        throw new PackagerError('PackagingFailed', `jpackage failed with exit code ${exitCode}`, {
            exitCode,
        });
    }
}
