import path from 'path';
import { readProjectMetadata } from './metadata';
import { resolvePlatform } from './platform';
import { checkTools } from './tools';
import { BUILD_ARGS, runBuild } from './build';
import { locateArtifact } from './artifact';
import { resolveIcon } from './icon';
import { buildJpackageArgs, runJpackage } from './jpackage';
import { verifyInstaller } from './result';
import { formatCommand, printInfo, printStage, printSuccess } from './output';
import type { ProcessRunner } from './process';
import type { PackagingOptions, Platform, ToolCommands } from '../types/packaging';

export interface PipelineContext {
    cwd: string;
    host: NodeJS.Platform;
    runner: ProcessRunner;
    tools: ToolCommands;
}

export interface PipelineResult {
    platform: Platform;
    installerPath: string;
    jpackageArgs: string[];
}

const TOTAL_STAGES = 8;

/**
 * Runs every packaging stage in order. The first failing stage throws and
 * nothing after it runs; whatever the tools already wrote stays on disk.
 */
export async function packageApplication(
    options: PackagingOptions,
    context: PipelineContext
): Promise<PipelineResult> {
    const { cwd, runner, tools } = context;

    printStage(1, TOTAL_STAGES, 'Reading project metadata');
    const metadata = await readProjectMetadata(cwd);
    printInfo(`${metadata.name} ${metadata.version}`);

    printStage(2, TOTAL_STAGES, 'Detecting platform');
    const platform = resolvePlatform(context.host);
    printInfo(`Packaging for ${platform}`);

    printStage(3, TOTAL_STAGES, 'Checking tools');
    await checkTools(runner, tools, cwd);

    printStage(4, TOTAL_STAGES, 'Building project');
    if (options.skipBuild) {
        printInfo('Skipped (--skip-build)');
    } else {
        if (options.verbose) printInfo(formatCommand(tools.maven, BUILD_ARGS));
        await runBuild(runner, tools, cwd);
        printSuccess('Build succeeded');
    }

    printStage(5, TOTAL_STAGES, 'Locating bundled jar');
    const artifact = await locateArtifact(cwd);
    printInfo(path.relative(cwd, artifact.path));

    printStage(6, TOTAL_STAGES, 'Resolving icon');
    const icon = resolveIcon(cwd, platform, options.icon);
    if (icon !== undefined) printInfo(path.relative(cwd, icon));

    printStage(7, TOTAL_STAGES, 'Running jpackage');
    const destination = path.resolve(cwd, options.output ?? '.');
    const jpackageArgs = buildJpackageArgs({
        metadata,
        platform,
        artifact,
        mainClass: options.mainClass,
        destination,
        vendor: options.vendor,
        description: options.description,
        licenseFile: options.license,
        icon,
    });
    if (options.verbose) printInfo(formatCommand(tools.jpackage, jpackageArgs));
    await runJpackage(runner, tools, jpackageArgs, destination, cwd);

    printStage(8, TOTAL_STAGES, 'Verifying installer');
    const installerPath = await verifyInstaller({
        outputDir: destination,
        platform,
        productName: metadata.name,
        installerName: options.installerName,
    });
    printSuccess(`Installer created: ${installerPath}`);

    return { platform, installerPath, jpackageArgs };
}
