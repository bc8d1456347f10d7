import { Command } from 'commander';
import { resolveToolCommands } from './config';
import { packageApplication, type PipelineContext } from './pipeline';
import { createProcessRunner } from './process';
import { PackagingOptionsSchema, type PackagingOptions } from '../types/packaging';

export interface CliFlags {
    license?: string;
    icon?: string;
    output?: string;
    vendor?: string;
    description?: string;
    installerName?: string;
    skipBuild?: boolean;
    verbose?: boolean;
}

export type PackageHandler = (options: PackagingOptions) => Promise<void>;

export function toPackagingOptions(mainClass: string, flags: CliFlags): PackagingOptions {
    const parsed = PackagingOptionsSchema.safeParse({ mainClass, ...flags });
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`);
        throw new Error(`Invalid options: ${issues.join('; ')}`);
    }
    return parsed.data;
}

export async function packageCommand(options: PackagingOptions, context: Partial<PipelineContext> = {}): Promise<void> {
    const host = context.host ?? process.platform;

    await packageApplication(options, {
        cwd: context.cwd ?? process.cwd(),
        host,
        runner: context.runner ?? createProcessRunner(),
        tools: context.tools ?? resolveToolCommands(process.env, host),
    });
}

export function createProgram(handler: PackageHandler = (options) => packageCommand(options)): Command {
    const program = new Command();

    program
        .name('jpkg')
        .description('Build a Maven project and package it as a native installer with jpackage')
        .version('1.0.0')
        .argument('<main-class>', 'Fully qualified main class of the application')
        .option('-l, --license <file>', 'License file passed to the installer (default: "LICENSE")')
        .option('-i, --icon <name>', 'Icon base name looked up in icons/ (default: "appicon")')
        .option('-o, --output <dir>', 'Directory the installer is written to (default: current directory)')
        .option('--vendor <name>', 'Vendor name (default: "Unknown")')
        .option('-d, --description <text>', 'Application description (default: "A Java application.")')
        .option('--installer-name <file>', 'Verify this exact installer file name after packaging')
        .option('--skip-build', 'Reuse the bundled jar already in target/')
        .option('--verbose', 'Print external commands before running them')
        .action(async (mainClass: string, flags: CliFlags) => {
            await handler(toPackagingOptions(mainClass, flags));
        });

    return program;
}
