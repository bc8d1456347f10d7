import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { promises as fs } from 'fs';
import path from 'path';
import { buildJpackageArgs, platformArgs, runJpackage, type JpackageInput } from '../../src/cli/jpackage';
import { FakeRunner } from '../helpers/fake-runner';
import { createSandbox, removeSandbox } from '../helpers/sandbox';

const baseInput: JpackageInput = {
    metadata: { name: 'ZenPad', version: '2.0.1' },
    platform: 'windows',
    artifact: {
        path: '/work/target/ZenPad-2.0.1-jar-with-dependencies.jar',
        directory: '/work/target',
        fileName: 'ZenPad-2.0.1-jar-with-dependencies.jar',
    },
    mainClass: 'org.example.zenpad.Main',
    destination: '/work/out',
    vendor: 'Example Corp',
    description: 'A note taking app.',
    licenseFile: 'LICENSE',
};

const commonArgs = [
    '--name', 'ZenPad',
    '--app-version', '2.0.1',
    '--input', '/work/target',
    '--main-jar', 'ZenPad-2.0.1-jar-with-dependencies.jar',
    '--main-class', 'org.example.zenpad.Main',
    '--dest', '/work/out',
    '--vendor', 'Example Corp',
    '--description', 'A note taking app.',
    '--license-file', 'LICENSE',
];

describe('buildJpackageArgs', () => {
    test('adds the Windows installer options after the icon', () => {
        expect(buildJpackageArgs({ ...baseInput, icon: '/work/icons/appicon.ico' })).toEqual([
            ...commonArgs,
            '--icon', '/work/icons/appicon.ico',
            '--win-per-user-install',
            '--win-shortcut-prompt',
            '--win-dir-chooser',
            '--win-menu',
        ]);
    });

    test('omits --icon when no icon was found', () => {
        const args = buildJpackageArgs(baseInput);
        expect(args).not.toContain('--icon');
        expect(args).toEqual([
            ...commonArgs,
            '--win-per-user-install',
            '--win-shortcut-prompt',
            '--win-dir-chooser',
            '--win-menu',
        ]);
    });

    test('lower-cases the Linux package name', () => {
        expect(buildJpackageArgs({ ...baseInput, platform: 'linux' })).toEqual([
            ...commonArgs,
            '--linux-shortcut',
            '--linux-package-name', 'zenpad',
        ]);
    });

    test('keeps the macOS package name as written', () => {
        expect(platformArgs('macos', 'ZenPad')).toEqual(['--mac-package-name', 'ZenPad']);
    });
});

describe('runJpackage', () => {
    let sandbox: string;

    beforeEach(async () => {
        sandbox = await createSandbox();
    });

    afterEach(async () => {
        await removeSandbox(sandbox);
    });

    test('creates the destination and runs jpackage with inherited output', async () => {
        const runner = new FakeRunner();
        const destination = path.join(sandbox, 'installers', 'nested');
        await runJpackage(runner, { maven: 'mvn', jpackage: 'jpackage' }, ['--name', 'x'], destination, sandbox);

        expect((await fs.stat(destination)).isDirectory()).toBe(true);
        expect(runner.calls).toEqual([
            { command: 'jpackage', args: ['--name', 'x'], options: { cwd: sandbox, inherit: true } },
        ]);
    });

    test('fails with PackagingFailed carrying the exit code', async () => {
        const runner = new FakeRunner(() => 2);
        await expect(
            runJpackage(runner, { maven: 'mvn', jpackage: 'jpackage' }, [], sandbox, sandbox)
        ).rejects.toMatchObject({ code: 'PackagingFailed', exitCode: 2, message: 'jpackage failed with exit code 2' });
    });
});
