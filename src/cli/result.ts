import { promises as fs } from 'fs';
import path from 'path';
import { PackagerError } from './errors';
import type { Platform } from '../types/packaging';

export const INSTALLER_EXTENSIONS: Record<Platform, string[]> = {
    windows: ['.msi', '.exe'],
    linux: ['.deb', '.rpm'],
    macos: ['.dmg', '.pkg'],
};

const ARCHIVE_EXTENSIONS = ['.jar', '.zip', '.tar', '.gz', '.tgz'];

export interface VerifyInput {
    outputDir: string;
    platform: Platform;
    productName: string;
    /** When set, only this exact file in the output directory counts. */
    installerName?: string;
}

async function listFiles(dir: string): Promise<string[]> {
    try {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        return entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();
    } catch (error) {
        throw new PackagerError('ResultVerificationFailed', `Cannot read output directory ${dir}`, {
            cause: error,
        });
    }
}

function hasExtension(fileName: string, extensions: string[]): boolean {
    const lower = fileName.toLowerCase();
    return extensions.some((ext) => lower.endsWith(ext));
}

export function pickInstaller(files: string[], platform: Platform, productName: string): string | undefined {
    const product = productName.toLowerCase();
    const named = (file: string) => file.toLowerCase().includes(product);

    const installers = files.filter((file) => hasExtension(file, INSTALLER_EXTENSIONS[platform]));
    const match = installers.find(named) ?? installers[0];
    if (match !== undefined || platform !== 'linux') {
        return match;
    }

    // otherwise any non-archive file named after the product
    return files.find((file) => named(file) && !hasExtension(file, ARCHIVE_EXTENSIONS));
}

/**
 * Confirms jpackage left an installer in the output directory and returns
 * its absolute path.
 */
export async function verifyInstaller(input: VerifyInput): Promise<string> {
    const outputDir = path.resolve(input.outputDir);
    const files = await listFiles(outputDir);

    const found = input.installerName !== undefined
        ? files.find((file) => file === input.installerName)
        : pickInstaller(files, input.platform, input.productName);

    if (found === undefined) {
        const expected = input.installerName ?? INSTALLER_EXTENSIONS[input.platform].map((ext) => `*${ext}`).join(', ');
        throw new PackagerError(
            'ResultVerificationFailed',
            `jpackage reported success but no installer (${expected}) was found in ${outputDir}`
        );
    }

    return path.join(outputDir, found);
}
