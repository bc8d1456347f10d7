import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { PackagerError } from './errors';
import { printWarning } from './output';
import type { BuildArtifact } from '../types/packaging';

export const BUILD_OUTPUT_DIR = 'target';
export const ARTIFACT_SUFFIX = '-jar-with-dependencies.jar';

// checked by code: core errors can come from another realm and fail `instanceof Error`
export function isNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function findFiles(dir: string, predicate: (fileName: string) => boolean): Promise<string[]> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
        if (isNotFound(error)) return [];
        throw error;
    }

    const matches: string[] = [];
    for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            matches.push(...(await findFiles(entryPath, predicate)));
        } else if (entry.isFile() && predicate(entry.name)) {
            matches.push(entryPath);
        }
    }
    return matches;
}

/**
 * Finds the dependency-bundled jar under target/. When the build left more
 * than one, the first in path order wins and the rest are reported.
 */
export async function locateArtifact(cwd: string): Promise<BuildArtifact> {
    const outputDir = path.join(cwd, BUILD_OUTPUT_DIR);
    const matches = (await findFiles(outputDir, (name) => name.endsWith(ARTIFACT_SUFFIX))).sort();

    const [first, ...others] = matches;
    if (first === undefined) {
        throw new PackagerError('ArtifactNotFound', `No *${ARTIFACT_SUFFIX} found under ${outputDir}`, {
            hint: 'Configure maven-assembly-plugin with the jar-with-dependencies descriptor.',
        });
    }

    if (others.length > 0) {
        printWarning(
            `Found ${matches.length} bundled jars, using ${path.relative(cwd, first)}; ignoring ${others
                .map((file) => path.relative(cwd, file))
                .join(', ')}`
        );
    }

    return {
        path: first,
        directory: path.dirname(first),
        fileName: path.basename(first),
    };
}
