import { promises as fs } from 'fs';
import path from 'path';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { PackagerError } from './errors';
import type { ProjectMetadata } from '../types/packaging';

export const DESCRIPTOR_FILE = 'pom.xml';

// keep "1.0" as a string and ignore attributes such as xmlns
const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readText(node: Record<string, unknown>, key: string): string | undefined {
    if (!(key in node)) return undefined;
    const value = node[key];
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number') return String(value);
    // an element with child elements or repeated elements has no usable text
    return '';
}

/**
 * Reads the artifactId and version from the pom.xml in `cwd`.
 * A missing <version> is inherited from <parent>; an empty one is an error.
 */
export async function readProjectMetadata(cwd: string): Promise<ProjectMetadata> {
    const descriptorPath = path.join(cwd, DESCRIPTOR_FILE);

    let xml: string;
    try {
        xml = await fs.readFile(descriptorPath, 'utf8');
    } catch (error) {
        throw new PackagerError('MissingDescriptor', `No ${DESCRIPTOR_FILE} found in ${cwd}`, {
            hint: 'Run jpkg from the root of a Maven project.',
            cause: error,
        });
    }

    return parseProjectMetadata(xml, descriptorPath);
}

export function parseProjectMetadata(xml: string, source: string = DESCRIPTOR_FILE): ProjectMetadata {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new PackagerError(
            'IncompleteMetadata',
            `Failed to parse ${source}: ${validation.err.msg} (line ${validation.err.line})`
        );
    }

    const document: unknown = parser.parse(xml);
    const project = isRecord(document) ? document.project : undefined;
    if (!isRecord(project)) {
        throw new PackagerError('IncompleteMetadata', `Missing <project> root element in ${source}`);
    }

    const name = readText(project, 'artifactId');
    let version = readText(project, 'version');
    if (version === undefined && isRecord(project.parent)) {
        version = readText(project.parent, 'version');
    }

    const missing: string[] = [];
    if (!name) missing.push('artifactId');
    if (!version) missing.push('version');
    if (!name || !version) {
        throw new PackagerError(
            'IncompleteMetadata',
            `Missing or empty ${missing.join(' and ')} in ${source}`
        );
    }

    return { name, version };
}
