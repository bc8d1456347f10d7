import fs from 'fs';
import path from 'path';
import { printWarning } from './output';
import type { Platform } from '../types/packaging';

export const ICON_DIR = 'icons';

export const ICON_EXTENSIONS: Record<Platform, string> = {
    windows: '.ico',
    linux: '.png',
    macos: '.icns',
};

export function iconPath(cwd: string, platform: Platform, baseName: string): string {
    return path.join(cwd, ICON_DIR, `${baseName}${ICON_EXTENSIONS[platform]}`);
}

/* a missing icon only means jpackage falls back to its default */
export function resolveIcon(cwd: string, platform: Platform, baseName: string): string | undefined {
    const candidate = iconPath(cwd, platform, baseName);
    if (fs.existsSync(candidate)) {
        return candidate;
    }
    printWarning(`Icon ${path.relative(cwd, candidate)} not found, using the default icon`);
    return undefined;
}
