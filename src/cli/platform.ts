import { PackagerError } from './errors';
import type { Platform } from '../types/packaging';

export function resolvePlatform(host: NodeJS.Platform = process.platform): Platform {
    switch (host) {
        case 'win32':
            return 'windows';
        case 'linux':
            return 'linux';
        case 'darwin':
            return 'macos';
        default:
            throw new PackagerError('UnsupportedPlatform', `Unsupported platform: ${host}`, {
                hint: 'jpackage builds installers on Windows, Linux and macOS only.',
            });
    }
}
