import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { ToolCommands } from '../types/packaging';

// blank variables count as unset
const optionalValue = z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().optional()
);

const EnvSchema = z.object({
    JPKG_MAVEN_COMMAND: optionalValue,
    JPKG_JPACKAGE_COMMAND: optionalValue,
    JAVA_HOME: optionalValue,
});

// Load environment variables from a .env file in the project directory
export function loadEnv(cwd: string = process.cwd()): void {
    dotenvConfig({ path: path.join(cwd, '.env') });
}

/**
 * Resolves the two tool executables. Explicit overrides win; otherwise
 * jpackage is taken from the JDK named by JAVA_HOME, falling back to PATH.
 */
export function resolveToolCommands(
    env: NodeJS.ProcessEnv = process.env,
    host: NodeJS.Platform = process.platform
): ToolCommands {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
    }
    const { JPKG_MAVEN_COMMAND, JPKG_JPACKAGE_COMMAND, JAVA_HOME } = parsed.data;

    const pathApi = host === 'win32' ? path.win32 : path.posix;
    const jpackage =
        JPKG_JPACKAGE_COMMAND ??
        (JAVA_HOME ? pathApi.join(JAVA_HOME, 'bin', 'jpackage') : 'jpackage');

    return {
        maven: JPKG_MAVEN_COMMAND ?? 'mvn',
        jpackage,
    };
}
