import chalk from 'chalk';
import { isPackagerError } from './errors';

export function printSuccess(message: string): void {
    console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
    console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
    console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
    console.log(chalk.blue('i'), message);
}

export function printStage(step: number, total: number, title: string): void {
    console.log();
    console.log(chalk.bold(`[${step}/${total}] ${title}`));
}

/* echo of an external command for --verbose; arguments with spaces or quotes are JSON-quoted */
export function formatCommand(command: string, args: string[]): string {
    return [command, ...args]
        .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
        .join(' ');
}

export function reportError(error: unknown): void {
    if (isPackagerError(error)) {
        printError(`[${error.code}] ${error.message}`);
        if (error.exitCode !== undefined) {
            console.error(chalk.gray(`  tool exit code: ${error.exitCode}`));
        }
        if (error.hint) {
            console.error(chalk.gray(`  ${error.hint}`));
        }
        return;
    }
    printError(error instanceof Error ? error.message : String(error));
}
