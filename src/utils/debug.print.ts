import chalk from 'chalk';

export type DebugValue = string | number | boolean | Date | null | undefined;

function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function formatValue(key: string, value: DebugValue): string {
    if (value === undefined || value === null) {
        return chalk.gray('(none)');
    }
    if (value instanceof Date) {
        return chalk.magenta(value.toISOString());
    }
    // *_size fields are byte counts
    if (typeof value === 'number' && key.endsWith('_size')) {
        return chalk.yellow(formatBytes(value));
    }
    return chalk.cyanBright(String(value));
}

// console summary of one upload; callers gate this on debug logging
export function debugPrint(fields: Record<string, DebugValue>, title = 'Debug Info') {
    const width = Math.max(...Object.keys(fields).map(key => key.length), 8);

    console.log();
    console.log(chalk.cyan.bold(`--- ${chalk.white.bold(title)} ---`));

    for (const [key, value] of Object.entries(fields)) {
        console.log(chalk.green(`${key.padEnd(width)}:`), formatValue(key, value));
    }

    console.log(chalk.cyan.bold('---------------------------------------------'));
    console.log();
}
