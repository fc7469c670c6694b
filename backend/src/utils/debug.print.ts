import chalk from 'chalk';
import config from '@/config.js';

// dates -> iso strings so nested payloads print readably
function toPrintable(value: unknown): unknown {
    return JSON.parse(JSON.stringify(value));
}

export function debugPrint(obj: object, title = 'Debug Info') {
    if (!config.DEBUG) return;

    console.log();
    console.log(chalk.cyan.bold(`--- ${chalk.white.bold(title)} ---`));

    for (const [key, value] of Object.entries(obj)) {
        let displayValue: string;

        if (value === undefined || value === null) {
            displayValue = chalk.gray('(none)');
        } else if (value instanceof Date) {
            displayValue = chalk.magenta(value.toISOString());
        } else if (Array.isArray(value)) {
            displayValue = chalk.yellow(value.length ? value.join(', ') : '(empty array)');
        } else if (typeof value === 'object') {
            displayValue = chalk.magentaBright(JSON.stringify(toPrintable(value), null, 2));
        } else {
            displayValue = chalk.cyanBright(String(value));
        }

        console.log(chalk.green(`${key.padEnd(12)}:`), displayValue);
    }

    console.log(chalk.cyan.bold('---------------------------------------------'));
    console.log();
}
