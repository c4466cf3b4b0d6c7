/**
 * Console Transport
 *
 * One line per entry on stderr; stdout carries nothing but the task's result envelope.
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, ChalkInstance> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.cyan,
    debug: chalk.gray,
    silly: chalk.magenta,
};

export class ConsoleTransport implements LoggerTransport {
    private readonly colorize: boolean;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
    }

    /**
     * `<ISO timestamp> <LEVEL> [component:taskId] message {context}`
     */
    format(entry: LogEntry): string {
        const label = entry.level.toUpperCase().padEnd(5);
        const source = `[${entry.component}:${entry.taskId}]`;
        const context =
            entry.context && Object.keys(entry.context).length > 0
                ? ` ${JSON.stringify(entry.context)}`
                : '';

        if (!this.colorize) {
            return `${entry.timestamp} ${label} ${source} ${entry.message}${context}`;
        }
        return [
            chalk.dim(entry.timestamp),
            LEVEL_COLORS[entry.level](label),
            chalk.bold(source),
            entry.message + chalk.dim(context),
        ].join(' ');
    }

    write(entry: LogEntry): void {
        process.stderr.write(this.format(entry) + '\n');
    }
}
