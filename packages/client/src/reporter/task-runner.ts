import { MsaRuntimeError } from '../errors/MsaRuntimeError.js';
import { getDefaultLogger } from '../logger/factory.js';
import { MsaLogComponent } from '../logger/types.js';
import type { Logger } from '../logger/types.js';
import { reportFailure } from './task-reporter.js';
import type { OutputStream, TaskOutcome } from './task-reporter.js';

export type TaskFunction = () => TaskOutcome | Promise<TaskOutcome>;

export interface RunTaskOptions {
    logger?: Logger | undefined;
    output?: OutputStream | undefined;
    /** Defaults to process.exit */
    exit?: ((code: number) => void) | undefined;
}

function flush(output: OutputStream): Promise<void> {
    return new Promise((resolve) => {
        output.write('', () => resolve());
    });
}

/**
 * Entry point of a task process.
 *
 * Runs the task, turns an uncaught error into a FAILED report, waits for the
 * envelope line to be flushed, closes the logger's transports and exits with the
 * outcome's code. Nothing else in the SDK ends the process.
 */
export async function runTask(task: TaskFunction, options: RunTaskOptions = {}): Promise<void> {
    const logger = (options.logger ?? getDefaultLogger()).createChild(MsaLogComponent.REPORTER);
    const output: OutputStream = options.output ?? process.stdout;
    const exit = options.exit ?? ((code: number) => process.exit(code));

    let outcome: TaskOutcome;
    try {
        outcome = await task();
    } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        logger.trackException(err, err instanceof MsaRuntimeError ? { code: err.code } : {});
        outcome = reportFailure(err.message, {}, { log: false, logger, output });
    }

    await flush(output);
    await logger.destroy();
    exit(outcome.exitCode);
}
