import { encodeEnvelope } from '../envelope/envelope.js';
import { WoStatus } from '../envelope/types.js';
import type { JsonObject } from '../envelope/types.js';
import { getDefaultLogger } from '../logger/factory.js';
import { MsaLogComponent } from '../logger/types.js';
import type { Logger } from '../logger/types.js';

export type TerminalStatus = typeof WoStatus.ENDED | typeof WoStatus.FAILED;

/**
 * Final result of a task: the envelope line written for the orchestrator
 * and the exit code the process must end with.
 */
export interface TaskOutcome {
    status: TerminalStatus;
    exitCode: 0 | 1;
    /** Envelope JSON, as written to the output */
    payload: string;
}

export interface OutputStream {
    write(chunk: string, callback?: (error?: Error | null) => void): boolean;
}

export interface ReportOptions {
    /** Log the params (without TOKEN); defaults to true */
    log?: boolean;
    logger?: Logger | undefined;
    /** Defaults to process.stdout */
    output?: OutputStream | undefined;
}

const EXIT_CODES: Record<TerminalStatus, 0 | 1> = {
    [WoStatus.ENDED]: 0,
    [WoStatus.FAILED]: 1,
};

function report(
    status: TerminalStatus,
    comment: string,
    params: JsonObject,
    options: ReportOptions
): TaskOutcome {
    const log = options.log ?? true;
    const payload = encodeEnvelope(status, comment, params, {
        log,
        logger: log
            ? (options.logger ?? getDefaultLogger()).createChild(MsaLogComponent.REPORTER)
            : undefined,
    });
    const output: OutputStream = options.output ?? process.stdout;
    output.write(payload + '\n');
    return { status, exitCode: EXIT_CODES[status], payload };
}

/**
 * Write a FAILED envelope for the orchestrator; the task must then exit with code 1
 */
export function reportFailure(
    comment: string,
    params: JsonObject = {},
    options: ReportOptions = {}
): TaskOutcome {
    return report(WoStatus.FAILED, comment, params, options);
}

/**
 * Write an ENDED envelope for the orchestrator; the task must then exit with code 0
 */
export function reportSuccess(
    comment: string,
    params: JsonObject = {},
    options: ReportOptions = {}
): TaskOutcome {
    return report(WoStatus.ENDED, comment, params, options);
}
