export { reportSuccess, reportFailure } from './task-reporter.js';
export type { TaskOutcome, TerminalStatus, ReportOptions, OutputStream } from './task-reporter.js';
export { runTask } from './task-runner.js';
export type { TaskFunction, RunTaskOptions } from './task-runner.js';
