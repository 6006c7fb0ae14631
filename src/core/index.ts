/**
 * Core Module Exports
 *
 * The command context threaded through every operation.
 */

export type { CommandContext, ProgressReporter, ContextOptions } from './context';
export { createCommandContext, confirmStep } from './context';
