/**
 * State Management
 *
 * Append-only, per-run store of step results. A pre-populated state
 * can be handed to a new execution to resume a run.
 */

export * from './ExecutionState.js';
