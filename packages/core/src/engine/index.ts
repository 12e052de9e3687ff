// packages/core/src/engine -- Report runs and progress events

export { EventBus } from './event-bus.js';
export { runReports, resolveRunOptions } from './runner.js';
export type { RunOutcome, RunReportsOptions } from './runner.js';
