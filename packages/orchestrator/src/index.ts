export { TaskOrchestrator, validateRecipient } from './task-orchestrator.js';
export { CompletionChannel } from './channel.js';
export { applyCompletion, isActive, isTerminal } from './operation-state.js';
export { deriveControls } from './controls.js';
export type { Controls } from './controls.js';
export type * from './types.js';
