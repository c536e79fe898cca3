export { StateTransitionEngine, DEFAULT_TRANSITION_CONFIG, HOUR_MS, DAY_MS } from './StateTransitionEngine.js';
export type { StateTransitionConfig, TransitionResult } from './StateTransitionEngine.js';
export { InMemoryStateStore, JsonFileStateStore, isStateEntry } from './StateStore.js';
export type { StateStore } from './StateStore.js';
