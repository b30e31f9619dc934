export { OAuth2Flow, readCallbackParam } from './oauth2-flow.js';
export type { OAuth2FlowOptions } from './oauth2-flow.js';
export { RandomStateGenerator } from './state.js';
export type { StateGenerator } from './state.js';
export { InMemoryStateStore } from './state-store.js';
