export { warm, burn, cool, freeze, applyTransition, TRANSITION_SOURCES } from './transitions.js';
export type { Transition, TransitionKind } from './transitions.js';
export { sweepThawed } from './sweep.js';
