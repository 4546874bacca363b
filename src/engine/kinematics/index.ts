export * from './axis-state.js';
export * from './rules.js';
export * from './axis-solver.js';
export * from './coordinator.js';
export * from './derived.js';
export * from './input.js';
export * from './session.js';
