export type * from './outcome.js';
export type * from './session.js';
export type * from './probe.js';
