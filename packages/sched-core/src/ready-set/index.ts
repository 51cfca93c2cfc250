export { createKeyedReadySet, compareKeys } from './keyed.js';
export { createFifoReadySet } from './fifo.js';
