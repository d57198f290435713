export * from './complex';
export * from './errors';
export * from './terms';
export * from './indexed';
export * from './ladder';
export * from './swap-tracking-sort';
export * from './combining-algebra';
export * from './normal-order';
export * from './mixed-systems';
export * from './pauli';
export * from './pauli-register';
export * as fenwick from './fenwick-tree';
export type { FenwickTree } from './fenwick-tree';
export * from './majorana-encoding';
export * from './tree-encoding';
export * from './hamiltonian';
export * from './parse';
export { debugLogger, DebugLogger, LogComponent, LogLevel } from './debug-logger';
export type { LoggerSettings } from './debug-logger';
