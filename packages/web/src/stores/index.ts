export { createGateStore } from './gate-store';
export type { GateStore, GateStoreState } from './gate-store';
