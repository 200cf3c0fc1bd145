export { Orchestrator } from './Orchestrator.ts';
export type * from './types.ts';
