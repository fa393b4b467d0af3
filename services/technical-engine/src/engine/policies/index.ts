export { EntryPolicy } from './EntryPolicy';
export { PositionPolicy } from './PositionPolicy';
export { ReactivationPolicy } from './ReactivationPolicy';
export { ReversalPolicy } from './ReversalPolicy';
export type { PolicyInput, PolicyOutcome } from './types';
