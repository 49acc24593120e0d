export { isTightList } from './list-tightness.js';
export type { ItemGaps } from './list-tightness.js';
