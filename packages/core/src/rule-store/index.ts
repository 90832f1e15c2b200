export { RuleStore, nextSuccessRate, STARTER_SUGGESTIONS } from './rule-store.js';
export type { RuleUpdate } from './rule-store.js';
