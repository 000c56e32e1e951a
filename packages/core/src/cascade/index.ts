export { VisibilityResolver } from './visibility-resolver.js';
export { planPersonPurge, summarizePurge } from './purge-planner.js';
export type { PurgePlan, PurgeReport } from './purge-planner.js';
