export {
  runFilters,
  orderFilters,
  deny,
  ADMIT,
  FILTER_STAGES,
  type Filter,
  type FilterContext,
  type FilterDecision,
  type FilterStage,
} from './gate.js';
export { privateOnly, publicOnly, ownerOnly } from './authorize.js';
export { requireDependencies } from './dependency.js';
export { rateLimit, type RateLimitOptions } from './rate-limit.js';
