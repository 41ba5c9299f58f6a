export {
  createChainQueryEngine,
  resolveWindow,
  DEFAULT_WINDOW_HOURS,
  type ChainQueryEngine,
  type ChainQueryOptions,
} from './chain-query.js';
export { topologicalOrder, summarizeOutput } from './ordering.js';
