export {
  EDGE,
  EDGE_PLACEHOLDERS,
  EDGE_PLACEHOLDER_KEYS,
  PUBLIC_FILES,
  type EdgePlaceholderKey,
  type EdgeDeployValues,
} from './edge.js';
