export { KubernetesClient, KubernetesClientConfig, AuthMethod } from './KubernetesClient.js';

// Export base resource operations
export {
  ResourceOperationOptions,
  BaseResourceOperations,
  ALL_NAMESPACES,
  isAllNamespaces,
} from './BaseResourceOperations.js';

// Export resource operations
export {
  MetricOperations,
  NodeMetrics,
  PodMetrics,
  isNodeReady,
} from './resources/MetricOperations.js';
export { PodOperations, toPodSummary } from './resources/PodOperations.js';
export { NamespaceOperations, toNamespaceSummary } from './resources/NamespaceOperations.js';
export { ClusterInfoOperations, nodeRoles } from './resources/ClusterInfoOperations.js';

// Export error handling
export {
  KubernetesError,
  AuthenticationError,
  AuthorizationError,
  ResourceNotFoundError,
  ServerUnavailableError,
  TimeoutError,
  NetworkError,
  convertApiError,
} from './ErrorHandling.js';

export {
  parseQuantity,
  parseCpuCores,
  parseMemoryBytes,
  BYTES_PER_GIB,
  BYTES_PER_MIB,
} from './utils/QuantityParser.js';
