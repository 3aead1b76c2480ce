export { ExponentialBackoff } from './exponential-backoff';
export type { BackoffConfig } from './exponential-backoff';
export { FailureCategory, classifyHttpStatus, describeTransportError } from './failure-classification';
export { getErrorMessage } from './error-handling';
