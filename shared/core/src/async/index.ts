export {
  AbortedError,
  isAbortError,
  linkAbortSignals,
  mapConcurrent,
  sleep,
} from './async-utils';
export type { LinkedSignal } from './async-utils';
