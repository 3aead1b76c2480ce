export { RequestDispatcher } from './request-dispatcher';
export type { DispatchOptions, RequestDispatcherOptions } from './request-dispatcher';
export { MethodRegistry, DuplicateMethodError } from './method-registry';
export type { HandlerBinding, HandlerContext, HandlerServices, MethodHandler } from './types';
