export { WorkerError, WorkerErrorCode, errorCodeOf, errorMessageOf } from './worker-error';
export { MalformedLocatorError } from './malformed-locator.error';
export { FetchError } from './fetch.error';
export { ValidationTimeoutError } from './validation-timeout.error';
export { InvalidDispatchRowError } from './invalid-dispatch-row.error';
