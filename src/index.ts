// module entry point

// Harness
export * from './lib/harness/index';

// Processors and sessions
export * from './lib/processor/index';
export * from './lib/flow/index';

// Controller services
export * from './lib/services/index';

// Properties, relationships and validation
export * from './lib/properties/index';

// Lifecycle hooks
export * from './lib/lifecycle/index';

// Errors
export * from './lib/errors';

// Logging
export * from './lib/logger/index';

// ID Helpers
export {
  generateID,
  validateID,
  type IdentifierType,
  IDENTIFIER_TYPES,
} from './lib/id-helpers';

// Event handling
export {
  EventEmitterProtected,
  type EventEmitterOptions,
  type EventListener,
  type ListenerErrorHandler,
} from './lib/event-emitter';

// Utility functions
export { errorToString, type ErrorToStringOptions } from './lib/error-to-string';
export { fillTemplate } from './lib/fill-template';
export { KeyValueTextTable } from './lib/text-table';
export { sleep } from './lib/sleep';
export {
  isFunction,
  isNumber,
  isPositiveInteger,
  isPromise,
  isString,
} from './lib/type-guards';
