/**
 * Well-known keys written into span data
 */

/** Name given to spans created without one */
export const DEFAULT_SPAN_NAME = 'no-name';

/** Name of the root span a Tracing creates */
export const DEFAULT_ROOT_NAME = 'root';

/** Name of the span written by `logWithTrace` */
export const LOG_WITH_TRACE_NAME = 'log_with_trace';

// Scope timing
export const START_TIME_KEY = 'start_time';
export const END_TIME_KEY = 'end_time';

// Function wrapper
export const FUNCTION_DECORATOR_KEY = 'trace_function';
export const FUNCTION_NAME_KEY = 'name';
export const FUNCTION_ARGS_KEY = 'args';
export const FUNCTION_RETURNED_KEY = 'returned';

// Exceptions raised inside a scope
export const EXCEPTION_KEY = 'exception';
export const EXCEPTION_TYPE_KEY = 'type';
export const EXCEPTION_MESSAGE_KEY = 'message';
export const EXCEPTION_STACKTRACE_KEY = 'stacktrace';
