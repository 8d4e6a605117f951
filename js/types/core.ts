/**
 * @asType integer
 * @minimum 0
 */
export type Uint = number;

/**
 * Non-negative counter.
 * @asType integer
 * @minimum 0
 */
export type Counter = Uint;

/** Non-negative duration in microseconds. */
export type Microseconds = Uint;

/** Non-negative duration in milliseconds. */
export type Milliseconds = Uint;

/** Name represented as canonical URI. */
export type Name = string;

/**
 * Process exit status.
 * 0 = success, 1 = runtime failure, 2 = usage or configuration error.
 */
export type ExitCode = 0 | 1 | 2;
