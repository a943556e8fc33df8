import { exitWithValidationError } from '../../utils.js';

/**
 * Counts repeated flags such as `-vvv`.
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export interface NonEmptyOption {
  value: string | undefined;
  optionName: string;
}

/**
 * Rejects an option that was given an empty string.
 */
export function parseNonEmptyOption(opts: NonEmptyOption): string | undefined {
  if (opts.value === '') {
    exitWithValidationError({
      message: `${opts.optionName} must not be empty`,
    });
  }
  return opts.value;
}
