import type { TransformFnParams } from 'class-transformer';

/**
 * Query-string number for `@Transform`: an empty or blank value counts as
 * absent, anything else goes through Number() and is left for the
 * validators to judge.
 */
export function toOptionalNumber({ value }: TransformFnParams): unknown {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') return value;
  return value.trim() === '' ? undefined : Number(value);
}
