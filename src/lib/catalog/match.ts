import type { RegexMode } from '../../config/catalog.config';
import { escapeRegex } from '../utils/strings';

export interface RegexPredicate {
  $regex: string;
  $options: 'i';
}

/**
 * Server error codes for a `$regex` the store cannot compile.
 * 51091 is "Regular expression is invalid"; older servers answer 2 (BadValue).
 */
const INVALID_REGEX_CODES: ReadonlySet<number> = new Set([51091, 2]);

/**
 * Turn user input into a regex fragment. Raw input goes to the store as-is,
 * so the store's regex dialect decides whether it compiles.
 */
export function toFragment(value: string, mode: RegexMode): string {
  return mode === 'escaped' ? escapeRegex(value) : value;
}

/** Case-insensitive substring match. */
export function containsPredicate(
  value: string,
  mode: RegexMode,
): RegexPredicate {
  return { $regex: toFragment(value, mode), $options: 'i' };
}

/** Case-insensitive match on the whole field value. */
export function exactPredicate(value: string, mode: RegexMode): RegexPredicate {
  return { $regex: `^${toFragment(value, mode)}$`, $options: 'i' };
}

/** True when the store refused a query because a `$regex` did not compile. */
export function isInvalidPatternError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  const code: unknown = err.code;
  if (typeof code !== 'number' || !INVALID_REGEX_CODES.has(code)) return false;
  return code === 51091 || /regular expression|regex/i.test(err.message);
}
