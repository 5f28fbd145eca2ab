// Characters that never need quoting in a POSIX shell word
const SAFE_WORD_REGEX = /^[A-Za-z0-9_\-+=.,:/@%^]+$/;

/**
 * Quote a single argument for a POSIX shell.
 *
 * @example shellQuote("my-app:lib") → "my-app:lib"
 * @example shellQuote("it's here") → "'it'\''s here'"
 * @example shellQuote("") → "''"
 */
export function shellQuote(arg: string): string {
  if (arg === "") return "''";
  if (SAFE_WORD_REGEX.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
