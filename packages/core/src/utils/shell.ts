const SAFE_WORD = /^[\w@%+=:,./-]+$/;

/**
 * Quote a value for a POSIX shell. Plain words are left as they are.
 */
export function shellQuote(value: string): string {
  if (value.length > 0 && SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}
