const SAFE_WORD = /^[A-Za-z0-9@%+=:,./_-]+$/;

/**
 * Quotes a value so a POSIX shell reads it back as exactly one literal word.
 * Plain words pass through untouched; everything else is single-quoted, with
 * embedded single quotes closed, emitted inside double quotes, and reopened.
 */
export function shellQuote(value: string): string {
  if (value === "") {
    return "''";
  }
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(" ");
}
