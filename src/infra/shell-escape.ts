/**
 * POSIX single-quote escaping for values interpolated into `sh -c` strings.
 */
export function escapeShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
