/**
 * Pre-parse helpers for flags that must be known before the commander
 * program is built (the config file decides which commands exist).
 */

const FLAG_TERMINATOR = "--";

/**
 * Value of `--flag value` or `--flag=value`.
 * `undefined` when absent, `null` when present without a value.
 */
export function getFlagValue(argv: string[], name: string): string | null | undefined {
  const args = argv.slice(2);
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === FLAG_TERMINATOR) break;
    if (arg === name) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("-")) return null;
      return next;
    }
    if (arg.startsWith(`${name}=`)) {
      const value = arg.slice(name.length + 1);
      return value.length > 0 ? value : null;
    }
  }
  return undefined;
}

export function hasFlag(argv: string[], name: string): boolean {
  const args = argv.slice(2);
  for (const arg of args) {
    if (arg === FLAG_TERMINATOR) break;
    if (arg === name) return true;
  }
  return false;
}
