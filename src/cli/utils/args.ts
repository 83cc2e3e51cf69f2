/**
 * First argument that is neither a flag nor the value of one of valueFlags
 * e.g. findPositional(['--out', 'site', 'docs'], ['--out']) === 'docs'
 */
export function findPositional(args: string[], valueFlags: string[]): string | undefined {
  const consumed = new Set<number>();
  args.forEach((arg, index) => {
    if (valueFlags.includes(arg) && index + 1 < args.length) {
      consumed.add(index + 1);
    }
  });
  return args.find((arg, index) => !arg.startsWith('-') && !consumed.has(index));
}

/**
 * Value following a flag, e.g. readFlagValue(['--out', 'dist'], '--out') === 'dist'
 * A missing value, or one that is itself a flag, yields undefined
 */
export function readFlagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) {
    return undefined;
  }
  const value = args[idx + 1];
  return value.startsWith('--') ? undefined : value;
}
