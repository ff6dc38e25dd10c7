/**
 * Every value given for a repeatable option, as `--name value` or
 * `--name=value`, in command-line order.
 */
export function collectOption(rawArgs: readonly string[], name: string): string[] {
  const flag = `--${name}`;
  const values: string[] = [];

  for (let index = 0; index < rawArgs.length; index++) {
    const arg = rawArgs[index];
    if (arg === flag) {
      const next = rawArgs[index + 1];
      if (next !== undefined && !next.startsWith('-')) {
        values.push(next);
        index++;
      }
    } else if (arg?.startsWith(`${flag}=`)) {
      values.push(arg.slice(flag.length + 1));
    }
  }

  return values;
}

/**
 * Reads a `--name` / `--no-name` pair. The last occurrence wins; `undefined`
 * when neither was given.
 */
export function toggleOption(rawArgs: readonly string[], name: string): boolean | undefined {
  let value: boolean | undefined;
  for (const arg of rawArgs) {
    if (arg === `--${name}`) {
      value = true;
    } else if (arg === `--no-${name}`) {
      value = false;
    }
  }
  return value;
}
