export function parseCliOptionMap(args: string[], flags: readonly string[] = []): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    if (flags.includes(key)) {
      options.set(key, 'true');
      continue;
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

export function requireOption(options: Map<string, string>, key: string): string {
  const value = options.get(key)?.trim();
  if (!value) {
    throw new Error(`Missing required option '--${key}'`);
  }
  return value;
}
