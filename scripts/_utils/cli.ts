/** Reads `--name=value` or `--name value`. */
export function readFlag(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(prefix)) return arg.slice(prefix.length);
    if (arg === `--${name}`) {
      const next = argv[i + 1];
      return next !== undefined && !next.startsWith("--") ? next : "";
    }
  }
  return undefined;
}

export function readIntFlag(argv: string[], name: string): number | undefined {
  const raw = readFlag(argv, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(n)) {
    throw new Error(`--${name} expects an integer, got "${raw}"`);
  }
  return n;
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(`--${name}`);
}
