export function getArg(flag: string, argv: string[] = process.argv): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function hasFlag(flag: string, argv: string[] = process.argv): boolean {
  return argv.includes(flag);
}

export function parseThresholdArg(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`--threshold must be a non-negative number, got ${raw}`);
  }
  return value;
}
