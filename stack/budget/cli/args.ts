export function requireArg(value: string | undefined, usage: string): asserts value is string {
  if (!value) {
    console.error(`Usage: npm run budget -- ${usage}`);
    process.exit(1);
  }
}

export function requireId(value: string, label: string): number {
  if (!/^\d+$/u.test(value)) {
    console.error(`${label} must be a positive integer, got "${value}"`);
    process.exit(1);
  }
  return Number(value);
}
