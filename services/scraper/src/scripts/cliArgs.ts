/**
 * `--key=value` flag parsing shared by the CLI entry points.
 *
 * A bare `--flag` reads as "true". Keys not given on the command line fall
 * back to `SHOTMAP_<UPPER_SNAKE_KEY>` environment variables.
 */

export type RawArgs = Record<string, string>;

export function parseFlags(argv: readonly string[]): RawArgs {
  const args: RawArgs = {};
  for (const arg of argv) {
    if (!arg.startsWith("--")) continue;
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    if (eq === -1) {
      args[body] = "true";
    } else {
      args[body.slice(0, eq)] = body.slice(eq + 1);
    }
  }
  return args;
}

export function envKey(key: string): string {
  return `SHOTMAP_${key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase()}`;
}

export function withEnvFallback(
  args: RawArgs,
  keys: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): RawArgs {
  const merged: RawArgs = {};
  for (const key of keys) {
    const value = args[key] ?? env[envKey(key)];
    if (value !== undefined && value !== "") merged[key] = value;
  }
  return merged;
}
