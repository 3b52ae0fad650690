// src/lib/cli.ts
// Minimal `--key value` / `--flag` argv reader shared by the scripts.
import { MalformedInputError } from '@/lib/errors';

export type Flags = Map<string, string | true>;

export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = new Map();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      throw new MalformedInputError(`Unexpected argument "${arg}".`, { arg });
    }
    const eq = arg.indexOf('=');
    if (eq > 2) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }
    const key = arg.slice(2);
    const next = argv[i + 1];
    // negative numbers ("-5") are values, not flags
    if (next !== undefined && !next.startsWith('--')) {
      flags.set(key, next);
      i++;
    } else {
      flags.set(key, true);
    }
  }
  return flags;
}

export function stringFlag(flags: Flags, key: string): string | undefined {
  const v = flags.get(key);
  if (v === true) throw new MalformedInputError(`--${key} needs a value.`, { key });
  return v;
}

export function numberFlag(flags: Flags, key: string): number | undefined {
  const v = stringFlag(flags, key);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (v.trim() === '' || !Number.isFinite(n)) {
    throw new MalformedInputError(`--${key} must be a number, got "${v}".`, { key, value: v });
  }
  return n;
}

export function booleanFlag(flags: Flags, key: string): boolean {
  return flags.get(key) === true;
}
