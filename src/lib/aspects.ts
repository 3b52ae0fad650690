// FILE: src/lib/aspects.ts
import { z } from "zod";
import { normalizeDeg } from "@/lib/astro";
import { MalformedInputError } from "@/lib/errors";
import { ASPECT_COLORS } from "@/lib/graphics/tokens";

export const AspectDefinitionSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  angle: z.number().min(0).max(180),
  orb: z.number().finite().min(0),
  symbol: z.string(),
  color: z.string(),
});
export type AspectDefinition = z.infer<typeof AspectDefinitionSchema>;

/** Order matters: the first definition within orb wins for a pair. */
export const DEFAULT_ASPECTS: readonly AspectDefinition[] = [
  { key: "conj", name: "Conjunction", angle: 0,   orb: 6, symbol: "☌", color: ASPECT_COLORS.conjunction },
  { key: "sext", name: "Sextile",     angle: 60,  orb: 6, symbol: "✶", color: ASPECT_COLORS.sextile },
  { key: "sq",   name: "Square",      angle: 90,  orb: 6, symbol: "□", color: ASPECT_COLORS.square },
  { key: "tri",  name: "Trine",       angle: 120, orb: 6, symbol: "△", color: ASPECT_COLORS.trine },
  { key: "opp",  name: "Opposition",  angle: 180, orb: 6, symbol: "☍", color: ASPECT_COLORS.opposition },
];

export type AspectHit<B extends string = string> = {
  a: B;
  b: B;
  aspect: AspectDefinition;
  separation: number;  // [0, 180]
  deviation: number;   // separation - aspect.angle
};

/** Shortest angular distance, in [0, 180]. */
export function angularSeparation(a: number, b: number): number {
  const d = normalizeDeg(Math.abs(a - b));
  return d > 180 ? 360 - d : d;
}

/** Validates a caller-supplied table; order is kept as given. */
export function parseAspectTable(input: unknown): AspectDefinition[] {
  const parsed = z.array(AspectDefinitionSchema).safeParse(input);
  if (!parsed.success) {
    throw new MalformedInputError("Invalid aspect table.", parsed.error.issues);
  }
  return parsed.data;
}

/** Same table, same order, new orbs by position. Missing entries keep their orb. */
export function withOrbs(
  table: readonly AspectDefinition[],
  orbs: readonly (number | undefined)[],
): AspectDefinition[] {
  return table.map((def, i) => {
    const orb = orbs[i];
    if (orb === undefined) return { ...def };
    if (!Number.isFinite(orb) || orb < 0) {
      throw new MalformedInputError(`Invalid orb for ${def.name}: ${orb}.`, { key: def.key, orb });
    }
    return { ...def, orb };
  });
}

/**
 * "8,5,6,6,8" → one orb per table entry. Blank or non-numeric entries keep
 * the default; entries past the table length are ignored.
 */
export function parseOrbList(text: string | undefined, defaultOrb: number, count = DEFAULT_ASPECTS.length): number[] {
  const orbs = Array.from({ length: count }, () => defaultOrb);
  if (!text) return orbs;
  const parts = text.split(",").map((p) => p.trim()).filter((p) => p !== "");
  parts.slice(0, count).forEach((part, i) => {
    const n = Number(part);
    if (Number.isFinite(n) && n >= 0) orbs[i] = n;
  });
  return orbs;
}

export function matchAspect(
  separation: number,
  table: readonly AspectDefinition[],
): AspectDefinition | null {
  for (const def of table) {
    if (Math.abs(separation - def.angle) <= def.orb) return def;
  }
  return null;
}

/** Every unordered pair i < j, in input order. Unmatched pairs are omitted. */
export function detectAspects<B extends string>(
  bodies: readonly B[],
  longitudes: readonly number[],
  table: readonly AspectDefinition[] = DEFAULT_ASPECTS,
): AspectHit<B>[] {
  if (bodies.length !== longitudes.length) {
    throw new MalformedInputError(
      `Got ${bodies.length} bodies but ${longitudes.length} longitudes.`,
    );
  }
  const hits: AspectHit<B>[] = [];
  for (let i = 0; i < bodies.length; i++) {
    for (let j = i + 1; j < bodies.length; j++) {
      const separation = angularSeparation(longitudes[i], longitudes[j]);
      const aspect = matchAspect(separation, table);
      if (!aspect) continue;
      hits.push({ a: bodies[i], b: bodies[j], aspect, separation, deviation: separation - aspect.angle });
    }
  }
  return hits;
}

export function formatAspectLabel(hit: Pick<AspectHit, "aspect" | "deviation">): string {
  const sign = hit.deviation < 0 ? "-" : "+";
  return `${hit.aspect.symbol}${sign}${Math.abs(hit.deviation).toFixed(2)}°`;
}

export type AspectGrid<B extends string = string> = {
  names: B[];
  rows: string[][];
};

/** Symmetric matrix of aspect labels; "" where a pair has no aspect. */
export function aspectGrid<B extends string>(
  bodies: readonly B[],
  longitudes: readonly number[],
  table: readonly AspectDefinition[] = DEFAULT_ASPECTS,
): AspectGrid<B> {
  if (bodies.length !== longitudes.length) {
    throw new MalformedInputError(
      `Got ${bodies.length} bodies but ${longitudes.length} longitudes.`,
    );
  }
  const n = bodies.length;
  const rows = Array.from({ length: n }, () => Array.from({ length: n }, () => ""));
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const separation = angularSeparation(longitudes[i], longitudes[j]);
      const aspect = matchAspect(separation, table);
      if (!aspect) continue;
      const label = formatAspectLabel({ aspect, deviation: separation - aspect.angle });
      rows[i][j] = label;
      rows[j][i] = label;
    }
  }
  return { names: [...bodies], rows };
}
