// src/lib/schemas.ts
import { z } from "zod";
import { AspectDefinitionSchema } from "@/lib/aspects";
import { MalformedInputError } from "@/lib/errors";

export const timezoneInputSchema = z.union([
  z.number().finite(),
  z.string().trim().min(1),
  z.object({ kind: z.literal("fixed"), offsetHours: z.number().finite() }),
  z.object({ kind: z.literal("named"), zone: z.string().trim().min(1) }),
]);

export const chartRequestSchema = z
  .object({
    date: z.string().trim().min(1),
    time: z.string().trim().min(1),
    // omitted: the configured fixed offset
    timezone: timezoneInputSchema.optional(),
    latitude: z.number().finite().optional(),
    longitude: z.number().finite().optional(),
    houseSystem: z.string().trim().min(1).optional(),
    zodiac: z.enum(["tropical", "sidereal"]).optional(),
    center: z.enum(["geo", "helio"]).optional(),
    nodeType: z.enum(["true", "mean"]).optional(),
    includeNodes: z.boolean().optional(),
    siderealFrame: z.enum(["fagan_bradley", "lahiri", "raman", "krishnamurti"]).optional(),
    ayanamsaOffset: z.number().finite().optional(),
    orb: z.number().min(0).max(180).optional(),
    orbList: z.string().optional(),
    aspects: z.array(AspectDefinitionSchema).min(1).optional(),
    includeAspects: z.boolean().optional(),
  })
  .refine((r) => (r.latitude === undefined) === (r.longitude === undefined), {
    message: "latitude and longitude go together",
    path: ["latitude"],
  });

export type TimezoneInput = z.infer<typeof timezoneInputSchema>;
export type ChartRequest = z.infer<typeof chartRequestSchema>;

export function parseChartRequest(input: unknown): ChartRequest {
  const parsed = chartRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedInputError("Invalid chart request.", parsed.error.issues);
  }
  return parsed.data;
}
