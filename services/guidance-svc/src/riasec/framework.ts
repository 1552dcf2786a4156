import { readFileSync } from 'fs';
import { join } from 'path';

import { z } from 'zod';

export const DEFAULT_FRAMEWORK_PATH = join(__dirname, '..', '..', 'data', 'riasec-framework.json');

const phraseList = z.array(z.string().min(1)).default([]);

const TypeProfileSchema = z.object({
  name: z.string().min(1),
  title: z.string().min(1),
  drive: z.string().min(1),
  expression: z.string().min(1),
  amplifier: z.string().min(1),
  gift: z.string().min(1),
  themes: z.array(z.string().min(1)).default([]),
  indicators: z.object({
    strong: phraseList,
    moderate: phraseList,
    keywords: phraseList
  })
});

const CombinationSchema = z.object({
  description: z.string().min(1),
  gift: z.string().default(''),
  themes: z.array(z.string().min(1)).default([])
});

const FrameworkSchema = z.object({
  version: z.number().int().positive().optional(),
  types: z.object({
    R: TypeProfileSchema,
    I: TypeProfileSchema,
    A: TypeProfileSchema,
    S: TypeProfileSchema,
    E: TypeProfileSchema,
    C: TypeProfileSchema
  }),
  combinations: z.record(CombinationSchema).default({})
});

export type TypeProfile = z.infer<typeof TypeProfileSchema>;
export type CuratedCombination = z.infer<typeof CombinationSchema>;
export type RiasecFramework = z.infer<typeof FrameworkSchema>;

export function parseRiasecFramework(raw: unknown): RiasecFramework {
  const result = FrameworkSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new Error(`Invalid RIASEC framework: ${issues.join('; ')}`);
  }

  return result.data;
}

export function loadRiasecFramework(path: string = DEFAULT_FRAMEWORK_PATH): RiasecFramework {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new Error(`Unable to read RIASEC framework from ${path}`, { cause: error });
  }

  return parseRiasecFramework(raw);
}
