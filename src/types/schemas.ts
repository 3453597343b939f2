import { z } from 'zod';
import type { Variable } from './coding.types.js';
import type { Observation } from './reliability.types.js';

// Stored project configs use several spellings for the variable kind
const KIND_ALIASES: Record<string, Variable['kind']> = {
  categorical: 'categorical',
  select: 'categorical',
  '分类变量': 'categorical',
  likert: 'likert',
  '李克特量表': 'likert',
  numeric: 'numeric',
  number: 'numeric',
  '数值变量': 'numeric',
  text: 'text',
  '文本变量': 'text',
};

const splitCommaList = (value: string): string[] =>
  value.split(',').map(part => part.trim()).filter(part => part.length > 0);

// Options arrive as "a, b, c", ["a", "b"] or [{ value, label }]
const OptionListSchema = z.union([
  z.string().transform(splitCommaList),
  z.array(
    z.union([
      z.string(),
      z.object({ value: z.union([z.string(), z.number()]).optional(), label: z.string() }),
    ])
  ).transform(list => list.map(option => (typeof option === 'string' ? option : option.label).trim())),
]);

const LabelListSchema = z.union([z.string().transform(splitCommaList), z.array(z.string())]);

const GuideSchema = z.string().optional().transform(guide => (guide && guide.trim() ? guide : undefined));

export const StoredVariableSchema = z
  .object({
    name: z.string().trim().min(1),
    type: z.string().optional(),
    kind: z.string().optional(),
    options: OptionListSchema.optional(),
    likert_scale: z.coerce.number().int().min(3).optional(),
    likertScale: z.coerce.number().int().min(3).optional(),
    likert_labels: LabelListSchema.optional(),
    likertLabels: LabelListSchema.optional(),
    guide: GuideSchema,
  })
  .transform((raw, ctx): Variable => {
    const declaredKind = raw.kind ?? raw.type ?? '';
    const kind = KIND_ALIASES[declaredKind];
    if (!kind) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown variable kind "${declaredKind}"` });
      return z.NEVER;
    }

    switch (kind) {
      case 'categorical': {
        const options = raw.options ?? [];
        if (options.length === 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Categorical variable "${raw.name}" has no options` });
          return z.NEVER;
        }
        return { kind, name: raw.name, options, guide: raw.guide };
      }
      case 'likert': {
        const labels = raw.likertLabels ?? raw.likert_labels;
        return {
          kind,
          name: raw.name,
          likertScale: raw.likertScale ?? raw.likert_scale ?? 5,
          likertLabels: labels && labels.length > 0 ? labels : undefined,
          guide: raw.guide,
        };
      }
      case 'numeric':
      case 'text':
        return { kind, name: raw.name, guide: raw.guide };
    }
  });

export const ProjectConfigSchema = z.object({
  variables: z.array(z.unknown()).default([]),
}).passthrough();

/**
 * Normalise the variable list of a stored project config.
 * Invalid entries and duplicate names are reported and left out.
 */
export function parseProjectVariables(config: unknown): { variables: Variable[]; errors: string[] } {
  const errors: string[] = [];
  const parsedConfig = ProjectConfigSchema.safeParse(config ?? {});
  if (!parsedConfig.success) {
    return { variables: [], errors: parsedConfig.error.errors.map(e => e.message) };
  }

  const variables: Variable[] = [];
  const seen = new Set<string>();

  parsedConfig.data.variables.forEach((entry, index) => {
    const result = StoredVariableSchema.safeParse(entry);
    if (!result.success) {
      errors.push(`Variable #${index + 1}: ${result.error.errors.map(e => e.message).join('; ')}`);
      return;
    }
    if (seen.has(result.data.name)) {
      errors.push(`Variable #${index + 1}: duplicate name "${result.data.name}"`);
      return;
    }
    seen.add(result.data.name);
    variables.push(result.data);
  });

  return { variables, errors };
}

// Bulk reliability import (JSON form)
const ImportValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ImportRecordSchema = z.object({
  content_id: z.union([z.string(), z.number()]).transform(String),
  coder_id: z.union([z.string(), z.number()]).transform(String),
  variables: z.record(ImportValueSchema),
});

export const ImportRecordListSchema = z.array(ImportRecordSchema).min(1);

export type ImportRecord = z.infer<typeof ImportRecordSchema>;

export function toObservation(record: ImportRecord): Observation {
  const values: Observation['values'] = {};
  for (const [name, value] of Object.entries(record.variables)) {
    if (value !== null && value !== '') {
      values[name] = value;
    }
  }
  return { contentId: record.content_id, coderId: record.coder_id, values };
}

const ObservationSchema = z.object({
  contentId: z.string(),
  coderId: z.string(),
  values: z.record(ImportValueSchema),
});

export const ReliabilityDatasetSchema = z.object({
  observations: z.array(ObservationSchema),
  variables: z.array(z.string()),
  results: z.record(z.number()).optional(),
  calculatedAt: z.string().optional(),
});
