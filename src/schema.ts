import { z } from 'zod';

/**
 * Shape of one configuration file. Scalars are accepted wherever a string
 * is expected, since YAML turns `8080` or `true` into non-strings.
 *
 * Documents are parsed with mappings as `Map`s. Named sections (trees,
 * groups, variables, ...) stay `Map`s so that names such as `2024` or `10`
 * keep the order they were written in; fixed-key sections become objects.
 */

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const scalarList = z.union([scalar, z.array(scalar)]).transform(value => (Array.isArray(value) ? value : [value]));
const nameList = scalarList;

const mapping = z.custom<Map<unknown, unknown>>(value => value instanceof Map, 'Expected a mapping');

function orderedRecord<T extends z.ZodTypeAny>(value: T) {
  return mapping.transform((map, ctx) => {
    const entries = new Map<string, z.output<T>>();
    for (const [key, raw] of map) {
      const name = String(key);
      const result = value.safeParse(raw);
      if (result.success) {
        entries.set(name, result.data);
        continue;
      }
      for (const issue of result.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: [name, ...issue.path] });
      }
    }
    return entries;
  });
}

function fields<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(
    value => (value instanceof Map ? Object.fromEntries(value) : value),
    z.object(shape).strict()
  );
}

const variables = orderedRecord(scalar);
const environment = orderedRecord(scalarList);
const commands = orderedRecord(scalarList);

export const templateSchema = fields({
  extend: nameList.optional(),
  shell: scalar.optional(),
  variables: variables.optional(),
  environment: environment.optional(),
  commands: commands.optional()
});

export const treeSchema = fields({
  path: scalar.optional(),
  url: scalar.optional(),
  description: scalar.optional(),
  templates: nameList.optional(),
  shell: scalar.optional(),
  variables: variables.optional(),
  environment: environment.optional(),
  commands: commands.optional()
});

export const gardenSchema = fields({
  trees: nameList.optional(),
  groups: nameList.optional(),
  variables: variables.optional(),
  environment: environment.optional(),
  commands: commands.optional()
});

export const configDocumentSchema = fields({
  grove: fields({
    root: scalar.optional(),
    shell: scalar.optional(),
    includes: nameList.optional()
  }).optional(),
  variables: variables.optional(),
  environment: environment.optional(),
  commands: commands.optional(),
  templates: orderedRecord(templateSchema.nullable().transform(value => value ?? {})).optional(),
  trees: orderedRecord(
    z.union([
      z.string().transform((url): TreeDocument => ({ url })),
      treeSchema.nullable().transform(value => value ?? {})
    ])
  ).optional(),
  groups: orderedRecord(nameList).optional(),
  gardens: orderedRecord(gardenSchema.nullable().transform(value => value ?? {})).optional()
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type TreeDocument = z.infer<typeof treeSchema>;
export type TemplateDocument = z.infer<typeof templateSchema>;
export type GardenDocument = z.infer<typeof gardenSchema>;
