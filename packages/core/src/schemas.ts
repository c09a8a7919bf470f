// packages/core/src/schemas.ts
import { z } from 'zod';

const Identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier');

export const ScalarTypeEnum = z.enum(['string', 'integer', 'float', 'boolean', 'datetime']);

export const FieldDescriptorSchema = z.object({
  name: Identifier,
  type: ScalarTypeEnum,
  nullable: z.boolean().optional(),
  column: z.string().min(1).optional()
}).strict();

export const RelationLinkSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('foreignKey'), column: z.string().min(1) }).strict(),
  z.object({ kind: z.literal('reverse'), column: z.string().min(1) }).strict(),
  z.object({
    kind: z.literal('junction'),
    table: z.string().min(1),
    sourceColumn: z.string().min(1),
    targetColumn: z.string().min(1)
  }).strict()
]);

export const RelationDescriptorSchema = z.object({
  name: Identifier,
  target: z.string().min(1),
  cardinality: z.enum(['one', 'many']),
  nullable: z.boolean().optional(),
  link: RelationLinkSchema
}).strict();

export const EntityTypeSchema = z.object({
  name: z.string().min(1),
  table: z.string().min(1),
  primaryKey: z.string().min(1),
  fields: z.array(FieldDescriptorSchema).min(1),
  relations: z.array(RelationDescriptorSchema).default([])
}).strict();

const VisibilityListSchema = z.record(z.string(), z.array(z.string()));

export const VisibilityRulesSchema = z.object({
  public: VisibilityListSchema.optional(),
  private: VisibilityListSchema.optional()
}).strict();

export const SchemaModelSchema = z.object({
  version: z.string(),
  entities: z.array(EntityTypeSchema).min(1),
  visibility: VisibilityRulesSchema.optional()
}).strict();

// Process-wide engine settings; every entry has a default.
export const EngineSettingsSchema = z.object({
  maxDepth: z.number().int().min(0).default(10),
  defaultLimit: z.number().int().min(0).default(10),
  maxLimit: z.number().int().min(0).default(200),
  commandPrefix: z.string().min(1).default('c:'),
  fieldSeparator: z.string().min(1).default('|'),
  valueSeparator: z.string().min(1).default("'"),
  listSeparator: z.string().min(1).default(',')
}).strict();

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;
