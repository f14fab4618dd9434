import { z } from 'zod';
import {
  ENTITY_TYPES,
  INDUSTRY_CATEGORIES,
  JURISDICTIONS,
  TASK_CATEGORIES,
} from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

export const JurisdictionSchema = z.enum(JURISDICTIONS);
export const EntityTypeSchema = z.enum(ENTITY_TYPES);
export const IndustryCategorySchema = z.enum(INDUSTRY_CATEGORIES);
export const TaskCategorySchema = z.enum(TASK_CATEGORIES);

// JSON clients send absent optionals as null; both mean "not provided"
const Metadata = z
  .record(z.string(), z.unknown())
  .nullish()
  .transform((v) => v ?? undefined);

export const EntityContextSchema = z.object({
  name: z.string().trim().min(1, 'Entity name cannot be empty'),
  entityType: EntityTypeSchema,
  industry: IndustryCategorySchema,
  jurisdictions: z
    .array(JurisdictionSchema)
    .min(1, 'At least one jurisdiction is required')
    .transform((list) => [...new Set(list)]),
  employeeCount: z.number().int().nonnegative().nullish().transform((v) => v ?? undefined),
  annualRevenue: z.number().nonnegative().nullish().transform((v) => v ?? undefined),
  hasPersonalData: z.boolean().nullish().transform((v) => v ?? true),
  isRegulated: z.boolean().nullish().transform((v) => v ?? false),
  previousViolations: z.number().int().nonnegative().nullish().transform((v) => v ?? 0),
  metadata: Metadata,
});

export const TaskContextSchema = z.object({
  description: z.string().trim().min(1, 'Task description cannot be empty'),
  category: TaskCategorySchema,
  affectsPersonalData: z.boolean().nullish().transform((v) => v ?? false),
  affectsFinancialData: z.boolean().nullish().transform((v) => v ?? false),
  involvesCrossBorder: z.boolean().nullish().transform((v) => v ?? false),
  // ISO strings with any offset become the same UTC instant; null never reaches the coercion
  regulatoryDeadline: z.coerce.date().nullish().transform((v) => v ?? undefined),
  potentialImpact: z.string().trim().min(1).nullish().transform((v) => v ?? undefined),
  stakeholderCount: z.number().int().nonnegative().nullish().transform((v) => v ?? undefined),
  metadata: Metadata,
});

export type EntityContext = z.output<typeof EntityContextSchema>;
export type EntityContextInput = z.input<typeof EntityContextSchema>;
export type TaskContext = z.output<typeof TaskContextSchema>;
export type TaskContextInput = z.input<typeof TaskContextSchema>;

function toValidationError(subject: string, error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : subject;
    return `${path}: ${issue.message}`;
  });
  const field = error.issues[0]?.path.join('.') || subject;
  return new ValidationError({
    message: `Invalid ${subject}: ${issues.join('; ')}`,
    field,
    issues,
  });
}

export function parseEntityContext(input: unknown): EntityContext {
  const result = EntityContextSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError('entity context', result.error);
  }
  return result.data;
}

export function parseTaskContext(input: unknown): TaskContext {
  const result = TaskContextSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError('task context', result.error);
  }
  return result.data;
}

function assertMember(schema: z.ZodTypeAny, value: unknown, field: string): void {
  if (!schema.safeParse(value).success) {
    throw new ValidationError({
      message: `Unknown ${field}: ${String(value)}`,
      field,
    });
  }
}

/** Enum check for contexts built in code rather than parsed. */
export function assertKnownEnums(entity: EntityContext, task: TaskContext): void {
  assertMember(EntityTypeSchema, entity.entityType, 'entityType');
  assertMember(IndustryCategorySchema, entity.industry, 'industry');
  for (const jurisdiction of entity.jurisdictions) {
    assertMember(JurisdictionSchema, jurisdiction, 'jurisdictions');
  }
  assertMember(TaskCategorySchema, task.category, 'category');
}
