import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/**
 * Zod schemas for inputs crossing the engine boundary
 */

// =============================================================================
// Base Schemas
// =============================================================================

const IdSchema = z.string().trim().min(1, 'Identifier cannot be empty');

export const RoleNameSchema = z
  .string()
  .trim()
  .min(1, 'Role name is required')
  .max(50, 'Role name must be at most 50 characters');

/** `subsystem.action` style machine name, e.g. `post.edit` */
export const CodenameSchema = z
  .string()
  .trim()
  .regex(/^[a-z][a-z0-9_-]*(\.[a-z][a-z0-9_-]*)+$/, 'Codename must look like "subsystem.action"')
  .max(100, 'Codename must be at most 100 characters');

// =============================================================================
// Roles
// =============================================================================

export const CreateRoleInputSchema = z.object({
  name: RoleNameSchema,
  description: z.string().max(1000).default(''),
  parentId: IdSchema.nullable().optional(),
});

export const UpdateRoleInputSchema = z
  .object({
    name: RoleNameSchema.optional(),
    description: z.string().max(1000).optional(),
  })
  .refine((input) => input.name !== undefined || input.description !== undefined, {
    message: 'At least one of name or description is required',
  });

export const RoleQuerySchema = z.object({
  search: z.string().trim().optional(),
  orderBy: z.enum(['name', 'createdAt']).default('name'),
  sortOrder: z.enum(['asc', 'desc']).default('asc'),
  offset: z.number().int().nonnegative().default(0),
  limit: z.number().int().positive().max(100).default(10),
});

// =============================================================================
// Permissions
// =============================================================================

export const PermissionDefinitionSchema = z.object({
  codename: CodenameSchema,
  name: z.string().trim().min(1, 'Permission name is required').max(255),
  subsystem: z.string().trim().min(1, 'Subsystem is required').max(100),
});

export const PermissionDefinitionListSchema = z.array(PermissionDefinitionSchema);

export const BulkPermissionChangeSchema = z
  .object({
    roleId: IdSchema,
    grants: z.array(z.string().trim().min(1)).default([]),
    revokes: z.array(z.string().trim().min(1)).default([]),
    actorId: IdSchema,
  })
  .superRefine((change, ctx) => {
    if (change.grants.length === 0 && change.revokes.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'At least one grant or revoke is required',
        path: ['grants'],
      });
    }
    const revoked = new Set(change.revokes);
    for (const codename of new Set(change.grants)) {
      if (revoked.has(codename)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Permission ${codename} is both granted and revoked`,
          path: ['revokes'],
        });
      }
    }
  });

// =============================================================================
// Audit
// =============================================================================

export const AuditLogFilterSchema = z
  .object({
    roleId: IdSchema.optional(),
    actorId: IdSchema.optional(),
    action: z.enum(['GRANT', 'REVOKE']).optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
  })
  .refine((filter) => !filter.from || !filter.to || filter.from <= filter.to, {
    message: '"from" must not be after "to"',
    path: ['from'],
  });

export const AuditLogOptionsSchema = z.object({
  limit: z.number().int().positive().optional(),
  offset: z.number().int().nonnegative().default(0),
  sortOrder: z.enum(['asc', 'desc']).default('desc'),
});

// =============================================================================
// Users
// =============================================================================

export const UserInputSchema = z.object({
  id: IdSchema.optional(),
  email: z.string().trim().toLowerCase().email('Invalid email address'),
  roleId: IdSchema.nullable().default(null),
  isActive: z.boolean().default(true),
  isSuperuser: z.boolean().default(false),
  lastLoginIp: z.string().ip().nullable().default(null),
});

export type UserInput = z.input<typeof UserInputSchema>;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse `input` or throw a ValidationError carrying the zod issues.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${label}: ${summary}`, result.error.issues);
  }
  return result.data;
}
