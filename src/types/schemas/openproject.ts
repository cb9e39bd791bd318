/**
 * Zod schemas for OpenProject payloads and API responses
 */

import { z } from 'zod';

/**
 * Schema for entity IDs (work packages, users, statuses, relations...)
 */
export const EntityIdSchema = z.number().int('ID must be an integer').positive('ID must be positive');

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

export const RELATION_TYPES = [
  'relates',
  'duplicates',
  'duplicated',
  'blocks',
  'blocked',
  'precedes',
  'follows',
  'includes',
  'partof',
  'requires',
  'required',
] as const;

export const RelationTypeSchema = z.enum(RELATION_TYPES);

/**
 * Schema for changing an existing work package.
 * `null` on a link field clears it.
 */
export const WorkPackageUpdateSchema = z.object({
  subject: z.string().trim().min(1, 'Subject cannot be empty').optional(),
  description: z.string().optional(),
  typeId: EntityIdSchema.optional(),
  statusId: EntityIdSchema.optional(),
  priorityId: EntityIdSchema.optional(),
  assigneeId: EntityIdSchema.nullable().optional(),
  versionId: EntityIdSchema.nullable().optional(),
  parentId: EntityIdSchema.nullable().optional(),
  percentageDone: z.number().int().min(0).max(100).optional(),
  startDate: IsoDateSchema.nullable().optional(),
  dueDate: IsoDateSchema.nullable().optional(),
});

/**
 * Schema for a work package creation item; project, subject and type are required
 */
export const WorkPackageCreateSchema = z.object({
  project: EntityIdSchema,
  subject: z.string().trim().min(1, 'Subject cannot be empty'),
  type: EntityIdSchema,
  description: z.string().optional(),
  priorityId: EntityIdSchema.optional(),
  assigneeId: EntityIdSchema.optional(),
  statusId: EntityIdSchema.optional(),
  versionId: EntityIdSchema.optional(),
  parentId: EntityIdSchema.optional(),
  startDate: IsoDateSchema.optional(),
  dueDate: IsoDateSchema.optional(),
});

/**
 * Schema for a relation creation item; fromId, toId and type are required
 */
export const RelationCreateSchema = z.object({
  fromId: EntityIdSchema,
  toId: EntityIdSchema,
  type: RelationTypeSchema,
  lag: z.number().int().min(0).optional(),
  description: z.string().optional(),
});

const HalLinkSchema = z
  .object({
    href: z.string().nullable(),
    title: z.string().optional(),
  })
  .passthrough();

export const WorkPackageResponseSchema = z
  .object({
    id: z.number(),
    subject: z.string(),
    lockVersion: z.number().optional(),
    description: z.object({ raw: z.string().nullable().optional() }).passthrough().optional(),
    startDate: z.string().nullable().optional(),
    dueDate: z.string().nullable().optional(),
    percentageDone: z.number().nullable().optional(),
    _links: z.record(z.union([HalLinkSchema, z.array(HalLinkSchema)])).optional(),
  })
  .passthrough();

export const WorkPackageCollectionResponseSchema = z.object({
  total: z.number().default(0),
  count: z.number().default(0),
  _embedded: z
    .object({
      elements: z.array(WorkPackageResponseSchema).default([]),
    })
    .default({}),
});

export const ActivityResponseSchema = z
  .object({
    id: z.number(),
    comment: z.object({ raw: z.string().nullable().optional() }).passthrough().optional(),
    internal: z.boolean().optional(),
  })
  .passthrough();

export const RelationResponseSchema = z
  .object({
    id: z.number(),
    type: z.string(),
    lag: z.number().nullable().optional(),
    description: z.string().nullable().optional(),
    _links: z.record(HalLinkSchema).optional(),
  })
  .passthrough();

export const RootResponseSchema = z
  .object({
    instanceName: z.string().optional(),
    coreVersion: z.string().optional(),
    _links: z
      .object({
        user: HalLinkSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
