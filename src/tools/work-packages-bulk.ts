/**
 * Work Package Bulk Tools
 * Registers one MCP tool per bulk operation. Item-level checks (ceilings,
 * required fields) live in the processor so they report the precise problem;
 * the input shapes here only describe the arguments.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  BulkOperationResponseFormatter,
  describeWorkPackage,
} from '../formatters/BulkOperationResponseFormatter';
import { RELATION_TYPES } from '../types/schemas/openproject';
import type { Relation } from '../types/openproject';
import { logger } from '../utils/logger';
import { wrapToolError } from '../utils/error-handler';
import type { BulkOperationProcessor } from './work-packages/bulk';

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

const workPackageIds = z
  .array(z.number())
  .describe('Work package IDs to operate on (max 50; max 30 for deletion)');

const nullableId = (description: string): z.ZodOptional<z.ZodNullable<z.ZodNumber>> =>
  z.number().nullable().optional().describe(description);

const UpdateFieldsSchema = z
  .object({
    subject: z.string().optional(),
    description: z.string().optional().describe('Markdown description'),
    typeId: z.number().optional(),
    statusId: z.number().optional(),
    priorityId: z.number().optional(),
    assigneeId: nullableId('User to assign; null unassigns'),
    versionId: nullableId('Version to set; null clears it'),
    parentId: nullableId('Parent work package; null removes it'),
    percentageDone: z.number().optional(),
    startDate: z.string().nullable().optional().describe('YYYY-MM-DD; null clears it'),
    dueDate: z.string().nullable().optional().describe('YYYY-MM-DD; null clears it'),
  })
  .describe('Fields to apply to every work package; at least one is required');

const CreateItemSchema = z
  .object({
    project: z.number().optional().describe('Project ID (required)'),
    subject: z.string().optional().describe('Subject (required)'),
    type: z.number().optional().describe('Type ID (required)'),
    description: z.string().optional(),
    priorityId: z.number().optional(),
    assigneeId: z.number().optional(),
    statusId: z.number().optional(),
    versionId: z.number().optional(),
    parentId: z.number().optional(),
    startDate: z.string().optional(),
    dueDate: z.string().optional(),
  })
  .passthrough();

const RelationItemSchema = z
  .object({
    fromId: z.number().optional().describe('Source work package (required)'),
    toId: z.number().optional().describe('Target work package (required)'),
    type: z.string().optional().describe(`Relation type (required): ${RELATION_TYPES.join(', ')}`),
    lag: z.number().optional().describe('Working days between the two, for follows/precedes'),
    description: z.string().optional(),
  })
  .passthrough();

export const BulkUpdateShape = { workPackageIds, update: UpdateFieldsSchema };
export const BulkAssignShape = { workPackageIds, assigneeId: z.number().nullable().describe('User ID; null unassigns') };
export const BulkStatusShape = { workPackageIds, statusId: z.number() };
export const BulkPriorityShape = { workPackageIds, priorityId: z.number() };
export const BulkVersionShape = { workPackageIds, versionId: z.number().nullable().describe('Version ID; null clears it') };
export const BulkSetParentShape = { workPackageIds, parentId: z.number() };
export const BulkIdsShape = { workPackageIds };
export const BulkCreateShape = {
  workPackages: z.array(CreateItemSchema).describe('Work packages to create (max 30)'),
};
export const BulkCommentShape = {
  workPackageIds,
  comment: z.string().describe('Comment text (markdown)'),
  internal: z.boolean().optional().describe('Only visible to users allowed to see internal comments'),
};
export const BulkCreateRelationsShape = {
  relations: z.array(RelationItemSchema).describe('Relations to create (max 30)'),
};
export const BulkDeleteRelationsShape = {
  relationIds: z.array(z.number()).describe('Relation IDs to delete (max 30)'),
};
export const BulkFilteredUpdateShape = {
  projectId: z.number().optional().describe('Restrict the query to one project'),
  filters: z
    .string()
    .optional()
    .describe('OpenProject filter JSON, e.g. [{"status":{"operator":"o","values":[]}}]'),
  update: UpdateFieldsSchema,
  dryRun: z.boolean().optional().describe('Preview only (default: true)'),
  maxResults: z.number().optional().describe('Maximum work packages to update, 1-50 (default: 50)'),
};

type ArgsOf<S extends z.ZodRawShape> = z.infer<z.ZodObject<S>>;

function text(value: string): ToolResponse {
  return { content: [{ type: 'text', text: value }] };
}

function describeRelation(relation: Relation): string {
  return `#${relation.id}: ${relation.type}`;
}

function preview(comment: string): string {
  return comment.length > 50 ? `${comment.slice(0, 50)}...` : comment;
}

async function runTool(toolName: string, args: unknown, handler: () => Promise<string>): Promise<ToolResponse> {
  logger.debug(`Executing ${toolName}`, args);
  try {
    return text(await handler());
  } catch (error) {
    throw wrapToolError(error, toolName);
  }
}

/**
 * Tool handlers bound to one processor
 */
export function createWorkPackageBulkHandlers(
  processor: BulkOperationProcessor,
  formatter: BulkOperationResponseFormatter = new BulkOperationResponseFormatter(),
) {
  const updated = (title: string) => ({ title, describe: describeWorkPackage });

  return {
    updateWorkPackages: (args: ArgsOf<typeof BulkUpdateShape>): Promise<ToolResponse> =>
      runTool('bulk_update_work_packages', args, async () =>
        formatter.formatResult(await processor.bulkUpdateWorkPackages(args.workPackageIds, args.update), updated('Bulk Update')),
      ),

    assignWorkPackages: (args: ArgsOf<typeof BulkAssignShape>): Promise<ToolResponse> =>
      runTool('bulk_assign_work_packages', args, async () =>
        formatter.formatResult(
          await processor.bulkUpdateWorkPackages(args.workPackageIds, { assigneeId: args.assigneeId }),
          updated(args.assigneeId === null ? 'Bulk Unassign' : 'Bulk Assign'),
        ),
      ),

    updateStatus: (args: ArgsOf<typeof BulkStatusShape>): Promise<ToolResponse> =>
      runTool('bulk_update_status', args, async () =>
        formatter.formatResult(
          await processor.bulkUpdateWorkPackages(args.workPackageIds, { statusId: args.statusId }),
          updated('Bulk Status Update'),
        ),
      ),

    updatePriority: (args: ArgsOf<typeof BulkPriorityShape>): Promise<ToolResponse> =>
      runTool('bulk_update_priority', args, async () =>
        formatter.formatResult(
          await processor.bulkUpdateWorkPackages(args.workPackageIds, { priorityId: args.priorityId }),
          updated('Bulk Priority Update'),
        ),
      ),

    updateVersion: (args: ArgsOf<typeof BulkVersionShape>): Promise<ToolResponse> =>
      runTool('bulk_update_version', args, async () =>
        formatter.formatResult(
          await processor.bulkUpdateWorkPackages(args.workPackageIds, { versionId: args.versionId }),
          updated('Bulk Version Update'),
        ),
      ),

    setParent: (args: ArgsOf<typeof BulkSetParentShape>): Promise<ToolResponse> =>
      runTool('bulk_set_parent', args, async () =>
        formatter.formatResult(await processor.bulkSetParent(args.workPackageIds, args.parentId), {
          ...updated('Bulk Set Parent'),
          context: [`**Parent**: #${args.parentId}`],
        }),
      ),

    removeParent: (args: ArgsOf<typeof BulkIdsShape>): Promise<ToolResponse> =>
      runTool('bulk_remove_parent', args, async () =>
        formatter.formatResult(await processor.bulkRemoveParent(args.workPackageIds), updated('Bulk Remove Parent')),
      ),

    deleteWorkPackages: (args: ArgsOf<typeof BulkIdsShape>): Promise<ToolResponse> =>
      runTool('bulk_delete_work_packages', args, async () =>
        formatter.formatResult(await processor.bulkDeleteWorkPackages(args.workPackageIds), {
          title: 'Bulk Delete',
          describe: (confirmation) => `#${confirmation.id} deleted`,
        }),
      ),

    createWorkPackages: (args: ArgsOf<typeof BulkCreateShape>): Promise<ToolResponse> =>
      runTool('bulk_create_work_packages', args, async () =>
        formatter.formatResult(await processor.bulkCreateWorkPackages(args.workPackages), {
          title: 'Bulk Create',
          describe: describeWorkPackage,
        }),
      ),

    addComment: (args: ArgsOf<typeof BulkCommentShape>): Promise<ToolResponse> =>
      runTool('bulk_add_comment', args, async () => {
        const internal = args.internal ?? false;
        const result = await processor.bulkAddComment(args.workPackageIds, args.comment, internal);
        return formatter.formatResult(result, {
          title: 'Bulk Comment',
          describe: (confirmation) => `#${confirmation.id} (activity #${confirmation.activityId})`,
          context: [`**Comment**: "${preview(args.comment)}"`, `**Internal**: ${internal}`],
          footer: `✅ Comment added to ${result.succeeded} work package(s)`,
        });
      }),

    createRelations: (args: ArgsOf<typeof BulkCreateRelationsShape>): Promise<ToolResponse> =>
      runTool('bulk_create_relations', args, async () =>
        formatter.formatResult(await processor.bulkCreateRelations(args.relations), {
          title: 'Bulk Create Relations',
          describe: describeRelation,
        }),
      ),

    deleteRelations: (args: ArgsOf<typeof BulkDeleteRelationsShape>): Promise<ToolResponse> =>
      runTool('bulk_delete_relations', args, async () =>
        formatter.formatResult(await processor.bulkDeleteRelations(args.relationIds), {
          title: 'Bulk Delete Relations',
          describe: (confirmation) => `Relation #${confirmation.id} deleted`,
        }),
      ),

    updateFilteredWorkPackages: (args: ArgsOf<typeof BulkFilteredUpdateShape>): Promise<ToolResponse> =>
      runTool('bulk_update_filtered_work_packages', args, async () =>
        formatter.formatFilteredOutcome(
          await processor.bulkUpdateFilteredWorkPackages({
            update: args.update,
            ...(args.projectId !== undefined && { projectId: args.projectId }),
            ...(args.filters !== undefined && { filters: args.filters }),
            ...(args.dryRun !== undefined && { dryRun: args.dryRun }),
            ...(args.maxResults !== undefined && { maxResults: args.maxResults }),
          }),
        ),
      ),
  };
}

export type WorkPackageBulkHandlers = ReturnType<typeof createWorkPackageBulkHandlers>;

/**
 * Register all bulk work package tools
 */
export function registerWorkPackageBulkTools(server: McpServer, processor: BulkOperationProcessor): void {
  const handlers = createWorkPackageBulkHandlers(processor);

  server.tool(
    'bulk_update_work_packages',
    'Apply the same field changes to many work packages concurrently (max 50), with per-item retry',
    BulkUpdateShape,
    (args) => handlers.updateWorkPackages(args),
  );

  server.tool(
    'bulk_assign_work_packages',
    'Assign many work packages to one user, or unassign them with null (max 50)',
    BulkAssignShape,
    (args) => handlers.assignWorkPackages(args),
  );

  server.tool(
    'bulk_update_status',
    'Set the status of many work packages (max 50)',
    BulkStatusShape,
    (args) => handlers.updateStatus(args),
  );

  server.tool(
    'bulk_update_priority',
    'Set the priority of many work packages (max 50)',
    BulkPriorityShape,
    (args) => handlers.updatePriority(args),
  );

  server.tool(
    'bulk_update_version',
    'Move many work packages to a version, or clear it with null (max 50)',
    BulkVersionShape,
    (args) => handlers.updateVersion(args),
  );

  server.tool(
    'bulk_set_parent',
    'Make many work packages children of one parent (max 50)',
    BulkSetParentShape,
    (args) => handlers.setParent(args),
  );

  server.tool(
    'bulk_remove_parent',
    'Detach many work packages from their parent (max 50)',
    BulkIdsShape,
    (args) => handlers.removeParent(args),
  );

  server.tool(
    'bulk_delete_work_packages',
    'Delete many work packages (max 30). This cannot be undone.',
    BulkIdsShape,
    (args) => handlers.deleteWorkPackages(args),
  );

  server.tool(
    'bulk_create_work_packages',
    'Create many work packages concurrently (max 30); each needs project, subject and type',
    BulkCreateShape,
    (args) => handlers.createWorkPackages(args),
  );

  server.tool(
    'bulk_add_comment',
    'Add the same comment to many work packages (max 50)',
    BulkCommentShape,
    (args) => handlers.addComment(args),
  );

  server.tool(
    'bulk_create_relations',
    'Create many work package relations (max 30); each needs fromId, toId and type',
    BulkCreateRelationsShape,
    (args) => handlers.createRelations(args),
  );

  server.tool(
    'bulk_delete_relations',
    'Delete many work package relations (max 30)',
    BulkDeleteRelationsShape,
    (args) => handlers.deleteRelations(args),
  );

  server.tool(
    'bulk_update_filtered_work_packages',
    'Update every work package matching an OpenProject filter (max 50). Runs as a dry-run preview unless dryRun is false.',
    BulkFilteredUpdateShape,
    (args) => handlers.updateFilteredWorkPackages(args),
  );
}
