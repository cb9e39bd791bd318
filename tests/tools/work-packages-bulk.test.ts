import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { BulkOperationProcessor } from '../../src/tools/work-packages/bulk';
import {
  createWorkPackageBulkHandlers,
  registerWorkPackageBulkTools,
  type WorkPackageBulkHandlers,
} from '../../src/tools/work-packages-bulk';
import { ErrorCode, MCPError } from '../../src/types/errors';
import { createMockApi, notFoundError, relation, workPackage } from '../utils/test-utils';

jest.mock('../../src/utils/logger');

describe('work package bulk tools', () => {
  let api: ReturnType<typeof createMockApi>;
  let handlers: WorkPackageBulkHandlers;

  beforeEach(() => {
    jest.useFakeTimers();
    api = createMockApi();
    handlers = createWorkPackageBulkHandlers(new BulkOperationProcessor(api));
    api.updateWorkPackage.mockImplementation(async (id) => workPackage(id));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should render a status update as a text response', async () => {
    const response = await handlers.updateStatus({ workPackageIds: [1, 2], statusId: 3 });

    expect(response).toEqual({
      content: [
        {
          type: 'text',
          text:
            '✅ **Bulk Status Update Complete!**\n\n' +
            '**Total**: 2 | **Success**: 2 | **Failed**: 0\n' +
            '**Success Rate**: 100.0%\n' +
            '**Duration**: 0.00s\n' +
            '\n**Succeeded** (first 5):\n' +
            '- #1: Work package 1\n' +
            '- #2: Work package 2\n',
        },
      ],
    });
    expect(api.updateWorkPackage).toHaveBeenCalledWith(1, { statusId: 3 });
  });

  it('should unassign with a null assignee', async () => {
    const response = await handlers.assignWorkPackages({ workPackageIds: [4], assigneeId: null });

    expect(response.content[0]?.text.startsWith('✅ **Bulk Unassign Complete!**\n\n')).toBe(true);
    expect(api.updateWorkPackage).toHaveBeenCalledWith(4, { assigneeId: null });
  });

  it('should route priority, version and generic updates through the update operation', async () => {
    await handlers.updatePriority({ workPackageIds: [1], priorityId: 9 });
    await handlers.updateVersion({ workPackageIds: [2], versionId: null });
    await handlers.updateWorkPackages({ workPackageIds: [3], update: { percentageDone: 50 } });

    expect(api.updateWorkPackage.mock.calls).toEqual([
      [1, { priorityId: 9 }],
      [2, { versionId: null }],
      [3, { percentageDone: 50 }],
    ]);
  });

  it('should show the parent in the set-parent report', async () => {
    const response = await handlers.setParent({ workPackageIds: [2, 3], parentId: 1 });

    expect(response.content[0]?.text).toContain('✅ **Bulk Set Parent Complete!**\n\n**Parent**: #1\n**Total**: 2');
  });

  it('should report partial deletes', async () => {
    api.deleteWorkPackage.mockImplementation(async (id) => {
      if (id === 2) throw notFoundError();
      return true;
    });

    const response = await handlers.deleteWorkPackages({ workPackageIds: [1, 2] });
    const text = response.content[0]?.text ?? '';

    expect(text.startsWith('⚠️ **Bulk Delete Partially Complete**\n\n')).toBe(true);
    expect(text).toContain('\n**Errors** (first 5):\n1. WP#2: API Error 404: Not found\n');
    expect(text).toContain('\n**Succeeded** (first 5):\n- #1 deleted\n');
  });

  it('should preview the comment and confirm how many received it', async () => {
    api.addWorkPackageComment.mockImplementation(async (id) => ({ id: id + 100 }));
    const comment = 'x'.repeat(60);

    const response = await handlers.addComment({ workPackageIds: [1, 2], comment });
    const text = response.content[0]?.text ?? '';

    expect(text).toContain(`**Comment**: "${'x'.repeat(50)}..."\n**Internal**: false\n`);
    expect(text).toContain('- #1 (activity #101)\n');
    expect(text.endsWith('\n✅ Comment added to 2 work package(s)\n')).toBe(true);
    expect(api.addWorkPackageComment).toHaveBeenCalledWith(1, comment, false);
  });

  it('should pass creation items to the processor unchanged', async () => {
    api.createWorkPackage.mockResolvedValue(workPackage(70, 'Plan sprint'));

    const response = await handlers.createWorkPackages({ workPackages: [{ project: 1, subject: 'Plan sprint', type: 1 }] });

    expect(response.content[0]?.text).toContain('- #70: Plan sprint\n');
  });

  it('should describe created relations and deleted relations', async () => {
    api.createRelation.mockResolvedValue(relation(50, 'follows'));
    api.deleteRelation.mockResolvedValue(true);

    const created = await handlers.createRelations({ relations: [{ fromId: 1, toId: 2, type: 'follows' }] });
    const deleted = await handlers.deleteRelations({ relationIds: [50] });

    expect(created.content[0]?.text).toContain('✅ **Bulk Create Relations Complete!**');
    expect(created.content[0]?.text).toContain('- #50: follows\n');
    expect(deleted.content[0]?.text).toContain('- Relation #50 deleted\n');
  });

  it('should surface validation errors unchanged', async () => {
    const workPackageIds = Array.from({ length: 51 }, (_, i) => i + 1);

    const error = await handlers.updateStatus({ workPackageIds, statusId: 3 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MCPError);
    expect(error).toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      message:
        'Cannot update more than 50 work packages at once for safety. You provided 51. Please split into multiple batches.',
    });
    expect(api.updateWorkPackage).not.toHaveBeenCalled();
  });

  describe('filtered update', () => {
    it('should preview by default', async () => {
      api.listWorkPackages.mockResolvedValue({ total: 1, count: 1, elements: [workPackage(5, 'Broken link')] });

      const response = await handlers.updateFilteredWorkPackages({
        filters: '[{"status":{"operator":"o","values":[]}}]',
        update: { statusId: 2 },
      });

      expect(response.content[0]?.text.startsWith('🔍 **DRY RUN - Preview of Bulk Update**\n\n')).toBe(true);
      expect(response.content[0]?.text).toContain('- #5: Broken link\n');
      expect(api.updateWorkPackage).not.toHaveBeenCalled();
    });

    it('should name the tool when the query fails', async () => {
      api.listWorkPackages.mockRejectedValue(notFoundError());

      const error = await handlers
        .updateFilteredWorkPackages({ projectId: 404, update: { statusId: 2 }, dryRun: false })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({
        code: ErrorCode.NOT_FOUND,
        message: 'bulk_update_filtered_work_packages failed: API Error 404: Not found',
      });
      expect(api.listWorkPackages).toHaveBeenCalledTimes(1);
    });
  });

  describe('registerWorkPackageBulkTools', () => {
    it('should register one tool per bulk operation', () => {
      const server = new McpServer({ name: 'test-server', version: '0.0.0' });
      const toolSpy = jest.spyOn(server, 'tool');

      registerWorkPackageBulkTools(server, new BulkOperationProcessor(api));

      expect(toolSpy.mock.calls.map((call) => call[0])).toEqual([
        'bulk_update_work_packages',
        'bulk_assign_work_packages',
        'bulk_update_status',
        'bulk_update_priority',
        'bulk_update_version',
        'bulk_set_parent',
        'bulk_remove_parent',
        'bulk_delete_work_packages',
        'bulk_create_work_packages',
        'bulk_add_comment',
        'bulk_create_relations',
        'bulk_delete_relations',
        'bulk_update_filtered_work_packages',
      ]);
    });
  });
});
