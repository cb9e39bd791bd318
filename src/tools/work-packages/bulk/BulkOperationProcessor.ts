/**
 * Main orchestration for bulk operations
 *
 * A batch moves through Validating → Dispatching → Collecting → Aggregated.
 * Validation failures short-circuit to Rejected: an MCPError is thrown and no
 * remote call is made. Once dispatched, every item runs to its own completion
 * and per-item failures are folded into the result instead of thrown.
 */

import { Semaphore } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import type {
  OpenProjectApi,
  Relation,
  RelationCreate,
  WorkPackage,
  WorkPackageCreate,
  WorkPackageUpdate,
} from '../../../types/openproject';
import { logger } from '../../../utils/logger';
import { RETRY_CONFIG, withRetry, type RetryOptions } from '../../../utils/retry';
import {
  BulkOperationResult,
  type BulkOperationKind,
  type BulkTask,
  type CommentConfirmation,
  type DeletionConfirmation,
  type FilteredUpdateOutcome,
  type FilteredUpdateRequest,
  type ItemOutcome,
} from './BulkOperationTypes';
import { BulkOperationValidator, MAX_FILTER_RESULTS } from './BulkOperationValidator';

export type RetryPolicy = Required<Pick<RetryOptions, 'maxRetries' | 'initialDelay' | 'maxDelay' | 'backoffFactor'>>;

export interface BulkProcessorOptions {
  retry?: Partial<RetryPolicy>;
  /**
   * Cap on attempts in flight at once. Unset means no cap beyond the batch ceiling.
   * Only held for the duration of an attempt, never across a backoff sleep.
   */
  maxConcurrency?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const workPackageKey = (id: number): string => `WP#${id}`;

/**
 * Main processor for all bulk operations
 */
export class BulkOperationProcessor {
  private readonly retryPolicy: RetryPolicy;
  private readonly gate: Semaphore | undefined;

  constructor(
    private readonly api: OpenProjectApi,
    options: BulkProcessorOptions = {},
  ) {
    this.retryPolicy = { ...RETRY_CONFIG.BULK_OPERATIONS, ...options.retry };
    this.gate = options.maxConcurrency !== undefined ? new Semaphore(options.maxConcurrency) : undefined;
  }

  /**
   * Run one logical operation over every item concurrently.
   *
   * Rejects with an MCPError only when the batch is empty or above the
   * operation's ceiling; item failures end up in `errors` as `"<key>: <message>"`.
   */
  async runBulk<I, T>(kind: BulkOperationKind, items: readonly I[], task: BulkTask<I, T>): Promise<BulkOperationResult<T>> {
    this.validate(kind, () => BulkOperationValidator.validateBatchSize(kind, items));

    const operationId = uuidv4();
    const startedAt = Date.now();
    logger.info(`[${operationId}] Bulk ${kind}: dispatching ${items.length} item(s)`);

    const successes: T[] = [];
    const errors: string[] = [];
    let totalRetries = 0;
    let itemsWithRetries = 0;

    // Outcomes are recorded as each task settles, so both lists are in completion order
    await Promise.all(
      items.map(async (item) => {
        const outcome = await this.runItem(kind, operationId, item, task);
        totalRetries += outcome.retries;
        if (outcome.retries > 0) {
          itemsWithRetries++;
        }
        if (outcome.ok) {
          successes.push(outcome.value);
        } else {
          errors.push(outcome.error);
        }
      }),
    );

    const result = new BulkOperationResult<T>({
      operation: kind,
      successes,
      errors,
      duration: (Date.now() - startedAt) / 1000,
      totalRetries,
      itemsWithRetries,
    });

    const summary = `[${operationId}] Bulk ${kind} finished: ${result.succeeded}/${result.total} succeeded in ${result.duration.toFixed(2)}s`;
    if (result.failed > 0) {
      logger.warn(`${summary} (${result.failed} failed, ${totalRetries} retries)`);
    } else {
      logger.info(`${summary} (${totalRetries} retries)`);
    }

    return result;
  }

  async bulkUpdateWorkPackages(ids: readonly number[], update: WorkPackageUpdate): Promise<BulkOperationResult<WorkPackage>> {
    const payload = this.validate('update', () => {
      BulkOperationValidator.validateBatchSize('update', ids);
      BulkOperationValidator.validateIds(ids, 'work package ID');
      const checked = BulkOperationValidator.validateUpdate(update);
      if (typeof checked.parentId === 'number') {
        BulkOperationValidator.validateParentId(checked.parentId, ids);
      }
      return checked;
    });
    return this.updateAll('update', ids, payload);
  }

  /**
   * Make every work package a child of `parentId`
   */
  async bulkSetParent(ids: readonly number[], parentId: number): Promise<BulkOperationResult<WorkPackage>> {
    this.validate('set-parent', () => {
      BulkOperationValidator.validateBatchSize('set-parent', ids);
      BulkOperationValidator.validateIds(ids, 'work package ID');
      BulkOperationValidator.validateParentId(parentId, ids);
    });
    return this.updateAll('set-parent', ids, { parentId });
  }

  async bulkRemoveParent(ids: readonly number[]): Promise<BulkOperationResult<WorkPackage>> {
    this.validate('remove-parent', () => {
      BulkOperationValidator.validateBatchSize('remove-parent', ids);
      BulkOperationValidator.validateIds(ids, 'work package ID');
    });
    return this.updateAll('remove-parent', ids, { parentId: null });
  }

  async bulkDeleteWorkPackages(ids: readonly number[]): Promise<BulkOperationResult<DeletionConfirmation>> {
    this.validate('delete', () => {
      BulkOperationValidator.validateBatchSize('delete', ids);
      BulkOperationValidator.validateIds(ids, 'work package ID');
    });
    return this.runBulk<number, DeletionConfirmation>('delete', ids, {
      key: workPackageKey,
      execute: async (id) => {
        await this.api.deleteWorkPackage(id);
        return { id, deleted: true };
      },
    });
  }

  /**
   * Items arrive unchecked from the tool layer; each must carry project, subject and type.
   */
  async bulkCreateWorkPackages(items: readonly unknown[]): Promise<BulkOperationResult<WorkPackage>> {
    const payloads = this.validate('create', () => {
      BulkOperationValidator.validateBatchSize('create', items);
      return BulkOperationValidator.validateCreateItems(items);
    });
    return this.runBulk<WorkPackageCreate, WorkPackage>('create', payloads, {
      key: (payload) => `'${payload.subject}'`,
      execute: (payload) => this.api.createWorkPackage(payload),
    });
  }

  async bulkAddComment(
    ids: readonly number[],
    comment: string,
    internal = false,
  ): Promise<BulkOperationResult<CommentConfirmation>> {
    const text = this.validate('add-comment', () => {
      BulkOperationValidator.validateBatchSize('add-comment', ids);
      BulkOperationValidator.validateIds(ids, 'work package ID');
      return BulkOperationValidator.validateComment(comment);
    });
    return this.runBulk<number, CommentConfirmation>('add-comment', ids, {
      key: workPackageKey,
      execute: async (id) => {
        const activity = await this.api.addWorkPackageComment(id, text, internal);
        return { id, activityId: activity.id };
      },
    });
  }

  async bulkCreateRelations(items: readonly unknown[]): Promise<BulkOperationResult<Relation>> {
    const payloads = this.validate('create-relation', () => {
      BulkOperationValidator.validateBatchSize('create-relation', items);
      return BulkOperationValidator.validateRelationItems(items);
    });
    return this.runBulk<RelationCreate, Relation>('create-relation', payloads, {
      key: (payload) => `${payload.fromId}→${payload.toId} (${payload.type})`,
      execute: (payload) => this.api.createRelation(payload),
    });
  }

  async bulkDeleteRelations(ids: readonly number[]): Promise<BulkOperationResult<DeletionConfirmation>> {
    this.validate('delete-relation', () => {
      BulkOperationValidator.validateBatchSize('delete-relation', ids);
      BulkOperationValidator.validateIds(ids, 'relation ID');
    });
    return this.runBulk<number, DeletionConfirmation>('delete-relation', ids, {
      key: (id) => `Relation #${id}`,
      execute: async (id) => {
        await this.api.deleteRelation(id);
        return { id, deleted: true };
      },
    });
  }

  /**
   * Resolve a filter to at most `maxResults` work packages, then preview or apply
   * the update. The default is a dry run, which never issues a write.
   */
  async bulkUpdateFilteredWorkPackages(request: FilteredUpdateRequest): Promise<FilteredUpdateOutcome> {
    const dryRun = request.dryRun ?? true;
    const maxResults = request.maxResults ?? MAX_FILTER_RESULTS;

    const update = this.validate('update', () => {
      BulkOperationValidator.validateMaxResults(maxResults);
      BulkOperationValidator.validateFilters(request.filters);
      if (request.projectId !== undefined) {
        BulkOperationValidator.validateIds([request.projectId], 'projectId');
      }
      return BulkOperationValidator.validateUpdate(request.update);
    });

    const query = {
      pageSize: maxResults,
      ...(request.projectId !== undefined && { projectId: request.projectId }),
      ...(request.filters !== undefined && { filters: request.filters }),
    };
    const collection = await withRetry(() => this.api.listWorkPackages(query), {
      ...this.retryPolicy,
      label: 'Filtered work package query',
    });
    // pageSize is a request, the server may still send more
    const workPackages = collection.elements.slice(0, maxResults);

    logger.info(
      `Filtered bulk update matched ${collection.total} work package(s), ${workPackages.length} selected (dryRun=${dryRun})`,
    );

    const { parentId } = update;
    if (typeof parentId === 'number') {
      this.validate('update', () =>
        BulkOperationValidator.validateParentId(
          parentId,
          workPackages.map((workPackage) => workPackage.id),
        ),
      );
    }

    if (dryRun) {
      return { dryRun: true, matched: collection.total, workPackages, update };
    }

    if (workPackages.length === 0) {
      return { dryRun: false, matched: collection.total, result: BulkOperationResult.empty<WorkPackage>('update') };
    }

    const result = await this.updateAll(
      'update',
      workPackages.map((workPackage) => workPackage.id),
      update,
    );
    return { dryRun: false, matched: collection.total, result };
  }

  private updateAll(
    kind: BulkOperationKind,
    ids: readonly number[],
    update: WorkPackageUpdate,
  ): Promise<BulkOperationResult<WorkPackage>> {
    return this.runBulk<number, WorkPackage>(kind, ids, {
      key: workPackageKey,
      execute: (id) => this.api.updateWorkPackage(id, update),
    });
  }

  private async runItem<I, T>(
    kind: BulkOperationKind,
    operationId: string,
    item: I,
    task: BulkTask<I, T>,
  ): Promise<ItemOutcome<T>> {
    const key = task.key(item);
    let retries = 0;

    try {
      const value = await withRetry(() => this.attempt(() => task.execute(item)), {
        ...this.retryPolicy,
        label: `[${operationId}] ${kind} ${key}`,
        onRetry: () => {
          retries++;
        },
      });
      return { ok: true, value, retries };
    } catch (error) {
      return { ok: false, error: `${key}: ${errorMessage(error)}`, retries };
    }
  }

  private attempt<T>(call: () => Promise<T>): Promise<T> {
    return this.gate ? this.gate.runExclusive(call) : call();
  }

  /**
   * Run pre-dispatch checks, logging the rejection when one fails
   */
  private validate<R>(kind: BulkOperationKind, check: () => R): R {
    try {
      return check();
    } catch (error) {
      logger.warn(`Bulk ${kind} rejected: ${errorMessage(error)}`);
      throw error;
    }
  }
}
