/**
 * Type definitions for bulk operations
 */

import type { WorkPackage, WorkPackageUpdate } from '../../../types/openproject';

export type BulkOperationKind =
  | 'update'
  | 'set-parent'
  | 'remove-parent'
  | 'delete'
  | 'create'
  | 'add-comment'
  | 'create-relation'
  | 'delete-relation';

/**
 * Per-operation batch ceilings. Destructive and expensive operations get the lower limit.
 */
export const MAX_BATCH_SIZE: Readonly<Record<BulkOperationKind, number>> = {
  update: 50,
  'set-parent': 50,
  'remove-parent': 50,
  'add-comment': 50,
  delete: 30,
  create: 30,
  'create-relation': 30,
  'delete-relation': 30,
};

interface OperationWording {
  /** Name of the argument carrying the items */
  field: string;
  /** Completes "Cannot ... more than N" */
  action: string;
  noun: string;
}

export const OPERATION_WORDING: Readonly<Record<BulkOperationKind, OperationWording>> = {
  update: { field: 'workPackageIds', action: 'update', noun: 'work packages' },
  'set-parent': { field: 'workPackageIds', action: 'set the parent of', noun: 'work packages' },
  'remove-parent': { field: 'workPackageIds', action: 'remove the parent of', noun: 'work packages' },
  'add-comment': { field: 'workPackageIds', action: 'add comments to', noun: 'work packages' },
  delete: { field: 'workPackageIds', action: 'delete', noun: 'work packages' },
  create: { field: 'workPackages', action: 'create', noun: 'work packages' },
  'create-relation': { field: 'relations', action: 'create', noun: 'relations' },
  'delete-relation': { field: 'relationIds', action: 'delete', noun: 'relations' },
};

/**
 * Outcome of one item once its retries are settled
 */
export type ItemOutcome<T> =
  | { ok: true; value: T; retries: number }
  | { ok: false; error: string; retries: number };

/**
 * The unit of work run once per item
 */
export interface BulkTask<I, T> {
  /** Identifies the item in error strings */
  key(item: I): string;
  execute(item: I): Promise<T>;
}

export interface DeletionConfirmation {
  id: number;
  deleted: true;
}

export interface CommentConfirmation {
  id: number;
  activityId: number;
}

export interface BulkOperationResultInit<T> {
  operation: BulkOperationKind;
  successes: readonly T[];
  errors: readonly string[];
  /** Seconds */
  duration: number;
  totalRetries?: number;
  itemsWithRetries?: number;
}

export interface BulkOperationResultJSON<T> {
  operation: BulkOperationKind;
  total: number;
  succeeded: number;
  failed: number;
  successRate: number;
  duration: number;
  totalRetries: number;
  itemsWithRetries: number;
  successes: T[];
  errors: string[];
}

/**
 * Aggregate report of one batch. Immutable once constructed.
 *
 * `successes` and `errors` are in completion order, not submission order.
 */
export class BulkOperationResult<T = unknown> {
  readonly operation: BulkOperationKind;
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly successes: readonly T[];
  readonly errors: readonly string[];
  readonly duration: number;
  readonly totalRetries: number;
  readonly itemsWithRetries: number;

  constructor(init: BulkOperationResultInit<T>) {
    this.operation = init.operation;
    this.successes = Object.freeze([...init.successes]);
    this.errors = Object.freeze([...init.errors]);
    this.succeeded = this.successes.length;
    this.failed = this.errors.length;
    this.total = this.succeeded + this.failed;
    this.duration = Math.max(0, init.duration);
    this.totalRetries = init.totalRetries ?? 0;
    this.itemsWithRetries = init.itemsWithRetries ?? 0;
    Object.freeze(this);
  }

  static empty<T>(operation: BulkOperationKind): BulkOperationResult<T> {
    return new BulkOperationResult<T>({ operation, successes: [], errors: [], duration: 0 });
  }

  /**
   * Percentage of items that succeeded; 0 for an empty batch
   */
  successRate(): number {
    if (this.total === 0) {
      return 0.0;
    }
    return (this.succeeded / this.total) * 100;
  }

  toJSON(): BulkOperationResultJSON<T> {
    return {
      operation: this.operation,
      total: this.total,
      succeeded: this.succeeded,
      failed: this.failed,
      successRate: this.successRate(),
      duration: this.duration,
      totalRetries: this.totalRetries,
      itemsWithRetries: this.itemsWithRetries,
      successes: [...this.successes],
      errors: [...this.errors],
    };
  }
}

export interface FilteredUpdateRequest {
  projectId?: number;
  /** OpenProject filter JSON, passed through unchanged */
  filters?: string;
  update: WorkPackageUpdate;
  /** Defaults to true */
  dryRun?: boolean;
  /** 1..50, defaults to 50 */
  maxResults?: number;
}

export interface FilteredUpdatePreview {
  dryRun: true;
  /** Total matches reported by the server, may exceed workPackages.length */
  matched: number;
  workPackages: WorkPackage[];
  update: WorkPackageUpdate;
}

export interface FilteredUpdateExecution {
  dryRun: false;
  matched: number;
  result: BulkOperationResult<WorkPackage>;
}

export type FilteredUpdateOutcome = FilteredUpdatePreview | FilteredUpdateExecution;
