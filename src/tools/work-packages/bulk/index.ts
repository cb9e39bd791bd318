/**
 * Bulk operations module exports
 */

export { BulkOperationProcessor } from './BulkOperationProcessor';
export { BulkOperationValidator, MAX_FILTER_RESULTS } from './BulkOperationValidator';
export { BulkOperationResult, MAX_BATCH_SIZE } from './BulkOperationTypes';

export type { BulkProcessorOptions, RetryPolicy } from './BulkOperationProcessor';
export type {
  BulkOperationKind,
  BulkOperationResultJSON,
  BulkTask,
  CommentConfirmation,
  DeletionConfirmation,
  FilteredUpdateExecution,
  FilteredUpdateOutcome,
  FilteredUpdatePreview,
  FilteredUpdateRequest,
} from './BulkOperationTypes';
