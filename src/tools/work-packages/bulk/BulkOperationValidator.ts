/**
 * Validation and preprocessing for bulk operations.
 * Everything here runs before the first remote call of a batch.
 */

import type { z } from 'zod';
import { MCPError, ErrorCode } from '../../../types/errors';
import type { RelationCreate, WorkPackageCreate, WorkPackageUpdate } from '../../../types/openproject';
import {
  RelationCreateSchema,
  WorkPackageCreateSchema,
  WorkPackageUpdateSchema,
} from '../../../types/schemas/openproject';
import { validateFilterJson, validateId, validateNonBlank } from '../../../utils/validation';
import { MAX_BATCH_SIZE, OPERATION_WORDING, type BulkOperationKind } from './BulkOperationTypes';

export const MAX_FILTER_RESULTS = 50;

/**
 * Message for the first problem of one payload item, e.g.
 * `Work package #2: missing required field 'subject'`
 */
function describeItemIssue(label: string, index: number, error: z.ZodError): string {
  const prefix = `${label} #${index + 1}`;
  const issue = error.errors[0];
  if (!issue) {
    return `${prefix}: invalid item`;
  }

  const field = issue.path.join('.');
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `${prefix}: missing required field '${field}'`;
  }
  return field ? `${prefix}: ${field}: ${issue.message}` : `${prefix}: ${issue.message}`;
}

/**
 * Validator for bulk operations
 */
export class BulkOperationValidator {
  /**
   * Reject empty batches and batches above the operation's ceiling
   */
  static validateBatchSize(kind: BulkOperationKind, items: readonly unknown[]): void {
    const wording = OPERATION_WORDING[kind];
    const limit = MAX_BATCH_SIZE[kind];

    if (items.length === 0) {
      throw new MCPError(ErrorCode.VALIDATION_ERROR, `${wording.field} cannot be empty`, {
        field: wording.field,
      });
    }

    if (items.length > limit) {
      throw new MCPError(
        ErrorCode.VALIDATION_ERROR,
        `Cannot ${wording.action} more than ${limit} ${wording.noun} at once for safety. ` +
          `You provided ${items.length}. Please split into multiple batches.`,
        { field: wording.field, limit, current: items.length },
      );
    }
  }

  static validateIds(ids: readonly number[], fieldName: string): void {
    ids.forEach((id) => validateId(id, fieldName));
  }

  /**
   * Validate an update payload; at least one field must be set
   */
  static validateUpdate(update: unknown): WorkPackageUpdate {
    const result = WorkPackageUpdateSchema.strict().safeParse(update);
    if (!result.success) {
      const issue = result.error.errors[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new MCPError(
        ErrorCode.VALIDATION_ERROR,
        `Invalid update: ${where}${issue ? issue.message : 'unexpected shape'}`,
      );
    }

    if (Object.values(result.data).every((value) => value === undefined)) {
      throw new MCPError(ErrorCode.VALIDATION_ERROR, 'At least one update field must be provided');
    }

    return result.data;
  }

  /**
   * Every creation item must carry project, subject and type
   */
  static validateCreateItems(items: readonly unknown[]): WorkPackageCreate[] {
    return items.map((item, index) => {
      const result = WorkPackageCreateSchema.safeParse(item ?? {});
      if (!result.success) {
        throw new MCPError(ErrorCode.VALIDATION_ERROR, describeItemIssue('Work package', index, result.error), {
          itemIndex: index,
        });
      }
      return result.data;
    });
  }

  /**
   * Every relation item must carry fromId, toId and type
   */
  static validateRelationItems(items: readonly unknown[]): RelationCreate[] {
    return items.map((item, index) => {
      const result = RelationCreateSchema.safeParse(item ?? {});
      if (!result.success) {
        throw new MCPError(ErrorCode.VALIDATION_ERROR, describeItemIssue('Relation', index, result.error), {
          itemIndex: index,
        });
      }
      if (result.data.fromId === result.data.toId) {
        throw new MCPError(
          ErrorCode.VALIDATION_ERROR,
          `Relation #${index + 1}: a work package cannot be related to itself`,
          { itemIndex: index },
        );
      }
      return result.data;
    });
  }

  static validateComment(comment: string): string {
    return validateNonBlank(comment, 'Comment');
  }

  static validateParentId(parentId: number, ids: readonly number[]): void {
    validateId(parentId, 'parentId');
    if (ids.includes(parentId)) {
      throw new MCPError(
        ErrorCode.VALIDATION_ERROR,
        `Work package #${parentId} cannot be its own parent`,
        { field: 'parentId' },
      );
    }
  }

  static validateMaxResults(maxResults: number): void {
    if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > MAX_FILTER_RESULTS) {
      throw new MCPError(
        ErrorCode.VALIDATION_ERROR,
        `maxResults must be an integer between 1 and ${MAX_FILTER_RESULTS} (got ${maxResults})`,
        { field: 'maxResults', limit: MAX_FILTER_RESULTS, current: maxResults },
      );
    }
  }

  static validateFilters(filters: string | undefined): void {
    if (filters !== undefined) {
      validateFilterJson(filters);
    }
  }
}
