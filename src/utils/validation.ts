/**
 * Input validation helpers shared by the bulk tools
 */

import { z } from 'zod';
import { MCPError, ErrorCode } from '../types/errors';

/**
 * Maximum length accepted for a raw filter string (keeps the query URL bounded)
 */
const MAX_FILTER_LENGTH = 4000;

/**
 * OpenProject filters are a JSON array of single-key objects:
 * `[{"status":{"operator":"o","values":[]}}]`
 */
const FilterListSchema = z.array(
  z.record(
    z.object({
      operator: z.string().min(1),
      values: z.array(z.union([z.string(), z.number()])).optional(),
    }),
  ),
);

/**
 * Validate that an ID is a positive integer
 */
export function validateId(id: number, fieldName: string): void {
  if (typeof id !== 'number' || !Number.isInteger(id) || id <= 0) {
    throw new MCPError(ErrorCode.VALIDATION_ERROR, `${fieldName} must be a positive integer (got ${String(id)})`, {
      field: fieldName,
    });
  }
}

export function validateNonBlank(value: string, fieldName: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new MCPError(ErrorCode.VALIDATION_ERROR, `${fieldName} cannot be empty`, { field: fieldName });
  }
  return trimmed;
}

/**
 * Check the shape of a raw filter string. The string itself is forwarded unchanged.
 */
export function validateFilterJson(filters: string): void {
  if (filters.length > MAX_FILTER_LENGTH) {
    throw new MCPError(
      ErrorCode.VALIDATION_ERROR,
      `filters is too long (${filters.length} characters, max ${MAX_FILTER_LENGTH})`,
      { field: 'filters' },
    );
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(filters);
  } catch (error) {
    throw new MCPError(
      ErrorCode.VALIDATION_ERROR,
      `filters must be valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { field: 'filters' },
    );
  }

  const result = FilterListSchema.safeParse(decoded);
  if (!result.success) {
    throw new MCPError(
      ErrorCode.VALIDATION_ERROR,
      'filters must be a JSON array of {"<field>": {"operator": "...", "values": [...]}} objects',
      { field: 'filters' },
    );
  }
}
