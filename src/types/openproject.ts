/**
 * OpenProject API v3 types used by the bulk tools.
 * Entity shapes are inferred from the response schemas; HAL documents carry
 * more fields than are modelled here.
 */

import type { z } from 'zod';
import type {
  ActivityResponseSchema,
  RelationCreateSchema,
  RelationResponseSchema,
  RelationTypeSchema,
  WorkPackageCreateSchema,
  WorkPackageResponseSchema,
  WorkPackageUpdateSchema,
} from './schemas/openproject';

export type WorkPackage = z.infer<typeof WorkPackageResponseSchema>;
export type Activity = z.infer<typeof ActivityResponseSchema>;
export type Relation = z.infer<typeof RelationResponseSchema>;
export type RelationType = z.infer<typeof RelationTypeSchema>;

export type WorkPackageUpdate = z.infer<typeof WorkPackageUpdateSchema>;
export type WorkPackageCreate = z.infer<typeof WorkPackageCreateSchema>;
export type RelationCreate = z.infer<typeof RelationCreateSchema>;

export interface WorkPackageCollection {
  total: number;
  count: number;
  elements: WorkPackage[];
}

export interface WorkPackageQuery {
  projectId?: number;
  /** OpenProject filter JSON, passed through unchanged */
  filters?: string;
  offset?: number;
  pageSize?: number;
}

export interface ConnectionInfo {
  instanceName?: string;
  coreVersion?: string;
  userName?: string;
}

/**
 * The remote operations the bulk engine depends on. Every method may reject
 * with an ApiRequestError carrying a transient/client-error classification.
 */
export interface OpenProjectApi {
  getWorkPackage(id: number): Promise<WorkPackage>;
  listWorkPackages(query: WorkPackageQuery): Promise<WorkPackageCollection>;
  createWorkPackage(payload: WorkPackageCreate): Promise<WorkPackage>;
  updateWorkPackage(id: number, update: WorkPackageUpdate): Promise<WorkPackage>;
  deleteWorkPackage(id: number): Promise<boolean>;
  addWorkPackageComment(id: number, comment: string, internal: boolean): Promise<Activity>;
  createRelation(payload: RelationCreate): Promise<Relation>;
  deleteRelation(id: number): Promise<boolean>;
  testConnection(): Promise<ConnectionInfo>;
}
