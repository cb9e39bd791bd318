import { ApiRequestError, ErrorCode } from '../../src/types/errors';
import type { OpenProjectApi, Relation, WorkPackage } from '../../src/types/openproject';

/**
 * OpenProject API stand-in whose methods are all jest mocks
 */
export function createMockApi(): jest.Mocked<OpenProjectApi> {
  return {
    getWorkPackage: jest.fn(),
    listWorkPackages: jest.fn(),
    createWorkPackage: jest.fn(),
    updateWorkPackage: jest.fn(),
    deleteWorkPackage: jest.fn(),
    addWorkPackageComment: jest.fn(),
    createRelation: jest.fn(),
    deleteRelation: jest.fn(),
    testConnection: jest.fn(),
  };
}

export function workPackage(id: number, subject = `Work package ${id}`): WorkPackage {
  return { id, subject, lockVersion: 1 };
}

export function relation(id: number, type = 'blocks'): Relation {
  return { id, type };
}

export function timeoutError(endpoint: string): ApiRequestError {
  return new ApiRequestError('transient', ErrorCode.TIMEOUT_ERROR, `Request timed out after 30000ms: ${endpoint}`, {
    endpoint,
  });
}

export function networkError(endpoint: string): ApiRequestError {
  return new ApiRequestError(
    'transient',
    ErrorCode.NETWORK_ERROR,
    `Network error accessing ${endpoint}: fetch failed: connect ECONNREFUSED`,
    { endpoint },
  );
}

export function notFoundError(): ApiRequestError {
  return new ApiRequestError('client-error', ErrorCode.NOT_FOUND, 'API Error 404: Not found', { statusCode: 404 });
}
