/**
 * OpenProject API v3 client
 * Thin REST wrapper over fetch; every failure is raised as an ApiRequestError
 * carrying a transient/client-error classification for the retry executor.
 */

import type { z } from 'zod';
import { ApiRequestError, ErrorCode, classifyHttpStatus } from '../types/errors';
import type {
  Activity,
  ConnectionInfo,
  OpenProjectApi,
  Relation,
  RelationCreate,
  WorkPackage,
  WorkPackageCollection,
  WorkPackageCreate,
  WorkPackageQuery,
  WorkPackageUpdate,
} from '../types/openproject';
import {
  ActivityResponseSchema,
  RelationResponseSchema,
  RootResponseSchema,
  WorkPackageCollectionResponseSchema,
  WorkPackageResponseSchema,
} from '../types/schemas/openproject';
import { logger } from '../utils/logger';

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface OpenProjectClientOptions {
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

type HalLinks = Record<string, { href: string | null }>;

const DEFAULT_TIMEOUT = 30000;

const STATUS_HINTS: Record<number, string> = {
  401: 'Authentication failed. Please check your API key.',
  403: 'Access denied. The user lacks required permissions.',
  404: 'Resource not found. Please verify the resource exists.',
  422: 'The request was rejected by validation.',
  429: 'Too many requests. The server is rate limiting.',
  502: 'Bad gateway. The server or proxy is not responding correctly.',
  503: 'Service unavailable. The server might be under maintenance.',
};

function tryParseJson(text: string): unknown {
  try {
    const decoded: unknown = JSON.parse(text);
    return decoded;
  } catch {
    return undefined;
  }
}

function link(resource: string, id: number | null): { href: string | null } {
  return { href: id === null ? null : `/api/v3/${resource}/${id}` };
}

export class OpenProjectClient implements OpenProjectApi {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenProjectClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.fetchImpl = options.fetchImpl ?? fetch;

    const credentials = Buffer.from(`apikey:${options.apiKey}`).toString('base64');
    this.headers = {
      Authorization: `Basic ${credentials}`,
      'Content-Type': 'application/json',
      Accept: 'application/hal+json, application/json',
      'User-Agent': options.userAgent ?? 'openproject-bulk-mcp',
    };

    logger.info(`OpenProject client initialized for ${this.baseUrl}`);
  }

  async testConnection(): Promise<ConnectionInfo> {
    const root = this.parse(RootResponseSchema, await this.request('GET', ''), 'GET /');
    const info: ConnectionInfo = {};
    if (root.instanceName !== undefined) info.instanceName = root.instanceName;
    if (root.coreVersion !== undefined) info.coreVersion = root.coreVersion;
    const userTitle = root._links?.user?.title;
    if (userTitle !== undefined) info.userName = userTitle;
    return info;
  }

  async getWorkPackage(id: number): Promise<WorkPackage> {
    const endpoint = `/work_packages/${id}`;
    return this.parse(WorkPackageResponseSchema, await this.request('GET', endpoint), `GET ${endpoint}`);
  }

  async listWorkPackages(query: WorkPackageQuery): Promise<WorkPackageCollection> {
    let endpoint = query.projectId !== undefined ? `/projects/${query.projectId}/work_packages` : '/work_packages';

    const params: string[] = [];
    if (query.filters) params.push(`filters=${encodeURIComponent(query.filters)}`);
    if (query.offset !== undefined) params.push(`offset=${query.offset}`);
    if (query.pageSize !== undefined) params.push(`pageSize=${query.pageSize}`);
    if (params.length > 0) endpoint += `?${params.join('&')}`;

    const collection = this.parse(
      WorkPackageCollectionResponseSchema,
      await this.request('GET', endpoint),
      `GET ${endpoint}`
    );

    return {
      total: collection.total,
      count: collection.count,
      elements: collection._embedded.elements,
    };
  }

  async createWorkPackage(payload: WorkPackageCreate): Promise<WorkPackage> {
    const links: HalLinks = {
      project: link('projects', payload.project),
      type: link('types', payload.type),
    };
    if (payload.priorityId !== undefined) links.priority = link('priorities', payload.priorityId);
    if (payload.assigneeId !== undefined) links.assignee = link('users', payload.assigneeId);
    if (payload.statusId !== undefined) links.status = link('statuses', payload.statusId);
    if (payload.versionId !== undefined) links.version = link('versions', payload.versionId);
    if (payload.parentId !== undefined) links.parent = link('work_packages', payload.parentId);

    const body: Record<string, unknown> = {
      subject: payload.subject,
      _links: links,
    };
    if (payload.description !== undefined) body.description = { raw: payload.description };
    if (payload.startDate !== undefined) body.startDate = payload.startDate;
    if (payload.dueDate !== undefined) body.dueDate = payload.dueDate;

    return this.parse(
      WorkPackageResponseSchema,
      await this.request('POST', '/work_packages', body),
      'POST /work_packages'
    );
  }

  async updateWorkPackage(id: number, update: WorkPackageUpdate): Promise<WorkPackage> {
    // PATCH requires the current lockVersion
    const current = await this.getWorkPackage(id);

    const links: HalLinks = {};
    if (update.typeId !== undefined) links.type = link('types', update.typeId);
    if (update.statusId !== undefined) links.status = link('statuses', update.statusId);
    if (update.priorityId !== undefined) links.priority = link('priorities', update.priorityId);
    if (update.assigneeId !== undefined) links.assignee = link('users', update.assigneeId);
    if (update.versionId !== undefined) links.version = link('versions', update.versionId);
    if (update.parentId !== undefined) links.parent = link('work_packages', update.parentId);

    const body: Record<string, unknown> = { lockVersion: current.lockVersion ?? 0 };
    if (update.subject !== undefined) body.subject = update.subject;
    if (update.description !== undefined) body.description = { raw: update.description };
    if (update.percentageDone !== undefined) body.percentageDone = update.percentageDone;
    if (update.startDate !== undefined) body.startDate = update.startDate;
    if (update.dueDate !== undefined) body.dueDate = update.dueDate;
    if (Object.keys(links).length > 0) body._links = links;

    const endpoint = `/work_packages/${id}`;
    return this.parse(WorkPackageResponseSchema, await this.request('PATCH', endpoint, body), `PATCH ${endpoint}`);
  }

  async deleteWorkPackage(id: number): Promise<boolean> {
    await this.request('DELETE', `/work_packages/${id}`);
    return true;
  }

  async addWorkPackageComment(id: number, comment: string, internal: boolean): Promise<Activity> {
    const endpoint = `/work_packages/${id}/activities`;
    const body: Record<string, unknown> = { comment: { raw: comment } };
    if (internal) body.internal = true;
    return this.parse(ActivityResponseSchema, await this.request('POST', endpoint, body), `POST ${endpoint}`);
  }

  async createRelation(payload: RelationCreate): Promise<Relation> {
    const endpoint = `/work_packages/${payload.fromId}/relations`;
    const body: Record<string, unknown> = {
      type: payload.type,
      _links: { to: link('work_packages', payload.toId) },
    };
    if (payload.lag !== undefined) body.lag = payload.lag;
    if (payload.description !== undefined) body.description = payload.description;
    return this.parse(RelationResponseSchema, await this.request('POST', endpoint, body), `POST ${endpoint}`);
  }

  async deleteRelation(id: number): Promise<boolean> {
    await this.request('DELETE', `/relations/${id}`);
    return true;
  }

  /**
   * Execute a request against /api/v3 and return the decoded JSON body
   * (undefined for empty bodies).
   */
  private async request(method: HttpMethod, endpoint: string, body?: Record<string, unknown>): Promise<unknown> {
    const url = `${this.baseUrl}/api/v3${endpoint}`;
    logger.debug(`API request: ${method} ${url}`);

    const init: FetchInit = {
      method,
      headers: this.headers,
      signal: AbortSignal.timeout(this.timeout),
    };
    if (body !== undefined) init.body = JSON.stringify(body);

    let response: FetchResponse;
    let text: string;
    try {
      response = await this.fetchImpl(url, init);
      text = await response.text();
    } catch (error) {
      throw this.networkError(error, method, endpoint);
    }

    logger.debug(`API response: ${response.status} ${method} ${url}`);

    if (!response.ok) {
      const { kind, code } = classifyHttpStatus(response.status);
      const hint = STATUS_HINTS[response.status];
      const detail = this.extractErrorMessage(text) ?? response.statusText;
      throw new ApiRequestError(
        kind,
        code,
        `API Error ${response.status}: ${detail}${hint ? ` (${hint})` : ''}`,
        { statusCode: response.status, endpoint, method, responseBody: text.slice(0, 500) }
      );
    }

    if (text.trim() === '') {
      return undefined;
    }

    try {
      const decoded: unknown = JSON.parse(text);
      return decoded;
    } catch (error) {
      throw new ApiRequestError(
        'client-error',
        ErrorCode.API_ERROR,
        `Invalid JSON response from ${method} ${endpoint}`,
        { statusCode: response.status, endpoint, method, responseBody: text.slice(0, 200) },
        { cause: error }
      );
    }
  }

  private networkError(error: unknown, method: HttpMethod, endpoint: string): ApiRequestError {
    const message = error instanceof Error ? error.message : String(error);
    const name = error instanceof Error ? error.name : '';

    if (name === 'TimeoutError' || name === 'AbortError') {
      return new ApiRequestError(
        'transient',
        ErrorCode.TIMEOUT_ERROR,
        `Request timed out after ${this.timeout}ms: ${method} ${endpoint}`,
        { endpoint, method },
        { cause: error }
      );
    }

    const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return new ApiRequestError(
      'transient',
      ErrorCode.NETWORK_ERROR,
      `Network error accessing ${method} ${endpoint}: ${message}${cause}`,
      { endpoint, method },
      { cause: error }
    );
  }

  /**
   * OpenProject answers errors with a HAL `Error` document carrying `message`.
   */
  private extractErrorMessage(text: string): string | undefined {
    if (!text) return undefined;
    const decoded = tryParseJson(text);
    if (decoded !== null && typeof decoded === 'object' && 'message' in decoded && typeof decoded.message === 'string') {
      return decoded.message;
    }
    return text.slice(0, 200);
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, context: string): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      const issue = result.error.errors[0];
      const where = issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'unexpected shape';
      throw new ApiRequestError('client-error', ErrorCode.API_ERROR, `Unexpected response from ${context} (${where})`, {
        endpoint: context,
      });
    }
    return result.data;
  }
}
