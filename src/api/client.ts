/**
 * Deputy v1 API client
 *
 * A thin fetch wrapper: it builds URLs, sends credentials, validates response
 * bodies with zod, and turns failures into typed errors:
 * - non-2xx responses become ApiError (status, code, sanitised message)
 * - requests that never got a response become NetworkError
 *
 * The client never retries; `retryable` on the error tells the caller whether
 * it may.
 */

import { z } from 'zod';
import {
  authorizationHeader,
  requireCredentials,
  resolveBaseUrl,
  type Credentials,
  type DeputyEnv,
} from '../config/index.js';
import { CLIError, NetworkError, findInChain, messageOf } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ApiError, ErrorCode, isStatus } from './errors.js';
import {
  AgreementSchema,
  AwardSchema,
  DepartmentSchema,
  EmployeeSchema,
  JournalSchema,
  LeaveSchema,
  LocationSchema,
  MeInfoSchema,
  MemoSchema,
  ResourceInfoSchema,
  ResourceRecordSchema,
  RosterSchema,
  SalesDataSchema,
  TimesheetSchema,
  WebhookSchema,
  type Agreement,
  type Award,
  type Department,
  type Employee,
  type Journal,
  type Leave,
  type Location,
  type MeInfo,
  type Memo,
  type ResourceInfo,
  type ResourceRecord,
  type Roster,
  type SalesData,
  type Timesheet,
  type Webhook,
} from './schemas.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Server-side paging. The API calls these `max` and `start`; 0 means unset.
 */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

export type QueryOperator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';

export interface QueryFilter {
  field: string;
  type: QueryOperator;
  data: string | number | boolean;
}

/**
 * Body of a `POST /resource/<Name>/QUERY` request.
 */
export interface QueryInput {
  search?: Record<string, QueryFilter>;
  sort?: Record<string, 'asc' | 'desc'>;
  max?: number;
  start?: number;
}

/**
 * The API operations the CLI uses. Tests substitute a stub.
 */
export interface DeputyApi {
  me(): Promise<MeInfo>;
  myTimesheets(): Promise<Timesheet[]>;
  myRosters(): Promise<Roster[]>;
  myLeave(): Promise<Leave[]>;

  listEmployees(options?: ListOptions): Promise<Employee[]>;
  getEmployee(id: number): Promise<Employee>;

  listTimesheets(options?: ListOptions): Promise<Timesheet[]>;
  queryTimesheets(input: QueryInput): Promise<Timesheet[]>;
  getTimesheet(id: number): Promise<Timesheet>;

  listRosters(options?: ListOptions): Promise<Roster[]>;
  getRoster(id: number): Promise<Roster>;

  listLeave(options?: ListOptions): Promise<Leave[]>;
  getLeave(id: number): Promise<Leave>;

  listLocations(options?: ListOptions): Promise<Location[]>;
  getLocation(id: number): Promise<Location>;

  listDepartments(options?: ListOptions): Promise<Department[]>;
  getDepartment(id: number): Promise<Department>;

  listWebhooks(options?: ListOptions): Promise<Webhook[]>;
  getWebhook(id: number): Promise<Webhook>;

  listAwards(): Promise<Award[]>;
  listAgreements(employee: number, activeOnly?: boolean): Promise<Agreement[]>;
  listSales(company?: number): Promise<SalesData[]>;
  listMemos(company: number): Promise<Memo[]>;
  listJournals(employee: number): Promise<Journal[]>;

  resourceInfo(resource: string): Promise<ResourceInfo>;
  getResource(resource: string, id: number): Promise<ResourceRecord>;
}

export interface DeputyClientOptions {
  credentials: Credentials;
  timeoutMs: number;
  /** Include raw error bodies and request lines in errors */
  debug?: boolean;
  logger?: Logger;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

type HttpMethod = 'GET' | 'POST';

interface RequestOptions {
  body?: unknown;
  params?: ListOptions;
}

interface RawResponse {
  status: number;
  text: string;
  retryAfter: string | null;
}

// ============================================================================
// ERROR RESPONSES
// ============================================================================

/** Longest raw error body included in a debug-mode message */
export const MAX_ERROR_BODY_LENGTH = 500;

const GENERIC_STATUS_MESSAGES: Record<number, string> = {
  400: 'bad request',
  401: 'unauthorized',
  403: 'forbidden',
  404: 'not found',
  405: 'method not allowed',
  409: 'conflict',
  422: 'unprocessable entity',
  429: 'too many requests',
  500: 'server error',
  502: 'bad gateway',
  503: 'service unavailable',
  504: 'gateway timeout',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonBlank(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Seconds to wait from a Retry-After header (delta-seconds or HTTP date).
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim() === '') return undefined;

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, Math.ceil((date - now) / 1000));
}

export interface SanitizeOptions {
  debug?: boolean;
  retryAfter?: number;
}

/**
 * Build an ApiError from an error response.
 *
 * The message comes from `{"error": {"message"}}` or `{"message"}` when the
 * body has one; otherwise, in debug mode, from the body itself (truncated);
 * otherwise from a generic phrase for the status.
 */
export function sanitizeErrorResponse(status: number, body: string, options: SanitizeOptions = {}): ApiError {
  let message: string | undefined;
  let field: string | undefined;

  const parsed = safeJsonParse(body);
  if (isRecord(parsed)) {
    const inner = parsed['error'];
    if (isRecord(inner)) {
      message = nonBlank(inner['message']);
      field = nonBlank(inner['field']);
    }
    message ??= nonBlank(parsed['message']);
  }

  if (message === undefined && options.debug && body.length > 0) {
    message = body.length > MAX_ERROR_BODY_LENGTH ? `${body.slice(0, MAX_ERROR_BODY_LENGTH)}...` : body;
  }

  if (message === undefined) {
    message = GENERIC_STATUS_MESSAGES[status] ?? (status >= 500 ? 'server error' : 'request failed');
  }

  return new ApiError({ statusCode: status, detail: message, retryAfter: options.retryAfter, field });
}

function systemErrorCode(error: unknown): string | undefined {
  const found = findInChain(
    error,
    (e): e is Error & { code: string } => e instanceof Error && 'code' in e && typeof e.code === 'string'
  );
  return found?.code;
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Map a fetch failure (no HTTP response) to a NetworkError.
 */
export function toNetworkError(error: unknown, method: string, url: string, timeoutMs: number): NetworkError {
  const request = `${method} ${url}`;

  if (isAbort(error)) {
    return new NetworkError(`${request}: timeout after ${timeoutMs}ms`, ErrorCode.TIMEOUT, error);
  }

  switch (systemErrorCode(error)) {
    case 'ECONNREFUSED':
      return new NetworkError(`${request}: connection refused`, ErrorCode.NETWORK_ERROR, error);
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return new NetworkError(`${request}: no such host`, ErrorCode.NETWORK_ERROR, error);
    case 'ETIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
      return new NetworkError(`${request}: timeout`, ErrorCode.TIMEOUT, error);
    default:
      return new NetworkError(`${request}: ${messageOf(error)}`, ErrorCode.NETWORK_ERROR, error);
  }
}

// ============================================================================
// CLIENT
// ============================================================================

function pagingBody(options: ListOptions | undefined): QueryInput | undefined {
  const max = options?.limit ?? 0;
  const start = options?.offset ?? 0;
  if (max <= 0 && start <= 0) return undefined;
  const input: QueryInput = {};
  if (max > 0) input.max = max;
  if (start > 0) input.start = start;
  return input;
}

export class DeputyClient implements DeputyApi {
  readonly baseUrl: string;
  private readonly credentials: Credentials;
  private readonly timeoutMs: number;
  private readonly debug: boolean;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DeputyClientOptions) {
    this.credentials = options.credentials;
    this.baseUrl = resolveBaseUrl(options.credentials);
    this.timeoutMs = options.timeoutMs;
    this.debug = options.debug ?? false;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  // --------------------------------------------------------------------------
  // Transport
  // --------------------------------------------------------------------------

  buildUrl(path: string, params?: ListOptions): string {
    const query = new URLSearchParams();
    if (params?.limit !== undefined && params.limit > 0) query.set('max', String(params.limit));
    if (params?.offset !== undefined && params.offset > 0) query.set('start', String(params.offset));
    const search = query.toString();
    return search ? `${this.baseUrl}${path}?${search}` : `${this.baseUrl}${path}`;
  }

  /**
   * Send one request; a failure without an HTTP response becomes NetworkError.
   */
  private async send(method: HttpMethod, url: string, body: unknown): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: authorizationHeader(this.credentials),
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      return {
        status: response.status,
        retryAfter: response.headers.get('retry-after'),
        text: await response.text(),
      };
    } catch (error) {
      this.logger.debug?.(`${method} ${url} -> ${messageOf(error)}`);
      throw toNetworkError(error, method, url, this.timeoutMs);
    } finally {
      clearTimeout(timer);
    }
  }

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const url = this.buildUrl(path, options.params);
    const { status, text, retryAfter } = await this.send(method, url, options.body);

    this.logger.debug?.(`${method} ${url} -> ${status}`);

    if (status >= 400) {
      const apiError = sanitizeErrorResponse(status, text, {
        debug: this.debug,
        retryAfter: parseRetryAfter(retryAfter),
      });
      if (this.debug) {
        throw new Error(`${method} ${url}: ${apiError.message}`, { cause: apiError });
      }
      throw apiError;
    }

    const body = text.trim() === '' ? null : safeJsonParse(text);
    if (body === undefined) {
      throw new CLIError(
        `invalid JSON in response from ${method} ${path}`,
        'Check DEPUTY_BASE_URL points at the Deputy API; use --debug to see the request'
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new CLIError(
        `unexpected response from ${method} ${path}: ${where}${issue?.message ?? 'invalid shape'}`,
        'Use --debug for details'
      );
    }
    return result.data;
  }

  private get<S extends z.ZodTypeAny>(path: string, schema: S, params?: ListOptions): Promise<z.output<S>> {
    return this.request('GET', path, schema, { params });
  }

  private post<S extends z.ZodTypeAny>(path: string, schema: S, body: unknown): Promise<z.output<S>> {
    return this.request('POST', path, schema, { body });
  }

  /**
   * GET a collection, or POST a QUERY for it when paging is requested
   * (these endpoints ignore `max` and `start` on GET).
   */
  private listViaQuery<S extends z.ZodTypeAny>(
    path: string,
    resource: string,
    schema: S,
    options?: ListOptions
  ): Promise<z.output<S>> {
    const paging = pagingBody(options);
    return paging
      ? this.post(`/resource/${resource}/QUERY`, schema, paging)
      : this.get(path, schema);
  }

  // --------------------------------------------------------------------------
  // Current user
  // --------------------------------------------------------------------------

  me(): Promise<MeInfo> {
    return this.get('/me', MeInfoSchema);
  }

  myTimesheets(): Promise<Timesheet[]> {
    return this.get('/my/timesheets', z.array(TimesheetSchema));
  }

  myRosters(): Promise<Roster[]> {
    return this.get('/my/rosters', z.array(RosterSchema));
  }

  myLeave(): Promise<Leave[]> {
    return this.get('/my/leave', z.array(LeaveSchema));
  }

  // --------------------------------------------------------------------------
  // Resources
  // --------------------------------------------------------------------------

  listEmployees(options?: ListOptions): Promise<Employee[]> {
    return this.listViaQuery('/supervise/employee', 'Employee', z.array(EmployeeSchema), options);
  }

  getEmployee(id: number): Promise<Employee> {
    return this.get(`/supervise/employee/${id}`, EmployeeSchema);
  }

  listTimesheets(options?: ListOptions): Promise<Timesheet[]> {
    return this.get('/my/timesheets', z.array(TimesheetSchema), options);
  }

  queryTimesheets(input: QueryInput): Promise<Timesheet[]> {
    return this.post('/resource/Timesheet/QUERY', z.array(TimesheetSchema), input);
  }

  getTimesheet(id: number): Promise<Timesheet> {
    return this.get(`/supervise/timesheet/${id}`, TimesheetSchema);
  }

  listRosters(options?: ListOptions): Promise<Roster[]> {
    return this.get('/supervise/roster', z.array(RosterSchema), options);
  }

  getRoster(id: number): Promise<Roster> {
    return this.get(`/resource/Roster/${id}`, RosterSchema);
  }

  listLeave(options?: ListOptions): Promise<Leave[]> {
    return this.get('/resource/Leave', z.array(LeaveSchema), options);
  }

  getLeave(id: number): Promise<Leave> {
    return this.get(`/resource/Leave/${id}`, LeaveSchema);
  }

  /**
   * Locations come from the simplified endpoint; accounts without access to
   * it (403/404) fall back to the Company resource.
   */
  async listLocations(options?: ListOptions): Promise<Location[]> {
    const schema = z.array(LocationSchema);
    try {
      return await this.get('/supervise/location/simplified', schema, options);
    } catch (error) {
      if (!isStatus(error, 404) && !isStatus(error, 403)) {
        throw error;
      }
      this.logger.debug?.('locations list falling back to /resource/Company');
      try {
        return await this.get('/resource/Company', schema, options);
      } catch (fallbackError) {
        throw new Error(
          `locations list failed: ${messageOf(error)} (fallback to /resource/Company failed: ${messageOf(fallbackError)})`,
          { cause: error }
        );
      }
    }
  }

  getLocation(id: number): Promise<Location> {
    return this.get(`/resource/Company/${id}`, LocationSchema);
  }

  listDepartments(options?: ListOptions): Promise<Department[]> {
    return this.listViaQuery('/resource/OperationalUnit', 'OperationalUnit', z.array(DepartmentSchema), options);
  }

  getDepartment(id: number): Promise<Department> {
    return this.get(`/resource/OperationalUnit/${id}`, DepartmentSchema);
  }

  listWebhooks(options?: ListOptions): Promise<Webhook[]> {
    return this.get('/resource/Webhook', z.array(WebhookSchema), options);
  }

  getWebhook(id: number): Promise<Webhook> {
    return this.get(`/resource/Webhook/${id}`, WebhookSchema);
  }

  // --------------------------------------------------------------------------
  // Pay, sales and management (these endpoints return everything at once)
  // --------------------------------------------------------------------------

  listAwards(): Promise<Award[]> {
    return this.get('/payroll/listAwardsLibrary', z.array(AwardSchema));
  }

  listAgreements(employee: number, activeOnly = false): Promise<Agreement[]> {
    const search: Record<string, QueryFilter> = {
      s1: { field: 'EmployeeId', type: 'eq', data: employee },
    };
    if (activeOnly) search['s2'] = { field: 'Active', type: 'eq', data: true };
    return this.post('/resource/EmployeeAgreement/QUERY', z.array(AgreementSchema), { search });
  }

  listSales(company?: number): Promise<SalesData[]> {
    const path = company === undefined ? '/resource/SalesData' : `/resource/SalesData?company=${company}`;
    return this.get(path, z.array(SalesDataSchema));
  }

  listMemos(company: number): Promise<Memo[]> {
    return this.get(`/supervise/memo?company=${company}`, z.array(MemoSchema));
  }

  listJournals(employee: number): Promise<Journal[]> {
    return this.get(`/supervise/journal?employee=${employee}`, z.array(JournalSchema));
  }

  resourceInfo(resource: string): Promise<ResourceInfo> {
    return this.get(`/resource/${encodeURIComponent(resource)}/INFO`, ResourceInfoSchema);
  }

  getResource(resource: string, id: number): Promise<ResourceRecord> {
    return this.get(`/resource/${encodeURIComponent(resource)}/${id}`, ResourceRecordSchema);
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export interface ClientContext {
  env: DeputyEnv;
  debug: boolean;
  logger: Logger;
}

/**
 * Builds the API client for a command. Passed to `createProgram` so tests can
 * substitute a stub.
 */
export type ClientFactory = (context: ClientContext) => DeputyApi;

export const createDefaultClient: ClientFactory = ({ env, debug, logger }) =>
  new DeputyClient({
    credentials: requireCredentials(env),
    timeoutMs: env.DEPUTY_TIMEOUT_MS,
    debug,
    logger,
  });

/**
 * Commonly used resource names for the generic `resource` commands.
 */
export const KNOWN_RESOURCES: readonly string[] = [
  'Employee',
  'EmployeeRole',
  'Company',
  'OperationalUnit',
  'Timesheet',
  'PayRules',
  'TimesheetPayReturn',
  'Roster',
  'Leave',
  'LeaveRules',
  'LeaveAccrualTransaction',
  'Address',
  'Contact',
  'EmploymentContract',
  'EmployeeAvailability',
  'EmployeeSalaryOpunitCosting',
  'EmployeeAppraisal',
  'EmployeeAgreement',
  'EmployeeHistory',
  'TrainingModule',
  'TrainingRecord',
  'Task',
  'Memo',
  'Journal',
  'Comment',
  'Webhook',
  'SalesData',
  'SystemUsageTracking',
];
