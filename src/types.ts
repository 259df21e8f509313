export type TestStatus = 'passed' | 'failed' | 'skipped' | 'error';

/** How snapshots are written while testing. */
export type UpdateMode = 'none' | 'all' | 'failed' | 'missing';

export interface HttpHeader {
  name: string;
  value: string;
}

export interface BasicAuthDescriptor {
  type: 'basic';
  username: string;
  password: string;
}

export interface BearerAuthDescriptor {
  type: 'bearer';
  token: string;
}

export type OAuth2GrantType = 'password' | 'client_credentials';

export interface OAuth2AuthDescriptor {
  type: 'oauth2';
  tokenUrl: string;
  clientId: string;
  clientSecret?: string;
  username?: string;
  password?: string;
  scopes?: string[];
  grantType: OAuth2GrantType;
  /** Seeds the provider so the first refresh uses the refresh_token grant */
  refreshToken?: string;
}

export type AuthDescriptor = BasicAuthDescriptor | BearerAuthDescriptor | OAuth2AuthDescriptor;

export type JsonSchema = Record<string, unknown>;

/** The slice of an API description the schema validator needs for one operation. */
export interface OperationDescriptor {
  method: string;
  path: string;
  operationId?: string;
  /** Response schemas keyed by status code ("200") or "default" */
  responses?: Record<string, { schema?: JsonSchema }>;
}

export type ExtractionSource = 'body' | 'header' | 'status';

export interface VariableExtraction {
  name: string;
  source: ExtractionSource;
  /** JSON path for body extraction, header name for header extraction */
  path?: string;
  regexp?: string;
  default?: string;
  required?: boolean;
}

export type AssertionKind =
  | 'equals'
  | 'contains'
  | 'matches'
  | 'exists'
  | 'notExists'
  | 'in'
  | 'lessThan'
  | 'lt'
  | 'greaterThan'
  | 'gt'
  | 'null';

export type AssertionSource = 'body' | 'header' | 'status' | 'contentType';

export interface Assertion {
  type: AssertionKind;
  source: AssertionSource;
  path?: string;
  value?: string;
  values?: string[];
  not?: boolean;
  ignoreCase?: boolean;
}

export interface AssertionResult {
  type: AssertionKind;
  source: AssertionSource;
  path?: string;
  passed: boolean;
  actual?: string;
  expected?: string;
  message?: string;
}

/**
 * A request as supplied by a collection. Placeholders stay unresolved here;
 * the executor works on substituted copies.
 */
export interface ApiRequest {
  readonly name?: string;
  readonly method: string;
  readonly url: string;
  readonly headers: readonly HttpHeader[];
  readonly body?: string;
  readonly auth?: AuthDescriptor;
  readonly tags?: readonly string[];
  /** Request path used for snapshot identity, e.g. "/users/{id}" */
  readonly path?: string;
  readonly operation?: OperationDescriptor;
  readonly extract?: readonly VariableExtraction[];
  readonly assertions?: readonly Assertion[];
}

export interface ApiResponse {
  statusCode: number;
  statusText: string;
  /** Header multimap keyed by lower-cased name */
  headers: Record<string, string[]>;
  body: Buffer;
  contentType: string;
  contentLength: number;
  /** Wall-clock time around the whole retry sequence */
  durationMs: number;
  timestamp: Date;
  request: ApiRequest;
  requestId?: string;
  attempts?: number;
}

export type RetryableErrorClass = 'timeout' | 'network';

export interface RetryPolicy {
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffFactor: number;
  /** Fraction in [0, 1] */
  jitter: number;
  retryableStatusCodes: number[];
  retryableErrors: RetryableErrorClass[];
  /** Extra error codes (e.g. "ECONNREFUSED") treated as retryable */
  retryableErrorCodes?: string[];
  /** When false, only idempotent methods are retried */
  retryNonIdempotent?: boolean;
}

export interface Cookie {
  name: string;
  value: string;
  path?: string;
  domain?: string;
  expires?: string;
  maxAge?: number;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: string;
}

export interface RequestCollection {
  name: string;
  /** File identity, e.g. "users/users.http" */
  path: string;
  requests: ApiRequest[];
}

export interface TestFilter {
  tags?: string[];
  methods?: string[];
  paths?: string[];
  names?: string[];
  metadata?: Record<string, string>;
}

export interface ValidationOptions {
  ignoreAdditionalProperties?: boolean;
  ignoreFormats?: boolean;
  ignorePatterns?: boolean;
  requiredPropertiesOnly?: boolean;
  ignoreNullable?: boolean;
  ignoredProperties?: string[];
}

export interface SchemaValidationIssue {
  path: string;
  message: string;
  keyword?: string;
}

export interface SchemaValidationResult {
  valid: boolean;
  errors: SchemaValidationIssue[];
  schemaPath?: string;
  responseStatus: number;
  contentType: string;
}

export interface SchemaValidator {
  validate(
    response: ApiResponse,
    operation: OperationDescriptor,
    options: ValidationOptions
  ): Promise<SchemaValidationResult> | SchemaValidationResult;
}

export interface SnapshotMetadata {
  requestPath: string;
  requestMethod: string;
  contentType: string;
  statusCode: number;
  headers: Record<string, string[]>;
  createdAt: string;
  /** Present only when content holds base64 of an opaque body */
  encoding?: 'base64';
}

export interface SnapshotFile {
  metadata: SnapshotMetadata;
  content: string;
}

export interface StatusDiff {
  expected: number;
  actual: number;
  equal: boolean;
}

export interface HeaderValueDiff {
  expected: string[];
  actual: string[];
}

export interface HeaderDiff {
  missingHeaders: Record<string, string[]>;
  extraHeaders: Record<string, string[]>;
  differentValues: Record<string, HeaderValueDiff>;
  equal: boolean;
}

export interface TypeDiff {
  expectedType: string;
  actualType: string;
}

export interface ValueDiff {
  expected: unknown;
  actual: unknown;
}

export interface JsonDiff {
  missingFields: string[];
  extraFields: string[];
  differentTypes: Record<string, TypeDiff>;
  differentValues: Record<string, ValueDiff>;
  equal: boolean;
}

export interface BodyDiff {
  contentType: string;
  expectedSize: number;
  actualSize: number;
  expectedContent: string;
  actualContent: string;
  diffContent?: string;
  jsonDiff?: JsonDiff;
  equal: boolean;
}

export interface SnapshotDiff {
  requestPath: string;
  requestMethod: string;
  status: StatusDiff;
  headers: HeaderDiff;
  body: BodyDiff;
  equal: boolean;
}

export interface SnapshotResult {
  snapshotPath: string;
  exists: boolean;
  matches: boolean;
  created: boolean;
  updated: boolean;
  updateMode: UpdateMode;
  diff?: SnapshotDiff;
  note?: string;
}

export interface SnapshotStats {
  total: number;
  passed: number;
  failed: number;
  created: number;
  updated: number;
  errors: number;
  startTime: Date;
  endTime?: Date;
}

export interface TestResult {
  name: string;
  filePath: string;
  /** Position of the request in file-then-request order */
  index: number;
  request: ApiRequest;
  response?: ApiResponse;
  snapshot?: SnapshotResult;
  schema?: SchemaValidationResult;
  durationMs: number;
  status: TestStatus;
  error?: string;
  tags: string[];
  metadata?: Record<string, string>;
  extractedVariables?: Record<string, string>;
  assertionResults?: AssertionResult[];
}

export interface SequenceStep {
  name: string;
  description?: string;
  request: ApiRequest;
  expectedStatus?: number;
  extract?: VariableExtraction[];
  waitBeforeMs?: number;
  waitAfterMs?: number;
  skip?: boolean;
  /** `left == right` or `left != right`, evaluated after substitution */
  skipCondition?: string;
  stopOnFail?: boolean;
  schemaValidate?: boolean;
  assertions?: Assertion[];
}

export interface TestSequence {
  name: string;
  description?: string;
  steps: SequenceStep[];
  variables?: Record<string, string>;
  tags?: string[];
  metadata?: Record<string, string>;
  filePath?: string;
}

export interface StepResult {
  name: string;
  status: TestStatus;
  /** The substituted request actually sent */
  request?: ApiRequest;
  response?: ApiResponse;
  variables: Record<string, string>;
  durationMs: number;
  error?: string;
  validationError?: string;
  schema?: SchemaValidationResult;
  assertionResults?: AssertionResult[];
  conditionallySkipped: boolean;
  expectedStatus?: number;
  actualStatus?: number;
}

export interface SequenceResult {
  name: string;
  success: boolean;
  steps: StepResult[];
  durationMs: number;
  variables: Record<string, string>;
  startTime: Date;
  endTime: Date;
  error?: string;
}

export interface RunOptions {
  updateMode: UpdateMode;
  failOnMissing: boolean;
  ignoredHeaders: string[];
  timeoutMs: number;
  parallel: boolean;
  concurrency: number;
  stopOnFailure: boolean;
  filter: TestFilter;
  environment: Record<string, string>;
  snapshotDir: string;
  validateSchema: boolean;
  validation: ValidationOptions;
  enableAssertions: boolean;
  extractVariables: boolean;
  saveVariables: boolean;
  variablesPath?: string;
  failFast: boolean;
}

export interface TestSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  errors: number;
  durationMs: number;
  startTime: Date;
  endTime: Date;
  snapshotsTotal: number;
  snapshotsCreated: number;
  snapshotsUpdated: number;
  schemaValidated: number;
  schemaFailed: number;
  sequencesTotal: number;
  sequencesPassed: number;
  sequencesFailed: number;
}

export interface TestReport {
  name: string;
  summary: TestSummary;
  /**
   * In parallel mode the order of results is not guaranteed; sort by
   * `index` when order matters.
   */
  results: TestResult[];
  sequences: SequenceResult[];
  environment: Record<string, string>;
  createdAt: Date;
}
