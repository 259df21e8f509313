import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import { SchemaValidationError, errorMessage } from './errors';
import type {
  ApiResponse,
  JsonSchema,
  OperationDescriptor,
  SchemaValidationIssue,
  SchemaValidationResult,
  SchemaValidator,
  ValidationOptions,
} from './types';

function pathSegments(instancePath: string): string[] {
  return instancePath.split('/').filter(Boolean);
}

function toIssuePath(instancePath: string): string {
  return pathSegments(instancePath).join('.');
}

function mentionsIgnored(error: ErrorObject, ignored: Set<string>): boolean {
  if (pathSegments(error.instancePath).some((s) => ignored.has(s))) return true;
  const { params } = error;
  for (const key of ['missingProperty', 'additionalProperty']) {
    const value: unknown = params[key];
    if (typeof value === 'string' && ignored.has(value)) return true;
  }
  return false;
}

/** Drop the Ajv errors the validation options tell us to overlook. */
export function filterErrors(errors: readonly ErrorObject[], options: ValidationOptions): ErrorObject[] {
  const ignored = new Set(options.ignoredProperties ?? []);
  return errors.filter((error) => {
    if (options.requiredPropertiesOnly && error.keyword !== 'required') return false;
    if (options.ignoreAdditionalProperties && error.keyword === 'additionalProperties') return false;
    if (options.ignoreFormats && error.keyword === 'format') return false;
    if (options.ignorePatterns && error.keyword === 'pattern') return false;
    if (options.ignoreNullable && error.keyword === 'type' && error.data === null) return false;
    if (ignored.size && mentionsIgnored(error, ignored)) return false;
    return true;
  });
}

function toIssue(error: ErrorObject): SchemaValidationIssue {
  let path = toIssuePath(error.instancePath);
  const missing: unknown = error.params.missingProperty;
  if (error.keyword === 'required' && typeof missing === 'string') {
    path = path ? `${path}.${missing}` : missing;
  }
  return { path, message: error.message ?? 'is invalid', keyword: error.keyword };
}

/** Response schema for a status code, falling back to "default". */
export function schemaForStatus(operation: OperationDescriptor, status: number): JsonSchema | undefined {
  const responses = operation.responses ?? {};
  return (responses[String(status)] ?? responses.default)?.schema;
}

/**
 * JSON Schema validation of response bodies against the operation's
 * response schemas. Compiled validators are cached per schema.
 */
export class JsonSchemaValidator implements SchemaValidator {
  private ajv = new Ajv({ allErrors: true, strict: false, verbose: true, logger: false });
  private cache = new Map<string, ValidateFunction>();

  private compile(schema: JsonSchema): ValidateFunction {
    const key = JSON.stringify(schema);
    let validate = this.cache.get(key);
    if (!validate) {
      try {
        validate = this.ajv.compile(schema);
      } catch (error) {
        throw new SchemaValidationError(`Invalid response schema: ${errorMessage(error)}`, { cause: error });
      }
      this.cache.set(key, validate);
    }
    return validate;
  }

  validate(response: ApiResponse, operation: OperationDescriptor, options: ValidationOptions = {}): SchemaValidationResult {
    const schemaPath = `${operation.method.toUpperCase()} ${operation.path} - ${response.statusCode}`;
    const schema = schemaForStatus(operation, response.statusCode);
    if (!schema) {
      throw new SchemaValidationError(`No response schema for ${schemaPath}`);
    }
    const validate = this.compile(schema);

    const base = { schemaPath, responseStatus: response.statusCode, contentType: response.contentType };
    let body: unknown;
    try {
      body = JSON.parse(response.body.toString('utf8'));
    } catch (error) {
      return {
        ...base,
        valid: false,
        errors: [{ path: '', message: `invalid JSON response: ${errorMessage(error)}` }],
      };
    }

    validate(body);
    const errors = filterErrors(validate.errors ?? [], options).map(toIssue);
    return { ...base, valid: errors.length === 0, errors };
  }
}
