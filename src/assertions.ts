import { AssertionEvaluationError, errorMessage } from './errors';
import { headerValue, resolveJsonPath, stringifyJsonValue } from './extractor';
import type { ApiResponse, Assertion, AssertionResult } from './types';

/** Kinds that ask whether a value is there at all; an unresolvable path counts as absent. */
const PRESENCE_KINDS = new Set(['exists', 'notExists', 'null']);

function readActual(response: ApiResponse, assertion: Assertion): string | undefined {
  switch (assertion.source) {
    case 'body': {
      const body = response.body.toString('utf8');
      if (!assertion.path) return body;
      return stringifyJsonValue(resolveJsonPath(JSON.parse(body), assertion.path));
    }
    case 'header':
      if (!assertion.path) throw new Error('header name (path) is required for header assertions');
      return headerValue(response, assertion.path);
    case 'status':
      return String(response.statusCode);
    case 'contentType':
      return response.contentType;
    default:
      throw new AssertionEvaluationError(`Unsupported assertion source: ${String(assertion.source)}`);
  }
}

function parseNumber(value: string, what: string): number {
  const n = Number(value.trim());
  if (value.trim() === '' || Number.isNaN(n)) {
    throw new AssertionEvaluationError(`${what} is not a number: "${value}"`);
  }
  return n;
}

function same(a: string, b: string, ignoreCase?: boolean): boolean {
  return ignoreCase ? a.toLowerCase() === b.toLowerCase() : a === b;
}

/**
 * Evaluate one assertion. A failing check is a result with `passed: false`;
 * an evaluator that cannot run (bad pattern, non-numeric operand, unknown
 * kind) throws AssertionEvaluationError.
 */
export function evaluateAssertion(response: ApiResponse, assertion: Assertion): AssertionResult {
  const result: AssertionResult = {
    type: assertion.type,
    source: assertion.source,
    path: assertion.path,
    passed: false,
  };

  let actual: string | undefined;
  try {
    actual = readActual(response, assertion);
  } catch (error) {
    if (error instanceof AssertionEvaluationError) throw error;
    if (!PRESENCE_KINDS.has(assertion.type)) {
      result.message = `Error extracting value: ${errorMessage(error)}`;
      return result;
    }
    actual = undefined;
  }

  const value = actual ?? '';
  const negate = !!assertion.not;
  result.actual = value;

  let holds: boolean;
  switch (assertion.type) {
    case 'equals': {
      const expected = assertion.value ?? '';
      result.expected = expected;
      holds = same(value, expected, assertion.ignoreCase);
      result.message = negate ? `Expected value to not equal '${expected}'` : `Expected '${expected}', got '${value}'`;
      break;
    }
    case 'contains': {
      const expected = assertion.value ?? '';
      result.expected = expected;
      holds = assertion.ignoreCase ? value.toLowerCase().includes(expected.toLowerCase()) : value.includes(expected);
      result.message = negate
        ? `Expected value to not contain '${expected}'`
        : `Expected to contain '${expected}', got '${value}'`;
      break;
    }
    case 'matches': {
      const pattern = assertion.value ?? '';
      result.expected = pattern;
      let re: RegExp;
      try {
        re = new RegExp(pattern);
      } catch (error) {
        throw new AssertionEvaluationError(`Invalid regex pattern: ${errorMessage(error)}`, { cause: error });
      }
      holds = re.test(value);
      result.message = negate
        ? `Expected value to not match pattern '${pattern}'`
        : `Expected to match pattern '${pattern}', got '${value}'`;
      break;
    }
    case 'exists':
      holds = actual !== undefined && actual !== '';
      result.message = negate ? 'Expected value to not exist' : 'Expected value to exist';
      break;
    case 'notExists':
      holds = actual === undefined || actual === '';
      result.message = negate ? 'Expected value to exist' : `Expected value to not exist, got '${value}'`;
      break;
    case 'in': {
      const values = assertion.values ?? [];
      result.expected = values.join(', ');
      holds = values.some((v) => same(value, v, assertion.ignoreCase));
      result.message = negate
        ? `Expected value to not be one of [${result.expected}]`
        : `Expected value to be one of [${result.expected}], got '${value}'`;
      break;
    }
    case 'lessThan':
    case 'lt':
    case 'greaterThan':
    case 'gt': {
      const limit = parseNumber(assertion.value ?? '', 'Comparison value');
      const n = parseNumber(value, 'Actual value');
      const less = assertion.type === 'lessThan' || assertion.type === 'lt';
      result.expected = assertion.value;
      holds = less ? n < limit : n > limit;
      const relation = less ? 'less than' : 'greater than';
      result.message = negate
        ? `Expected value to not be ${relation} ${limit}`
        : `Expected value to be ${relation} ${limit}, got ${n}`;
      break;
    }
    case 'null':
      holds = actual === undefined || value === 'null' || value === '';
      result.message = negate ? 'Expected value to not be null' : `Expected null, got '${value}'`;
      break;
    default:
      throw new AssertionEvaluationError(`Unsupported assertion type: ${String(assertion.type)}`);
  }

  result.passed = holds !== negate;
  if (result.passed) result.message = undefined;
  return result;
}

export function evaluateAssertions(response: ApiResponse, assertions: readonly Assertion[]): AssertionResult[] {
  return assertions.map((a) => evaluateAssertion(response, a));
}

export function firstFailure(results: readonly AssertionResult[]): AssertionResult | undefined {
  return results.find((r) => !r.passed);
}
