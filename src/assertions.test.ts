import { describe, it, expect } from 'vitest';
import { evaluateAssertion, evaluateAssertions, firstFailure } from './assertions';
import { AssertionEvaluationError } from './errors';
import { response } from './test-helpers';
import type { Assertion } from './types';

const res = response({
  statusCode: 200,
  body: Buffer.from(JSON.stringify({ user: { name: 'Alice', role: 'admin', age: 31, nickname: null } })),
  headers: { 'content-type': ['application/json; charset=utf-8'], 'x-rate-remaining': ['57'] },
  contentType: 'application/json; charset=utf-8',
});

const check = (assertion: Assertion) => evaluateAssertion(res, assertion);

describe('evaluateAssertion', () => {
  it('compares equality exactly unless told otherwise', () => {
    expect(check({ type: 'equals', source: 'body', path: 'user.name', value: 'Alice' }).passed).toBe(true);
    expect(check({ type: 'equals', source: 'body', path: 'user.name', value: 'alice' })).toEqual({
      type: 'equals',
      source: 'body',
      path: 'user.name',
      passed: false,
      actual: 'Alice',
      expected: 'alice',
      message: "Expected 'alice', got 'Alice'",
    });
    expect(check({ type: 'equals', source: 'body', path: 'user.name', value: 'alice', ignoreCase: true }).passed).toBe(true);
  });

  it('negates with not', () => {
    const result = check({ type: 'equals', source: 'status', value: '200', not: true });
    expect(result.passed).toBe(false);
    expect(result.message).toBe("Expected value to not equal '200'");
  });

  it('checks containment and patterns', () => {
    expect(check({ type: 'contains', source: 'contentType', value: 'json' }).passed).toBe(true);
    expect(check({ type: 'contains', source: 'contentType', value: 'xml' }).message).toBe(
      "Expected to contain 'xml', got 'application/json; charset=utf-8'"
    );
    expect(check({ type: 'matches', source: 'header', path: 'X-Rate-Remaining', value: '^\\d+$' }).passed).toBe(true);
  });

  it('checks presence, treating an unresolvable path as absent', () => {
    expect(check({ type: 'exists', source: 'body', path: 'user.role' }).passed).toBe(true);
    expect(check({ type: 'exists', source: 'body', path: 'user.email' })).toMatchObject({
      passed: false,
      message: 'Expected value to exist',
    });
    expect(check({ type: 'notExists', source: 'body', path: 'user.email' }).passed).toBe(true);
    expect(check({ type: 'notExists', source: 'header', path: 'etag' }).passed).toBe(true);
    expect(check({ type: 'notExists', source: 'body', path: 'user.role' }).message).toBe(
      "Expected value to not exist, got 'admin'"
    );
  });

  it('checks membership', () => {
    expect(check({ type: 'in', source: 'body', path: 'user.role', values: ['admin', 'owner'] }).passed).toBe(true);
    expect(check({ type: 'in', source: 'body', path: 'user.role', values: ['guest', 'member'] }).message).toBe(
      "Expected value to be one of [guest, member], got 'admin'"
    );
  });

  it('compares numbers', () => {
    expect(check({ type: 'lt', source: 'body', path: 'user.age', value: '40' }).passed).toBe(true);
    expect(check({ type: 'greaterThan', source: 'status', value: '299' }).message).toBe(
      'Expected value to be greater than 299, got 200'
    );
    expect(check({ type: 'gt', source: 'header', path: 'x-rate-remaining', value: '10' }).passed).toBe(true);
  });

  it('checks null', () => {
    expect(check({ type: 'null', source: 'body', path: 'user.nickname' }).passed).toBe(true);
    expect(check({ type: 'null', source: 'body', path: 'user.missing' }).passed).toBe(true);
    expect(check({ type: 'null', source: 'body', path: 'user.name' }).message).toBe("Expected null, got 'Alice'");
  });

  it('fails a comparison whose value cannot be read', () => {
    expect(check({ type: 'equals', source: 'body', path: 'user.email', value: 'x' })).toMatchObject({
      passed: false,
      message: 'Error extracting value: property not found: email',
    });
  });

  it('throws when the evaluator cannot run', () => {
    expect(() => check({ type: 'matches', source: 'status', value: '(' })).toThrow(AssertionEvaluationError);
    expect(() => check({ type: 'lt', source: 'body', path: 'user.name', value: '3' })).toThrow(
      'Actual value is not a number: "Alice"'
    );
    expect(() => check({ type: 'gt', source: 'status', value: 'many' })).toThrow(AssertionEvaluationError);
  });
});

describe('evaluateAssertions', () => {
  it('evaluates in order and finds the first failure', () => {
    const results = evaluateAssertions(res, [
      { type: 'equals', source: 'status', value: '200' },
      { type: 'equals', source: 'body', path: 'user.role', value: 'guest' },
      { type: 'exists', source: 'body', path: 'nope' },
    ]);
    expect(results.map((r) => r.passed)).toEqual([true, false, false]);
    expect(firstFailure(results)?.message).toBe("Expected 'guest', got 'admin'");
  });
});
