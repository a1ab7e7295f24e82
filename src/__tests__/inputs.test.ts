import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ArgumentError } from '../lib/errors.js';
import {
  JoinTimeoutSchema,
  LogLevelSchema,
  MaxAllowedSchema,
  parseArgument,
} from '../schemas/inputs.js';

describe('MaxAllowedSchema', () => {
  it('accepts positive, zero and negative integers', () => {
    assert.equal(parseArgument(MaxAllowedSchema, 4, 'maxAllowed'), 4);
    assert.equal(parseArgument(MaxAllowedSchema, 0, 'maxAllowed'), 0);
    assert.equal(parseArgument(MaxAllowedSchema, -1, 'maxAllowed'), -1);
  });

  it('rejects fractions, NaN and non-numbers', () => {
    for (const value of [1.5, Number.NaN, '3', undefined]) {
      assert.throws(
        () => parseArgument(MaxAllowedSchema, value, 'maxAllowed'),
        (err: unknown) =>
          err instanceof ArgumentError &&
          err.paramName === 'maxAllowed' &&
          err.message.startsWith('Invalid "maxAllowed": '),
        String(value)
      );
    }
  });
});

describe('JoinTimeoutSchema', () => {
  it('accepts undefined and integers', () => {
    assert.equal(parseArgument(JoinTimeoutSchema, undefined, 'timeoutMs'), undefined);
    assert.equal(parseArgument(JoinTimeoutSchema, 250, 'timeoutMs'), 250);
    assert.equal(parseArgument(JoinTimeoutSchema, -1, 'timeoutMs'), -1);
  });

  it('rejects non-integers', () => {
    assert.throws(
      () => parseArgument(JoinTimeoutSchema, 0.5, 'timeoutMs'),
      ArgumentError
    );
  });
});

describe('LogLevelSchema', () => {
  it('accepts known levels only', () => {
    assert.ok(LogLevelSchema.safeParse('debug').success);
    assert.ok(LogLevelSchema.safeParse('error').success);
    assert.equal(LogLevelSchema.safeParse('verbose').success, false);
  });
});
