import test from 'node:test';
import assert from 'node:assert/strict';

import { SchemaValidator, isRecord } from '../src/schema_validator';

const validator = new SchemaValidator();
validator.registerSchema('thresholds', {
    type: 'object',
    additionalProperties: false,
    properties: {
        warning_threshold: { type: 'number' },
        auto_interrupt: { type: 'boolean' },
        limits: { type: 'object', properties: { timeout: { type: 'number' } } },
    },
});

test('accepts a conforming value', () => {
    const result = validator.validate({ warning_threshold: 5, auto_interrupt: true, limits: { timeout: 10, note: 'x' } }, 'thresholds');
    assert.deepEqual(result, { valid: true, errors: [] });
});

test('reports every violation with its path', () => {
    const result = validator.validate({
        warning_threshold: Infinity,
        auto_interrupt: 'yes',
        limits: { timeout: '10' },
        extra: true,
    }, 'thresholds');
    assert.equal(result.valid, false);
    assert.deepEqual(result.errors, [
        { path: '.warning_threshold', message: 'Value must be finite' },
        { path: '.auto_interrupt', message: 'Expected type boolean, got string' },
        { path: '.limits.timeout', message: 'Expected type number, got string' },
        { path: '.extra', message: 'Unknown field' },
    ]);
});

test('reports a root type mismatch', () => {
    assert.deepEqual(validator.validate([], 'thresholds').errors, [
        { path: '', message: 'Expected type object, got array' },
    ]);
    assert.deepEqual(validator.validate(null, 'thresholds').errors, [
        { path: '', message: 'Expected type object, got null' },
    ]);
});

test('unknown schema id is invalid', () => {
    assert.deepEqual(validator.validate({}, 'missing'), {
        valid: false,
        errors: [{ path: '', message: 'Schema not found: missing' }],
    });
});

test('isRecord distinguishes plain objects', () => {
    assert.equal(isRecord({}), true);
    assert.equal(isRecord([]), false);
    assert.equal(isRecord(null), false);
    assert.equal(isRecord('x'), false);
});
