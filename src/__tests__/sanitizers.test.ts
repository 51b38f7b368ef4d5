import assert from 'node:assert/strict';
import test from 'node:test';
import {
	sanitizeBoolean,
	sanitizeEnum,
	sanitizeInteger,
	sanitizeIntegerList,
	sanitizeNumber,
	sanitizeString,
	sanitizeStringList
} from '../config/sanitizers';

test('sanitizers: booleans accept flags written as text', () => {
	assert.equal(sanitizeBoolean(true, false), true);
	assert.equal(sanitizeBoolean(' Yes ', false), true);
	assert.equal(sanitizeBoolean('1', false), true);
	assert.equal(sanitizeBoolean('off', true), false);
	assert.equal(sanitizeBoolean('maybe', true), true);
	assert.equal(sanitizeBoolean(1, false), false);
});

test('sanitizers: numbers parse decimal and hex text and respect the minimum', () => {
	assert.equal(sanitizeNumber('2.5', 1, 0), 2.5);
	assert.equal(sanitizeNumber(-3, 1, 0), 0);
	assert.equal(sanitizeNumber('abc', 1, 0), 1);
	assert.equal(sanitizeNumber(Number.NaN, 7, 0), 7);
	assert.equal(sanitizeInteger('0x10', 0, 0), 16);
	assert.equal(sanitizeInteger(3.9, 0, 0), 3);
	assert.equal(sanitizeInteger('', 5, 0), 5);
});

test('sanitizers: enums and strings fall back when unmatched or blank', () => {
	assert.equal(sanitizeEnum(' loopback ', ['ble', 'loopback'], 'ble'), 'loopback');
	assert.equal(sanitizeEnum('usb', ['ble', 'loopback'], 'ble'), 'ble');
	assert.equal(sanitizeString('  ', 'fallback'), 'fallback');
	assert.equal(sanitizeString(' name ', 'fallback'), 'name');
	assert.equal(sanitizeString(42, 'fallback'), 'fallback');
});

test('sanitizers: lists accept arrays or comma-separated text', () => {
	assert.deepEqual(sanitizeStringList('baseline, pocket,,'), ['baseline', 'pocket']);
	assert.deepEqual(sanitizeStringList(['a', 3, ' b ']), ['a', 'b']);
	assert.deepEqual(sanitizeStringList(undefined), []);
	assert.deepEqual(sanitizeIntegerList('20, 60,x,120.7'), [20, 60, 120]);
	assert.deepEqual(sanitizeIntegerList([20, '0x3c', null]), [20, 60]);
});
