import assert from 'node:assert/strict';
import test from 'node:test';
import { ConfigError } from '../errors/labErrors';
import { FAULT_PRESETS, resolveFaultProfile } from '../mock/faultProfile';

test('resolveFaultProfile defaults to the typical preset', () => {
	const profile = resolveFaultProfile();
	assert.equal(profile.dropPercent, FAULT_PRESETS.typical.dropPercent);
	assert.equal(profile.intervalJitterMs, 3);
	assert.equal(profile.rssiBaseDbm, -55);
});

test('resolveFaultProfile applies overrides field by field', () => {
	const profile = resolveFaultProfile('worst', { dropPercent: 12, intervalJitterMs: undefined });
	assert.equal(profile.dropPercent, 12);
	assert.equal(profile.intervalJitterMs, FAULT_PRESETS.worst.intervalJitterMs);
	assert.equal(profile.disconnectChance, 0.5);
});

test('resolveFaultProfile accepts preset names case-insensitively', () => {
	assert.equal(resolveFaultProfile(' Body_Block ').rssiBaseDbm, -68);
});

test('resolveFaultProfile result is frozen', () => {
	const profile = resolveFaultProfile('best', { dropProfile: [0.1, 0.2] });
	assert.ok(Object.isFrozen(profile));
	assert.ok(Object.isFrozen(profile.dropProfile));
	assert.throws(() => {
		Object.assign(profile, { dropPercent: 99 });
	}, TypeError);
});

test('resolveFaultProfile rejects an unknown preset', () => {
	assert.throws(() => resolveFaultProfile('lunar'), (error: unknown) => {
		assert.ok(error instanceof ConfigError);
		assert.equal(error.field, 'preset');
		assert.match(error.message, /Unknown fault preset "lunar"/);
		return true;
	});
});

test('resolveFaultProfile rejects percentages outside 0-100', () => {
	assert.throws(() => resolveFaultProfile('best', { dropPercent: 101 }), ConfigError);
	assert.throws(() => resolveFaultProfile('best', { commandIgnoreChance: -1 }), ConfigError);
});

test('resolveFaultProfile rejects negative durations and non-finite values', () => {
	assert.throws(() => resolveFaultProfile('best', { latencySpikeMs: -5 }), /must not be negative/);
	assert.throws(() => resolveFaultProfile('best', { rssiDriftDbm: Number.NaN }), /finite number/);
});

test('resolveFaultProfile validates curves and RSSI base', () => {
	assert.throws(() => resolveFaultProfile('best', { dropProfile: [0.5, 1.5] }), /0.0–1.0/);
	assert.throws(() => resolveFaultProfile('best', { intervalProfileMs: [25, 0] }), /at least 1 ms/);
	assert.throws(() => resolveFaultProfile('best', { rssiBaseDbm: 3 }), /-127..-1/);
});
