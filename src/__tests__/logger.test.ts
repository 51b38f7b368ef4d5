import assert from 'node:assert/strict';
import test from 'node:test';
import { LineLogger, NoopLogger } from '../diagnostics/logger';

const FIXED_NOW = () => new Date('2026-03-04T05:06:07.000Z');

test('logger: lines below the configured level are dropped', () => {
	const lines: string[] = [];
	const logger = new LineLogger((line) => lines.push(line), { level: 'warn' });
	logger.error('one');
	logger.warn('two');
	logger.info('three');
	logger.debug('four');
	assert.equal(lines.length, 2);
	assert.match(lines[0] ?? '', /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[error\] one$/);
	assert.match(lines[1] ?? '', /\] \[warn\] two$/);
	assert.equal(logger.isEnabled('warn'), true);
	assert.equal(logger.isEnabled('info'), false);
});

test('logger: metadata is appended as JSON', () => {
	const lines: string[] = [];
	const logger = new LineLogger((line) => lines.push(line), { level: 'trace', now: FIXED_NOW });
	logger.trace('Stream started', { payloadBytes: 20, packetCount: 0 });
	logger.info('empty meta', {});
	assert.deepEqual(lines, [
		'[2026-03-04T05:06:07.000Z] [trace] Stream started {"payloadBytes":20,"packetCount":0}',
		'[2026-03-04T05:06:07.000Z] [info] empty meta'
	]);
});

test('logger: errors and bigints in metadata are readable', () => {
	const lines: string[] = [];
	const logger = new LineLogger((line) => lines.push(line), { now: FIXED_NOW });
	logger.warn('Trial failed', { error: new RangeError('bad payload'), seq: 5n });
	assert.deepEqual(lines, ['[2026-03-04T05:06:07.000Z] [warn] Trial failed {"error":"RangeError: bad payload","seq":"5"}']);
});

test('logger: unserializable metadata does not break logging', () => {
	const lines: string[] = [];
	const logger = new LineLogger((line) => lines.push(line));
	const meta: Record<string, unknown> = {};
	meta.self = meta;
	logger.info('cycle', meta);
	assert.match(lines[0] ?? '', /\] \[info\] cycle \{"meta":"unserializable"\}$/);
});

test('logger: child loggers nest their scope and share the sink', () => {
	const lines: string[] = [];
	const root = new LineLogger((line) => lines.push(line), { level: 'debug', scope: 'sweep', now: FIXED_NOW });
	root.child('lock').debug('acquired');
	root.info('done');
	assert.deepEqual(lines, [
		'[2026-03-04T05:06:07.000Z] [debug] [sweep/lock] acquired',
		'[2026-03-04T05:06:07.000Z] [info] [sweep] done'
	]);
});

test('logger: the no-op logger accepts every level', () => {
	const logger = new NoopLogger();
	assert.doesNotThrow(() => {
		logger.error('e');
		logger.warn('w');
		logger.info('i');
		logger.debug('d');
		logger.trace('t');
	});
});
