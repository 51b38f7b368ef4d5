import assert from 'node:assert/strict';
import test from 'node:test';
import { ConnectionManager } from '../client/connectionManager';
import { ConnectOptions } from '../client/connectionTypes';
import { ConnectionExhaustedError, TrialAbortedError } from '../errors/labErrors';
import type { BleLink, PhyMode } from '../transport/bleLink';
import { createCapturingLogger, flushMicrotasks, VirtualClock } from './testHelpers';

interface LinkScript {
	connect?: 'ok' | 'fail' | 'hang';
	mtu?: boolean;
	phyFailures?: number;
}

interface FakeLink extends BleLink {
	disconnects: number;
	phyRequests: PhyMode[];
}

function makeLink(target: string, script: LinkScript): FakeLink {
	let connected = false;
	let phyFailures = script.phyFailures ?? 0;
	const link: FakeLink = {
		target,
		disconnects: 0,
		phyRequests: [],
		connect: (options) => {
			if (script.connect === 'fail') {
				return Promise.reject(new Error('boom'));
			}
			if (script.connect === 'hang') {
				return new Promise<void>((_resolve, reject) => {
					options.signal?.addEventListener('abort', () => reject(new Error('cancelled')), { once: true });
				});
			}
			connected = true;
			return Promise.resolve();
		},
		disconnect: async () => {
			link.disconnects += 1;
			connected = false;
		},
		isConnected: () => connected,
		write: async () => undefined,
		subscribe: async () => undefined,
		unsubscribe: async () => undefined,
		onDisconnect: () => () => undefined,
		requestPhy: async (phy) => {
			link.phyRequests.push(phy);
			if (phyFailures > 0) {
				phyFailures -= 1;
				throw new Error('not supported');
			}
		},
		...(script.mtu === false ? {} : { requestMtu: async (mtu: number) => Math.min(mtu, 185) })
	};
	return link;
}

function createManager(scripts: LinkScript[]) {
	const clock = new VirtualClock();
	const links: FakeLink[] = [];
	const { logger, lines } = createCapturingLogger();
	const manager = new ConnectionManager({
		factory: (target) => {
			const link = makeLink(target, scripts[links.length] ?? { connect: 'ok' });
			links.push(link);
			return link;
		},
		clock,
		logger
	});
	return { clock, links, lines, manager };
}

const OPTIONS: ConnectOptions = { timeoutS: 20, maxAttempts: 3, retryDelayS: 2 };

test('connectionManager: fail, fail, succeed uses all three attempts', async () => {
	const { clock, links, manager } = createManager([{ connect: 'fail' }, { connect: 'fail' }, { connect: 'ok' }]);

	const result = await clock.run(manager.connect('dev-1', OPTIONS));
	assert.equal(result.attemptsUsed, 3);
	assert.deepEqual(
		result.attempts.map((attempt) => attempt.outcome),
		['error', 'error', 'success']
	);
	assert.equal(result.attempts[0].error, 'boom');
	assert.equal(clock.now(), 4000);
	assert.equal(manager.getLink(), links[2]);
	assert.deepEqual(
		links.map((link) => link.disconnects),
		[1, 1, 0]
	);
});

test('connectionManager: exhausting every attempt raises with the attempt history', async () => {
	const { clock, links, lines, manager } = createManager([{ connect: 'fail' }, { connect: 'fail' }, { connect: 'fail' }]);

	await assert.rejects(clock.run(manager.connect('dev-1', OPTIONS)), (error: unknown) => {
		assert.ok(error instanceof ConnectionExhaustedError);
		assert.equal(error.message, 'Failed to connect to dev-1 after 3 attempt(s) (boom).');
		assert.equal(error.attempts.length, 3);
		return true;
	});
	assert.equal(manager.getLink(), undefined);
	assert.ok(links.every((link) => link.disconnects === 1));
	assert.equal(lines.filter((line) => line.includes('Connection attempt failed')).length, 3);
});

test('connectionManager: a connect that outlives its timeout counts as a timed-out attempt', async () => {
	const { clock, manager } = createManager([{ connect: 'hang' }, { connect: 'ok' }]);

	const result = await clock.run(manager.connect('dev-1', { ...OPTIONS, timeoutS: 1 }));
	assert.deepEqual(result.attempts[0], {
		attemptIndex: 1,
		timeoutS: 1,
		outcome: 'timeout',
		elapsedS: 1,
		error: 'Connect timed out after 1s.'
	});
	assert.equal(result.attemptsUsed, 2);
	assert.equal(clock.now(), 3000);
});

test('connectionManager: aborting during the retry delay stops the loop', async () => {
	const { clock, links, manager } = createManager([{ connect: 'fail' }, { connect: 'ok' }]);
	const controller = new AbortController();

	const pending = manager.connect('dev-1', { ...OPTIONS, signal: controller.signal });
	await flushMicrotasks();
	assert.equal(clock.pendingTimers, 1);

	controller.abort();
	await assert.rejects(pending, TrialAbortedError);
	assert.equal(links.length, 1);
});

test('connectionManager: aborting during a connect attempt closes the link', async () => {
	const { clock, links, manager } = createManager([{ connect: 'hang' }]);
	const controller = new AbortController();

	const pending = manager.connect('dev-1', { ...OPTIONS, signal: controller.signal });
	await flushMicrotasks();
	controller.abort();
	await assert.rejects(pending, TrialAbortedError);
	assert.equal(links[0].disconnects, 1);
	assert.equal(clock.pendingTimers, 0);
});

test('connectionManager: PHY requests retry, then fall back to auto with a warning', async () => {
	const { clock, links, manager } = createManager([{ connect: 'ok', phyFailures: 5 }]);

	const result = await clock.run(manager.connect('dev-1', { ...OPTIONS, phy: 'coded' }));
	assert.deepEqual(result.phy, {
		requested: 'coded',
		applied: 'auto',
		status: 'failed',
		requestsMade: 3,
		error: 'not supported'
	});
	assert.deepEqual(result.warnings, ['PHY request (coded) failed 3 times (not supported); falling back to auto.']);
	assert.deepEqual(links[0].phyRequests, ['coded', 'coded', 'coded']);
});

test('connectionManager: a PHY request that succeeds on retry reports the requests made', async () => {
	const { clock, manager } = createManager([{ connect: 'ok', phyFailures: 1 }]);
	const result = await clock.run(manager.connect('dev-1', { ...OPTIONS, phy: '2m' }));
	assert.equal(result.phy.status, 'success');
	assert.equal(result.phy.applied, '2m');
	assert.equal(result.phy.requestsMade, 2);
	assert.deepEqual(result.warnings, []);
});

test('connectionManager: auto PHY is not requested', async () => {
	const { clock, links, manager } = createManager([{ connect: 'ok' }]);
	const result = await clock.run(manager.connect('dev-1', OPTIONS));
	assert.deepEqual(result.phy, { requested: 'auto', applied: 'auto', status: 'skipped', requestsMade: 0 });
	assert.deepEqual(links[0].phyRequests, []);
	assert.equal(result.mtu, undefined);
});

test('connectionManager: MTU negotiation reports the value in effect or a warning', async () => {
	const supported = createManager([{ connect: 'ok' }]);
	const negotiated = await supported.clock.run(supported.manager.connect('dev-1', { ...OPTIONS, mtu: 247 }));
	assert.deepEqual(negotiated.mtu, { requested: 247, status: 'success', negotiated: 185 });

	const unsupported = createManager([{ connect: 'ok', mtu: false }]);
	const result = await unsupported.clock.run(unsupported.manager.connect('dev-1', { ...OPTIONS, mtu: 247 }));
	assert.deepEqual(result.mtu, { requested: 247, status: 'unsupported' });
	assert.deepEqual(result.warnings, ['MTU request (247) unsupported by this link.']);
});

test('connectionManager: withConnection disconnects when the work throws', async () => {
	const { clock, links, manager } = createManager([{ connect: 'ok' }]);
	await assert.rejects(
		clock.run(
			manager.withConnection('dev-1', OPTIONS, async () => {
				throw new Error('trial failed');
			})
		),
		/trial failed/
	);
	assert.equal(links[0].disconnects, 1);
	assert.equal(manager.getLink(), undefined);
});
