import type { BleLink, PhyMode } from '../transport/bleLink';

export type AttemptOutcome = 'success' | 'timeout' | 'error';

export interface ConnectionAttempt {
	/** 1-based. */
	attemptIndex: number;
	timeoutS: number;
	outcome: AttemptOutcome;
	elapsedS: number;
	error?: string;
}

export type CapabilityStatus = 'success' | 'failed' | 'skipped' | 'unsupported';

export interface MtuResult {
	requested: number;
	status: CapabilityStatus;
	negotiated?: number;
	error?: string;
}

export interface PhyResult {
	requested: PhyMode;
	/** What the link runs with after fallbacks. */
	applied: PhyMode;
	status: CapabilityStatus;
	requestsMade: number;
	error?: string;
}

export interface ConnectOptions {
	timeoutS: number;
	maxAttempts: number;
	retryDelayS: number;
	mtu?: number;
	phy?: PhyMode;
	signal?: AbortSignal;
}

export interface ConnectionResult {
	link: BleLink;
	attemptsUsed: number;
	attempts: readonly ConnectionAttempt[];
	mtu?: MtuResult;
	phy: PhyResult;
	warnings: readonly string[];
}
