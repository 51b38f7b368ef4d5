import { decodeNotification, NOTIFICATION_HEADER_BYTES } from '../protocol/throughputPacket';
import { sequenceDistance } from '../protocol/sequence';

const HALF_SEQUENCE_SPACE = 0x8000;

export interface NotificationRecord {
	/** -1 when the value was too short to carry one. */
	seq: number;
	dutTs: number;
	arrivalMs: number;
	payloadLen: number;
	rawLen: number;
	malformed: boolean;
}

export interface JitterSummary {
	samples: number;
	meanMs: number;
	p95Ms: number;
	maxMs: number;
}

export interface MetricsSummary {
	packets: number;
	estimatedLostPackets: number;
	durationS: number;
	throughputKbps: number;
	notificationRatePerS: number;
	bytesRecorded: number;
	reorderedPackets: number;
	duplicatePackets: number;
	malformedPackets: number;
	jitter: JitterSummary | null;
}

export interface MetricsEngineOptions {
	/** DATA bytes each packet should carry; shorter packets count as malformed. */
	expectedPayloadBytes?: number;
	/** Sequence the stream should start at (0 after Reset); a missing head then counts as loss. */
	expectedFirstSequence?: number;
	/** Keep per-packet records for the raw logs. */
	keepRecords?: boolean;
}

function percentile(sorted: readonly number[], fraction: number): number {
	if (sorted.length === 0) {
		return 0;
	}
	const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(fraction * sorted.length) - 1));
	return sorted[index];
}

/**
 * Sequence-based loss, jitter and throughput over one notification stream, fed in
 * arrival order.
 *
 * Loss is estimated from forward gaps on the 16-bit sequence ring. A sequence that is
 * not ahead of the highest one seen is a late or repeated packet; it is counted as such
 * and never reduces the loss estimate.
 */
export class MetricsEngine {
	private readonly expectedPayloadBytes?: number;
	private readonly expectedFirstSequence?: number;
	private readonly keepRecords: boolean;
	private readonly records: NotificationRecord[] = [];
	private readonly jitterSamples: number[] = [];

	private packets = 0;
	private bytes = 0;
	private lost = 0;
	private reordered = 0;
	private duplicates = 0;
	private malformed = 0;
	private highest?: number;
	private lastForward?: { arrivalMs: number; dutTs: number };
	private firstArrivalMs?: number;
	private lastArrivalMs?: number;
	private windowStartMs?: number;
	private windowEndMs?: number;

	public constructor(options: MetricsEngineOptions = {}) {
		this.expectedPayloadBytes = options.expectedPayloadBytes;
		this.expectedFirstSequence = options.expectedFirstSequence;
		this.keepRecords = options.keepRecords ?? true;
	}

	public get packetCount(): number {
		return this.packets;
	}

	public getRecords(): readonly NotificationRecord[] {
		return this.records;
	}

	public markStart(atMs: number): void {
		this.windowStartMs = atMs;
	}

	public markEnd(atMs: number): void {
		this.windowEndMs = atMs;
	}

	public record(value: Uint8Array, arrivalMs: number): NotificationRecord {
		this.packets += 1;
		this.bytes += value.length;
		this.firstArrivalMs ??= arrivalMs;
		this.lastArrivalMs = arrivalMs;

		const minimumLength = NOTIFICATION_HEADER_BYTES + (this.expectedPayloadBytes ?? 0);
		const decoded = decodeNotification(value);
		const malformed = value.length < minimumLength;
		if (malformed) {
			this.malformed += 1;
		}

		const record: NotificationRecord = {
			seq: decoded?.sequence ?? -1,
			dutTs: decoded?.timestamp ?? -1,
			arrivalMs,
			payloadLen: Math.max(0, value.length - NOTIFICATION_HEADER_BYTES),
			rawLen: value.length,
			malformed
		};
		if (this.keepRecords) {
			this.records.push(record);
		}

		if (decoded) {
			this.trackSequence(decoded.sequence, decoded.timestamp, arrivalMs);
		}
		return record;
	}

	public summary(): MetricsSummary {
		const durationS = this.windowDurationS();
		const sortedJitter = [...this.jitterSamples].sort((a, b) => a - b);
		const jitter: JitterSummary | null =
			sortedJitter.length === 0
				? null
				: {
						samples: sortedJitter.length,
						meanMs: sortedJitter.reduce((sum, value) => sum + value, 0) / sortedJitter.length,
						p95Ms: percentile(sortedJitter, 0.95),
						maxMs: sortedJitter[sortedJitter.length - 1]
					};

		return {
			packets: this.packets,
			estimatedLostPackets: this.lost,
			durationS,
			throughputKbps: durationS > 0 ? (this.bytes * 8) / 1000 / durationS : 0,
			notificationRatePerS: durationS > 0 ? this.packets / durationS : 0,
			bytesRecorded: this.bytes,
			reorderedPackets: this.reordered,
			duplicatePackets: this.duplicates,
			malformedPackets: this.malformed,
			jitter
		};
	}

	private trackSequence(sequence: number, dutTs: number | undefined, arrivalMs: number): void {
		const highest = this.highest;
		if (highest === undefined) {
			if (this.expectedFirstSequence !== undefined) {
				const head = sequenceDistance(this.expectedFirstSequence, sequence);
				if (head < HALF_SEQUENCE_SPACE) {
					this.lost += head;
				}
			}
			this.advance(sequence, dutTs, arrivalMs);
			return;
		}

		const distance = sequenceDistance(highest, sequence);
		if (distance === 0) {
			this.duplicates += 1;
			return;
		}
		if (distance >= HALF_SEQUENCE_SPACE) {
			this.reordered += 1;
			return;
		}

		this.lost += distance - 1;
		this.advance(sequence, dutTs, arrivalMs);
	}

	private advance(sequence: number, dutTs: number | undefined, arrivalMs: number): void {
		this.highest = sequence;
		if (dutTs === undefined) {
			this.lastForward = undefined;
			return;
		}
		const previous = this.lastForward;
		if (previous) {
			const arrivalDelta = arrivalMs - previous.arrivalMs;
			const deviceDelta = (dutTs - previous.dutTs) & 0xffff;
			this.jitterSamples.push(Math.abs(arrivalDelta - deviceDelta));
		}
		this.lastForward = { arrivalMs, dutTs };
	}

	private windowDurationS(): number {
		if (this.windowStartMs !== undefined && this.windowEndMs !== undefined && this.windowEndMs > this.windowStartMs) {
			return (this.windowEndMs - this.windowStartMs) / 1000;
		}
		if (
			this.firstArrivalMs !== undefined &&
			this.lastArrivalMs !== undefined &&
			this.lastArrivalMs > this.firstArrivalMs
		) {
			return (this.lastArrivalMs - this.firstArrivalMs) / 1000;
		}
		return 0;
	}
}

export interface LatencySummary {
	avgLatencyS: number | null;
	minLatencyS: number | null;
	maxLatencyS: number | null;
	samples: number;
	timeouts: number;
}

/**
 * Start-to-first-notification latencies for latency trials. A timed-out iteration is
 * counted and produces no sample.
 */
export class LatencyAccumulator {
	private readonly samples: number[] = [];
	private timeouts = 0;

	public addSample(latencyS: number): void {
		this.samples.push(latencyS);
	}

	public addTimeout(): void {
		this.timeouts += 1;
	}

	public getSamples(): readonly number[] {
		return this.samples;
	}

	public summary(): LatencySummary {
		if (this.samples.length === 0) {
			return { avgLatencyS: null, minLatencyS: null, maxLatencyS: null, samples: 0, timeouts: this.timeouts };
		}
		return {
			avgLatencyS: this.samples.reduce((sum, value) => sum + value, 0) / this.samples.length,
			minLatencyS: Math.min(...this.samples),
			maxLatencyS: Math.max(...this.samples),
			samples: this.samples.length,
			timeouts: this.timeouts
		};
	}
}
