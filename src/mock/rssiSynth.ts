import type { FaultProfile } from './faultProfile';

const RSSI_FLOOR_DBM = -127;
const RSSI_CEILING_DBM = -1;

/**
 * Synthesised RSSI: `base + amplitude·sin(2πt/period) + drift·t`, where t is seconds
 * since the session started. A hardware reading, when the host can supply one, wins.
 */
export class RssiSynthesizer {
	public constructor(
		private readonly profile: Pick<FaultProfile, 'rssiBaseDbm' | 'rssiWaveAmplitude' | 'rssiWavePeriodS' | 'rssiDriftDbm'>,
		private readonly startedAtMs: number
	) {}

	public read(nowMs: number, hardwareDbm?: number): number {
		if (hardwareDbm !== undefined && Number.isFinite(hardwareDbm)) {
			return clampRssi(Math.round(hardwareDbm));
		}

		const elapsedS = Math.max(0, (nowMs - this.startedAtMs) / 1000);
		let value = this.profile.rssiBaseDbm + this.profile.rssiDriftDbm * elapsedS;
		if (this.profile.rssiWaveAmplitude > 0 && this.profile.rssiWavePeriodS > 0) {
			value += this.profile.rssiWaveAmplitude * Math.sin((2 * Math.PI * elapsedS) / this.profile.rssiWavePeriodS);
		}
		return clampRssi(Math.round(value));
	}
}

export function clampRssi(value: number): number {
	return Math.max(RSSI_FLOOR_DBM, Math.min(RSSI_CEILING_DBM, value));
}
