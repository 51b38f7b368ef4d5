export type PhyMode = 'auto' | '1m' | '2m' | 'coded';

export const PHY_MODES: readonly PhyMode[] = ['auto', '1m', '2m', 'coded'];

export interface BleLinkConnectOptions {
	timeoutMs: number;
	signal?: AbortSignal;
}

export type NotificationListener = (value: Uint8Array) => void;

/**
 * One central-side link to the throughput service. Disconnect listeners fire only for
 * remote or radio-side loss, never for a local `disconnect()`.
 */
export interface BleLink {
	readonly target: string;
	connect(options: BleLinkConnectOptions): Promise<void>;
	disconnect(): Promise<void>;
	isConnected(): boolean;
	/** Write-without-response to the RX characteristic. */
	write(data: Uint8Array): Promise<void>;
	/** Enables TX notifications (CCCD) and routes values to `listener`. */
	subscribe(listener: NotificationListener): Promise<void>;
	unsubscribe(): Promise<void>;
	onDisconnect(listener: (reason: string) => void): () => void;
	/** Resolves the MTU in effect after the exchange. */
	requestMtu?(mtu: number): Promise<number>;
	requestPhy?(phy: PhyMode): Promise<void>;
	readRssi?(): Promise<number | undefined>;
}

export type BleLinkFactory = (target: string) => BleLink;
