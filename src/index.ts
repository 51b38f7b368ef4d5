export * from './errors/LabError';
export * from './errors/labErrors';
export * from './diagnostics/logger';
export * from './config/sanitizers';
export * from './config/harnessConfig';
export * from './scheduler/clock';

export * from './protocol/throughputPacket';
export * from './protocol/sequence';
export * from './protocol/controlCommand';

export * from './mock/faultProfile';
export * from './mock/randomSource';
export * from './mock/rssiSynth';
export * from './mock/faultInjector';
export * from './mock/notificationScheduler';
export * from './mock/commandProcessor';
export * from './mock/peripheralSession';

export * from './transport/bleLink';
export * from './transport/notificationChannel';
export * from './transport/loopbackLink';
export { NobleLink, createNobleLinkFactory, toNobleUuid } from './transport/nobleLink';
export type { NobleLinkOptions } from './transport/nobleLink';
export { BlenoHost, describeSession } from './transport/blenoHost';
export type { BlenoHostOptions } from './transport/blenoHost';

export * from './client/connectionTypes';
export * from './client/connectionManager';
export * from './client/metricsEngine';
export * from './client/controlWriter';
export * from './client/throughputTrial';
export * from './client/latencyTrial';
export * from './client/rssiTrial';

export * from './report/csvTable';
export * from './report/trialLogs';

export * from './sweep/sweepRecords';
export * from './sweep/adapterLock';
export * from './sweep/resumeIndex';
export * from './sweep/manifest';
export * from './sweep/trialExecutor';
export * from './sweep/trialOrchestrator';
