export * from './admission';
export {
  defaultSchedulerConfig,
  loadSchedulerConfig,
  readConfigFromEnv,
  SchedulerConfigError,
  schedulerConfigSchema,
} from './config/schedulerConfig';
export type { ManualTriggerMode, SchedulerConfig, SchedulerConfigInput } from './config/schedulerConfig';
export { PlatformBridge } from './platform/platformBridge';
export type { InterruptionSdk, SdkEventMap, SdkEventName } from './platform/platformBridge';
export type {
  InterruptionKind,
  PlatformAdapter,
  PlatformListener,
  PlatformNotification,
} from './platform/platformAdapter';
export { KeyvCounterStore } from './storage/counterStore';
export type { CounterStore } from './storage/counterStore';
export { initializeLogger } from './utils/logger';
export { AdmissionSchedulerProvider, useAdmissionScheduler } from './contexts/AdmissionSchedulerProvider';
export { useCountdownDisplay } from '../hooks/useCountdownDisplay';
export type { CountdownDisplay } from '../hooks/useCountdownDisplay';
export { useAdmissionBlock } from '../hooks/useAdmissionBlock';
