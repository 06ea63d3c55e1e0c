export { Monitor, restartDelay, policyFromSettings } from './monitor';
export type {
  RestartPolicy,
  MonitorOptions,
  MonitoredService,
  HealthProbe,
  ProbeFactory,
  MonitorStatusEvent,
  UnhealthyEvent,
  CrashedEvent,
  RestartedEvent,
} from './monitor';
