export { ProcessSupervisor } from './process-supervisor';
export type { ServiceState, ServiceStatus, SupervisorOptions } from './process-supervisor';
export { ServiceManager } from './service-manager';
export type { LaunchTarget, StartResult, ServiceStatusReport } from './service-manager';
export { PidRecordFile, parsePidRecord } from './pid-record';
export type { PidRecord } from './pid-record';
export { isProcessAlive, verifyProcessOwnership, getProcessCommandLine } from './process-ownership';
export type { OwnershipStatus } from './process-ownership';
