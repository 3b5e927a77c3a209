export { run, runSupervisor, startSupervisor, handleTerminationSignals } from './Supervisor.js';
export type { SupervisorHandle, StartOptions } from './Supervisor.js';
export { makeWorkerSupervisor, restartDelay } from './WorkerSupervisor.js';
export type { WorkerOptions, WorkerSupervisor } from './WorkerSupervisor.js';
export { monitorOutput, initialLiveness } from './OutputMonitor.js';
export type { MonitorOptions } from './OutputMonitor.js';
export { LineBuffer } from './LineBuffer.js';
export { terminateProcessTree } from './ProcessTerminator.js';
export type { TerminatorOptions } from './ProcessTerminator.js';
export { ProcessTable, collectDescendants, groupMembers, parseProcessList } from './ProcessTable.js';
export type { ProcessEntry, ProcessTableInterface } from './ProcessTable.js';
export { ProcessTableLive } from './ProcessTableLive.js';
export { spawnManagedProcess } from './ManagedProcess.js';
export type { ManagedProcess, ProcessExit } from './ManagedProcess.js';
export { makeShutdownSignal } from './ShutdownSignal.js';
export type { ShutdownSignal } from './ShutdownSignal.js';
export {
  OutputSink,
  OutputSinkLive,
  combineSinks,
  consoleSink,
  fileSink,
  noopSink,
} from './OutputSink.js';
export type { OutputSinkInterface } from './OutputSink.js';
export { resolveSupervisorConfig, workerSlots, loggingConfig } from './config.js';
export { LoggingLive, loggerLayer } from './logging.js';
export type * from './types.js';
export {
  SpawnError,
  ReadError,
  TerminationError,
  ProcessTableError,
  SinkError,
  InvalidConfigError,
} from './errors.js';
