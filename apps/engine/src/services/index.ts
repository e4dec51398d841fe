export { SubmissionGateway } from './submission-gateway';
export type { SubmitRequest, SubmitResponse, GatewayLimits } from './submission-gateway';
export { StatusReporter } from './status-reporter';
export type { TaskStatus } from './status-reporter';
export { JobProcessor } from './job-processor';
export type { ProcessResult, ProcessorOptions, ProcessorDeps } from './job-processor';
export { Worker } from './worker';
export { WorkerPool } from './worker-pool';
export { LeaseKeeper } from './lease-keeper.service';
export { Scheduler } from './scheduler';
export { LeaderElector, LocalLeaderLock } from './leaderelector';
export type { LeaderLock } from './leaderelector';
export { EventLoopMonitor, createBackpressureCheck } from './event-loop-monitor';
