// public api for @taskline/sdk
// usage:
//   import { executor, success } from '@taskline/sdk';
//   executor('rag-query', async (ctx) => success(await answer(ctx.payload)));

export { WORK_KINDS, isWorkKind, taskState } from './types';
export type { WorkKind, TaskError, PayloadRef, JobEnvelope } from './types';
export { success, retryable, fatal, ExecutionError, outcomeFromError } from './outcome';
export type { ExecutionOutcome } from './outcome';
export { ExecutorRegistry, globalRegistry, executor } from './executor';
export type { Executor, ExecutionContext, ExperimentLogger, ExperimentRecord } from './executor';
export { serialize, deserialize, SerializationError, PayloadTooLargeError, MAX_RESULT_SIZE } from './utils/serialization';
export { encodeEnvelope, decodeEnvelope, inlinePayload } from './utils/envelope';
