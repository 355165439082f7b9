export { ProbeError, IntrospectionError, httpStatusToCode, mapProbeError } from './errors';
export type { ProbeErrorCode } from './errors';
export { LlamaServerRunner, toChatCompletionBody, LLAMA_SERVER_FIELDS } from './llamaServerRunner';
export type { LlamaServerRunnerConfig } from './llamaServerRunner';
export type { ChatMessage, ChatRole, RunnerHandle, RunnerRequest, RunnerResult } from './types';
