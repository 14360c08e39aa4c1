export { buildRequest, byteLength, formatRequestLine } from './request/builder';
export { encodeMultipart, multipartContentType } from './multipart/encoder';
export { MultipartEncodeError } from './multipart/errors';
export { exchange } from './transport/transport';
export { parseStatusLine } from './responses/status-line';
export { runScenarios } from './runner/runner';
export { BUILT_IN_SCENARIOS, buildUploadRequest, listBuiltInScenarios } from './scenarios/catalogue';
export { loadScenarios } from './scenarios/loader';
export { ConfigError, resolveRunConfig } from './config/run-config';
export { createEventLogger, createNullEventLogger } from './logging/event-logger';
export type { HeaderField, HttpRequestSpec, RequestBody } from './request/types';
export type { EncodedMultipart, MultipartBody, MultipartPart } from './multipart/types';
export type { Exchange, ExchangeOptions, ExchangeResult } from './transport/transport';
export type { StatusLine } from './responses/status-line';
export type { RunnerOptions, ScenarioOutcome } from './runner/runner';
export type { Scenario, ScenarioFile } from './scenarios/types';
export type { RunConfig, Target } from './config/run-config';
