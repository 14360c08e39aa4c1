import type { SuiteName, Target } from '../config/run-config';
import type { MultipartPart } from '../multipart/types';
import type { HttpRequestSpec } from '../request/types';

export type ScenarioSource = SuiteName | 'file';

export type Scenario = {
  id: string;
  description: string;
  source: ScenarioSource;
  timeoutMs: number;
  build: (target: Target) => HttpRequestSpec;
};

export type ScenarioFileMultipart = {
  boundary: string;
  parts: MultipartPart[];
};

export type ScenarioFileRequest = {
  method: string;
  target: string;
  version?: string;
  headers?: Array<Record<string, string>>;
  body?: string;
  contentLength?: boolean;
  multipart?: ScenarioFileMultipart;
};

export type ScenarioFile = {
  scenario: string;
  description?: string;
  timeoutMs?: number;
  request: ScenarioFileRequest;
};

export type LoadedScenarioFile = ScenarioFile & {
  sourcePath: string;
  sourceDir: string;
};
