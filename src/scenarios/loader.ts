import fs from 'node:fs/promises';
import path from 'node:path';
import { EventLogger } from '../logging/event-logger';
import { encodeMultipart } from '../multipart/encoder';
import { byteLength } from '../request/builder';
import type { HeaderField, HttpRequestSpec } from '../request/types';
import { BUILT_IN_SCENARIO_IDS, PARSER_TIMEOUT_MS } from './catalogue';
import { LoadedScenarioFile, Scenario, ScenarioFileRequest } from './types';
import {
  formatValidationErrors,
  validateScenarioFile,
  validateScenarioSet,
  ValidationError,
} from './validation';

const isScenarioFile = (name: string): boolean => {
  const lower = name.toLowerCase();
  return lower.endsWith('.yaml') || lower.endsWith('.yml');
};

const readDirRecursive = async (dir: string): Promise<string[]> => {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await readDirRecursive(fullPath)));
    } else {
      files.push(fullPath);
    }
  }

  return files;
};

const toHeaderFields = (headers: ScenarioFileRequest['headers']): HeaderField[] => {
  return (headers ?? []).flatMap((entry) => Object.entries(entry));
};

/**
 * Turns a validated file request into a request spec. Multipart bodies get a
 * matching Content-Type; Content-Length is only added when asked for, so files
 * can still describe requests that omit it.
 */
export const toRequestSpec = (request: ScenarioFileRequest): HttpRequestSpec => {
  const headers = toHeaderFields(request.headers);
  let body: HttpRequestSpec['body'] = request.body;

  if (request.multipart) {
    const encoded = encodeMultipart(request.multipart);
    headers.push(['Content-Type', encoded.contentType]);
    body = encoded.body;
  }

  if (request.contentLength && body !== undefined) {
    headers.push(['Content-Length', String(byteLength(body))]);
  }

  return {
    method: request.method,
    target: request.target,
    version: request.version,
    headers,
    body,
  };
};

export const toScenario = (file: LoadedScenarioFile): Scenario => ({
  id: file.scenario,
  description: file.description ?? `${file.request.method} ${file.request.target}`,
  source: 'file',
  timeoutMs: file.timeoutMs ?? PARSER_TIMEOUT_MS,
  // Files carry literal headers, so the configured target is not consulted.
  build: () => toRequestSpec(file.request),
});

export const loadScenarios = async (
  sourceDir?: string,
  eventLogger?: EventLogger
): Promise<Scenario[]> => {
  if (!sourceDir) {
    eventLogger?.emitEvent({
      event: 'scenarios-discovered',
      scenarios: [],
    });
    return [];
  }

  const files = await readDirRecursive(sourceDir);
  const scenarioFiles = files.filter((file) => isScenarioFile(file)).sort();

  eventLogger?.emitEvent({
    event: 'config-files',
    files: scenarioFiles,
  });

  const loaded: LoadedScenarioFile[] = [];
  const validationErrors: ValidationError[] = [];

  for (const filePath of scenarioFiles) {
    const result = await validateScenarioFile(filePath);

    if (!result.scenario) {
      const sortedErrors = [...result.errors].sort((a, b) =>
        `${a.path}:${a.message}`.localeCompare(`${b.path}:${b.message}`)
      );
      eventLogger?.emitEvent({
        event: 'validation-file',
        file: filePath,
        result: 'failed',
        errors: sortedErrors.map((error) => ({
          path: error.path,
          message: error.message,
          severity: error.severity,
          line: error.line,
          column: error.column,
        })),
      });
      validationErrors.push(...result.errors);
      continue;
    }

    eventLogger?.emitEvent({
      event: 'validation-file',
      file: filePath,
      result: 'ok',
    });
    validationErrors.push(...result.errors);

    loaded.push({
      ...result.scenario,
      sourcePath: filePath,
      sourceDir,
    });
  }

  if (loaded.length > 0) {
    validationErrors.push(...validateScenarioSet(loaded, BUILT_IN_SCENARIO_IDS));
  }

  eventLogger?.emitEvent({
    event: 'scenarios-discovered',
    scenarios: loaded.map((scenario) => scenario.scenario).sort(),
  });

  const errorList = validationErrors.filter((entry) => entry.severity === 'error');
  const warningList = validationErrors.filter((entry) => entry.severity === 'warning');

  eventLogger?.emitEvent({
    event: 'validation-summary',
    errors: errorList.length,
    warnings: warningList.length,
  });

  if (errorList.length > 0) {
    throw new Error(formatValidationErrors(errorList));
  }

  return loaded.map(toScenario);
};
