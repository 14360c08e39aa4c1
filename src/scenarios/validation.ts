import fs from 'node:fs/promises';
import * as YAML from 'yaml';
import { ScenarioFile } from './types';

export type ValidationSeverity = 'error' | 'warning';

export type ValidationError = {
  file: string;
  path: string;
  message: string;
  severity: ValidationSeverity;
  line?: number;
  column?: number;
};

export type ValidationResult = {
  scenario?: ScenarioFile;
  errors: ValidationError[];
};

const ROOT_KEYS = new Set(['scenario', 'description', 'timeoutMs', 'request']);
const REQUEST_KEYS = new Set([
  'method',
  'target',
  'version',
  'headers',
  'body',
  'contentLength',
  'multipart',
]);
const MULTIPART_KEYS = new Set(['boundary', 'parts']);
const PART_KEYS = new Set(['name', 'filename', 'contentType', 'content']);

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const pushError = (
  errors: ValidationError[],
  file: string,
  pathKey: string,
  message: string,
  severity: ValidationSeverity = 'error',
  line?: number,
  column?: number
): void => {
  errors.push({ file, path: pathKey, message, severity, line, column });
};

const extractLineInfo = (error: YAML.YAMLError): { line?: number; column?: number } => {
  const linePos = error.linePos;
  if (!linePos) return {};
  return { line: linePos[0].line, column: linePos[0].col };
};

const parseYamlStrict = (filePath: string, content: string): { data?: unknown; errors: ValidationError[] } => {
  const doc = YAML.parseDocument(content, {
    prettyErrors: true,
    uniqueKeys: true,
  });

  const errors: ValidationError[] = [];

  for (const err of doc.errors) {
    const { line, column } = extractLineInfo(err);
    pushError(errors, filePath, '', err.message, 'error', line, column);
  }

  for (const warn of doc.warnings) {
    const { line, column } = extractLineInfo(warn);
    pushError(errors, filePath, '', warn.message, 'warning', line, column);
  }

  if (errors.some((entry) => entry.severity === 'error')) {
    return { errors };
  }

  const data: unknown = doc.toJS({ maxAliasCount: 0 });
  return { data, errors };
};

const checkKeys = (
  errors: ValidationError[],
  filePath: string,
  basePath: string,
  value: Record<string, unknown>,
  allowed: Set<string>,
  label: string
): void => {
  for (const key of Object.keys(value)) {
    if (!allowed.has(key)) {
      const pathKey = basePath ? `${basePath}.${key}` : key;
      pushError(errors, filePath, pathKey, `Unknown ${label} key "${key}"`);
    }
  }
};

const validateRootObject = (value: unknown, filePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];

  if (!isPlainObject(value)) {
    pushError(errors, filePath, '', 'Root document must be an object');
    return errors;
  }

  checkKeys(errors, filePath, '', value, ROOT_KEYS, 'root');

  if (typeof value.scenario !== 'string' || value.scenario.trim().length === 0) {
    pushError(errors, filePath, 'scenario', 'Scenario name must be a non-empty string');
  } else if (/\s/.test(value.scenario)) {
    pushError(errors, filePath, 'scenario', `Scenario name "${value.scenario}" must not contain whitespace`);
  }

  if (value.description !== undefined && typeof value.description !== 'string') {
    pushError(errors, filePath, 'description', 'Description must be a string');
  }

  if (value.timeoutMs !== undefined) {
    if (typeof value.timeoutMs !== 'number' || !Number.isInteger(value.timeoutMs) || value.timeoutMs <= 0) {
      pushError(errors, filePath, 'timeoutMs', 'timeoutMs must be a positive integer');
    }
  }

  if (!isPlainObject(value.request)) {
    pushError(errors, filePath, 'request', 'request must be an object');
  }

  return errors;
};

const validateHeaders = (headers: unknown, filePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];
  const basePath = 'request.headers';

  if (!Array.isArray(headers)) {
    pushError(errors, filePath, basePath, 'headers must be a list of single-key maps');
    return errors;
  }

  headers.forEach((entry: unknown, index) => {
    const entryPath = `${basePath}[${index}]`;
    if (!isPlainObject(entry) || Object.keys(entry).length !== 1) {
      pushError(errors, filePath, entryPath, 'Each header must be a map with exactly one name');
      return;
    }
    for (const [name, value] of Object.entries(entry)) {
      if (typeof value !== 'string') {
        pushError(errors, filePath, `${entryPath}.${name}`, 'header values must be strings');
      }
    }
  });

  return errors;
};

const validateMultipart = (multipart: unknown, filePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];
  const basePath = 'request.multipart';

  if (!isPlainObject(multipart)) {
    pushError(errors, filePath, basePath, 'multipart must be an object');
    return errors;
  }

  checkKeys(errors, filePath, basePath, multipart, MULTIPART_KEYS, 'multipart');

  if (typeof multipart.boundary !== 'string' || multipart.boundary.length === 0) {
    pushError(errors, filePath, `${basePath}.boundary`, 'boundary must be a non-empty string');
  }

  if (!Array.isArray(multipart.parts) || multipart.parts.length === 0) {
    pushError(errors, filePath, `${basePath}.parts`, 'parts must be a non-empty array');
    return errors;
  }

  multipart.parts.forEach((part: unknown, index) => {
    const partPath = `${basePath}.parts[${index}]`;
    if (!isPlainObject(part)) {
      pushError(errors, filePath, partPath, 'Part must be an object');
      return;
    }

    checkKeys(errors, filePath, partPath, part, PART_KEYS, 'part');

    if (typeof part.name !== 'string' || part.name.length === 0) {
      pushError(errors, filePath, `${partPath}.name`, 'name must be a non-empty string');
    }
    if (typeof part.content !== 'string') {
      pushError(errors, filePath, `${partPath}.content`, 'content must be a string');
    }
    for (const key of ['filename', 'contentType']) {
      if (part[key] !== undefined && typeof part[key] !== 'string') {
        pushError(errors, filePath, `${partPath}.${key}`, `${key} must be a string`);
      }
    }
  });

  return errors;
};

const validateRequest = (request: Record<string, unknown>, filePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];
  const basePath = 'request';

  checkKeys(errors, filePath, basePath, request, REQUEST_KEYS, 'request');

  // Any token is accepted on purpose; servers are expected to reject odd methods.
  if (typeof request.method !== 'string' || request.method.length === 0) {
    pushError(errors, filePath, `${basePath}.method`, 'method must be a non-empty string');
  }

  if (typeof request.target !== 'string') {
    pushError(errors, filePath, `${basePath}.target`, 'target must be a string');
  }

  if (request.version !== undefined && typeof request.version !== 'string') {
    pushError(errors, filePath, `${basePath}.version`, 'version must be a string');
  }

  if (request.headers !== undefined) {
    errors.push(...validateHeaders(request.headers, filePath));
  }

  if (request.body !== undefined && typeof request.body !== 'string') {
    pushError(errors, filePath, `${basePath}.body`, 'body must be a string');
  }

  if (request.contentLength !== undefined && typeof request.contentLength !== 'boolean') {
    pushError(errors, filePath, `${basePath}.contentLength`, 'contentLength must be a boolean');
  }

  if (request.multipart !== undefined) {
    if (request.body !== undefined) {
      pushError(errors, filePath, basePath, 'Only one of body or multipart may be provided');
    }
    errors.push(...validateMultipart(request.multipart, filePath));
  }

  if (request.contentLength === true && request.body === undefined && request.multipart === undefined) {
    pushError(
      errors,
      filePath,
      `${basePath}.contentLength`,
      'contentLength has no effect without body or multipart',
      'warning'
    );
  }

  return errors;
};

const isScenarioFile = (value: unknown): value is ScenarioFile => {
  return isPlainObject(value) && typeof value.scenario === 'string' && isPlainObject(value.request);
};

export const validateScenarioFile = async (filePath: string): Promise<ValidationResult> => {
  const content = await fs.readFile(filePath, 'utf-8');
  const parseResult = parseYamlStrict(filePath, content);

  if (parseResult.data === undefined) {
    return { errors: parseResult.errors };
  }

  const rootErrors = validateRootObject(parseResult.data, filePath);
  const errors = [...parseResult.errors, ...rootErrors];

  if (rootErrors.length > 0 || !isScenarioFile(parseResult.data)) {
    return { errors };
  }

  const data = parseResult.data;
  if (isPlainObject(data.request)) {
    errors.push(...validateRequest(data.request, filePath));
  }

  if (errors.some((entry) => entry.severity === 'error')) {
    return { errors };
  }

  return { scenario: data, errors };
};

export const validateScenarioSet = (
  scenarios: Array<ScenarioFile & { sourcePath: string }>,
  reservedIds: Set<string>
): ValidationError[] => {
  const errors: ValidationError[] = [];
  const seen = new Map<string, string>();

  for (const scenario of scenarios) {
    const name = scenario.scenario;
    if (reservedIds.has(name)) {
      pushError(errors, scenario.sourcePath, 'scenario', `Scenario name "${name}" is already a built-in scenario`);
      continue;
    }
    const current = seen.get(name);
    if (current) {
      pushError(
        errors,
        scenario.sourcePath,
        'scenario',
        `Duplicate scenario name "${name}" found in ${current}`
      );
    } else {
      seen.set(name, scenario.sourcePath);
    }
  }

  return errors;
};

export const formatValidationErrors = (errors: ValidationError[]): string => {
  return errors
    .map((error) => {
      const location = error.line !== undefined ? `:${error.line}:${error.column ?? 0}` : '';
      return `${error.severity.toUpperCase()} ${error.file}${location}\n ○ ${error.path}\n   → ${error.message}`;
    })
    .join('\n\n');
};
