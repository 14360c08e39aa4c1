import type { SuiteName, Target } from '../config/run-config';
import { encodeMultipart } from '../multipart/encoder';
import type { MultipartPart } from '../multipart/types';
import { byteLength } from '../request/builder';
import type { HeaderField, HttpRequestSpec } from '../request/types';
import type { Scenario } from './types';

export const PARSER_TIMEOUT_MS = 5000;
export const UPLOAD_TIMEOUT_MS = 10000;
export const UPLOAD_BOUNDARY = '----WebKitFormBoundary7MA4YWxkTrZu0gW';

const hostHeader = (target: Target): HeaderField => ['Host', `${target.host}:${target.port}`];

const CLOSE: HeaderField = ['Connection', 'close'];

const simpleGet = (path: string) => (target: Target): HttpRequestSpec => ({
  method: 'GET',
  target: path,
  version: 'HTTP/1.1',
  headers: [hostHeader(target), CLOSE],
});

const postWithBody = (path: string, contentType: string, body: string) => (
  target: Target
): HttpRequestSpec => ({
  method: 'POST',
  target: path,
  version: 'HTTP/1.1',
  headers: [
    hostHeader(target),
    ['Content-Type', contentType],
    ['Content-Length', String(byteLength(body))],
    CLOSE,
  ],
  body,
});

export const buildUploadRequest = (
  target: Target,
  parts: MultipartPart[],
  boundary = UPLOAD_BOUNDARY
): HttpRequestSpec => {
  const encoded = encodeMultipart({ boundary, parts });
  return {
    method: 'POST',
    target: '/upload',
    version: 'HTTP/1.1',
    headers: [
      hostHeader(target),
      ['Content-Type', encoded.contentType],
      ['Content-Length', String(encoded.contentLength)],
      CLOSE,
    ],
    body: encoded.body,
  };
};

type ScenarioEntry = Omit<Scenario, 'source' | 'timeoutMs'>;

const inSuite = (source: SuiteName, timeoutMs: number, entries: ScenarioEntry[]): Scenario[] => {
  return entries.map((entry) => ({ ...entry, source, timeoutMs }));
};

const parserScenarios = inSuite('parser', PARSER_TIMEOUT_MS, [
  {
    id: 'get-static',
    description: 'GET Request - Static File',
    build: (target) => ({
      method: 'GET',
      target: '/test.html',
      version: 'HTTP/1.1',
      headers: [
        hostHeader(target),
        ['User-Agent', 'WireProbe/1.0'],
        ['Accept', 'text/html'],
        CLOSE,
      ],
    }),
  },
  {
    id: 'get-query',
    description: 'GET Request - With Query String',
    build: simpleGet('/api/search?q=test&limit=10'),
  },
  {
    id: 'post-form',
    description: 'POST Request - Form Data',
    build: postWithBody(
      '/api/submit',
      'application/x-www-form-urlencoded',
      'name=John&email=john@example.com&message=Hello'
    ),
  },
  {
    id: 'post-json',
    description: 'POST Request - JSON Data',
    build: postWithBody(
      '/api/data',
      'application/json',
      '{"name": "Test", "value": 123, "active": true}'
    ),
  },
  {
    id: 'delete-item',
    description: 'DELETE Request',
    build: (target) => ({
      method: 'DELETE',
      target: '/api/items/123',
      version: 'HTTP/1.1',
      headers: [hostHeader(target), ['Authorization', 'Bearer token123'], CLOSE],
    }),
  },
  {
    id: 'directory-listing',
    description: 'Directory Listing (root)',
    build: simpleGet('/'),
  },
  {
    id: 'not-found',
    description: '404 Not Found',
    build: simpleGet('/nonexistent/file.html'),
  },
  {
    id: 'many-headers',
    description: 'Request with Multiple Headers',
    build: (target) => ({
      method: 'GET',
      target: '/test.html',
      version: 'HTTP/1.1',
      headers: [
        hostHeader(target),
        ['User-Agent', 'WireProbe/1.0'],
        ['Accept', 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'],
        ['Accept-Language', 'en-US,en;q=0.5'],
        ['Accept-Encoding', 'gzip, deflate'],
        ['DNT', '1'],
        CLOSE,
        ['Upgrade-Insecure-Requests', '1'],
        ['Cache-Control', 'max-age=0'],
      ],
    }),
  },
  {
    id: 'invalid-method',
    description: 'Invalid HTTP Method (should return 405)',
    build: (target) => ({
      method: 'INVALID',
      target: '/test',
      version: 'HTTP/1.1',
      headers: [hostHeader(target), CLOSE],
    }),
  },
  {
    id: 'missing-version',
    description: 'Malformed Request (should return 400)',
    // No version token and no Connection: close; the read timeout ends the exchange.
    build: (target) => ({
      method: 'GET',
      target: '/test',
      headers: [hostHeader(target)],
    }),
  },
]);

const largeContent = 'Line 1\n'.repeat(100);

const uploadScenarios = inSuite('upload', UPLOAD_TIMEOUT_MS, [
  {
    id: 'upload-small',
    description: 'Upload simple text file',
    build: (target) =>
      buildUploadRequest(target, [
        { name: 'file', filename: 'hello.txt', content: 'Hello, World!\nThis is a test file.' },
      ]),
  },
  {
    id: 'upload-large',
    description: 'Upload larger file',
    build: (target) =>
      buildUploadRequest(target, [{ name: 'file', filename: 'large.txt', content: largeContent }]),
  },
  {
    id: 'upload-multiple',
    description: 'Upload multiple files',
    build: (target) =>
      buildUploadRequest(target, [
        { name: 'file1', filename: 'test1.txt', content: 'This is the first test file' },
        { name: 'file2', filename: 'test2.txt', content: 'This is the second test file' },
      ]),
  },
]);

export const BUILT_IN_SCENARIOS: Record<SuiteName, Scenario[]> = {
  parser: parserScenarios,
  upload: uploadScenarios,
};

export const listBuiltInScenarios = (suites: SuiteName[]): Scenario[] => {
  return suites.flatMap((suite) => BUILT_IN_SCENARIOS[suite]);
};

export const BUILT_IN_SCENARIO_IDS = new Set(
  Object.values(BUILT_IN_SCENARIOS).flatMap((scenarios) => scenarios.map((scenario) => scenario.id))
);
