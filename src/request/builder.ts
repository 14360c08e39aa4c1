import type { HttpRequestSpec, RequestBody } from './types';

const CRLF = '\r\n';

export const byteLength = (body: RequestBody): number => {
  return typeof body === 'string' ? Buffer.byteLength(body, 'utf-8') : body.byteLength;
};

const toBuffer = (body: RequestBody): Buffer => {
  return typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.from(body);
};

export const formatRequestLine = (spec: Pick<HttpRequestSpec, 'method' | 'target' | 'version'>): string => {
  const tokens = [spec.method, spec.target];
  if (spec.version !== undefined) {
    tokens.push(spec.version);
  }
  return tokens.join(' ');
};

/**
 * Serializes a request exactly as described, including request lines and
 * methods a server is expected to reject. Nothing is validated or reordered.
 */
export const buildRequest = (spec: HttpRequestSpec): Buffer => {
  const head = [
    formatRequestLine(spec),
    ...spec.headers.map(([name, value]) => `${name}: ${value}`),
  ]
    .map((line) => `${line}${CRLF}`)
    .join('');

  const chunks: Buffer[] = [Buffer.from(`${head}${CRLF}`, 'utf-8')];
  if (spec.body !== undefined) {
    chunks.push(toBuffer(spec.body));
  }
  return Buffer.concat(chunks);
};
