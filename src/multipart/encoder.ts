import { MultipartEncodeError } from './errors';
import type { EncodedMultipart, MultipartBody, MultipartPart } from './types';

const CRLF = '\r\n';
const DEFAULT_FILE_CONTENT_TYPE = 'text/plain';

const contentBytes = (content: MultipartPart['content']): Buffer => {
  return typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content);
};

const resolvePartContentType = (part: MultipartPart): string | undefined => {
  if (part.contentType !== undefined) return part.contentType;
  return part.filename !== undefined ? DEFAULT_FILE_CONTENT_TYPE : undefined;
};

const renderPartHead = (boundary: string, part: MultipartPart): string => {
  const disposition = part.filename !== undefined
    ? `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"`
    : `Content-Disposition: form-data; name="${part.name}"`;
  const contentType = resolvePartContentType(part);

  const lines = [`--${boundary}`, disposition];
  if (contentType !== undefined) {
    lines.push(`Content-Type: ${contentType}`);
  }
  lines.push('');
  return lines.map((line) => `${line}${CRLF}`).join('');
};

export const multipartContentType = (boundary: string): string => {
  return `multipart/form-data; boundary=${boundary}`;
};

/**
 * Encodes parts as a multipart/form-data body. The boundary must not occur in
 * any part's content; an empty boundary therefore collides with every part.
 */
export const encodeMultipart = ({ boundary, parts }: MultipartBody): EncodedMultipart => {
  const delimiter = Buffer.from(boundary, 'utf-8');
  const chunks: Buffer[] = [];

  parts.forEach((part, index) => {
    const content = contentBytes(part.content);
    if (content.includes(delimiter)) {
      throw new MultipartEncodeError(
        'boundary-collision',
        `Boundary "${boundary}" occurs in the content of part "${part.name}"`,
        index
      );
    }

    chunks.push(Buffer.from(renderPartHead(boundary, part), 'utf-8'), content, Buffer.from(CRLF));
  });

  chunks.push(Buffer.from(`--${boundary}--${CRLF}`, 'utf-8'));
  const body = Buffer.concat(chunks);

  return {
    body,
    contentType: multipartContentType(boundary),
    contentLength: body.byteLength,
  };
};
