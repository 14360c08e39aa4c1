export type StatusLine = {
  version: string;
  status: number;
  reason: string;
};

const STATUS_LINE = /^HTTP\/(\S+) (\d{3})(?: (.*))?$/;

/**
 * Reads the status line off a raw response for display. The response itself
 * stays opaque; anything that does not start like an HTTP response yields
 * undefined.
 */
export const parseStatusLine = (raw: Uint8Array): StatusLine | undefined => {
  const buffer = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
  const end = buffer.indexOf('\n');
  const firstLine = buffer
    .subarray(0, end < 0 ? buffer.length : end)
    .toString('latin1')
    .replace(/\r$/, '');
  const match = STATUS_LINE.exec(firstLine);
  if (!match) return undefined;

  return {
    version: match[1] ?? '',
    status: Number(match[2]),
    reason: match[3] ?? '',
  };
};
