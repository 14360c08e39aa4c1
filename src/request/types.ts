export type HeaderField = readonly [name: string, value: string];

export type RequestBody = string | Uint8Array;

export type HttpRequestSpec = {
  method: string;
  target: string;
  // Omitted to produce a request line with no version token at all.
  version?: string;
  headers: HeaderField[];
  body?: RequestBody;
};
