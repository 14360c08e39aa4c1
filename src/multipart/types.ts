export type MultipartPart = {
  name: string;
  filename?: string;
  contentType?: string;
  content: string | Uint8Array;
};

export type MultipartBody = {
  boundary: string;
  parts: MultipartPart[];
};

export type EncodedMultipart = {
  body: Buffer;
  contentType: string;
  contentLength: number;
};

export type MultipartErrorCode = 'boundary-collision';
