import { MultipartErrorCode } from './types';

export class MultipartEncodeError extends Error {
  readonly code: MultipartErrorCode;
  readonly partIndex?: number;

  constructor(code: MultipartErrorCode, message: string, partIndex?: number) {
    super(message);
    this.name = 'MultipartEncodeError';
    this.code = code;
    this.partIndex = partIndex;
  }
}
