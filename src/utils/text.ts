const decoder = new TextDecoder('utf-8', { fatal: false });

// Undecodable sequences become U+FFFD.
export const decodeForDisplay = (bytes: Uint8Array): string => decoder.decode(bytes);
