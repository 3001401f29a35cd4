/**
 * File attachment envelope returned by an action endpoint: the file's bytes travel base64 encoded
 * next to its name and MIME type.
 */
export interface FileEnvelope {
  name: string;
  mime_type: string;
  content: string;
}

export interface GatewayFileResponse {
  openaiFileResponse: FileEnvelope[];
}

export interface DecodedFile {
  name: string;
  mimeType: string;
  data: Buffer;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function encodeFile(name: string, mimeType: string, bytes: Uint8Array | string): FileEnvelope {
  const data = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : Buffer.from(bytes);
  return {
    name,
    mime_type: mimeType,
    content: data.toString('base64')
  };
}

export function isFileEnvelope(value: unknown): value is FileEnvelope {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return typeof candidate.name === 'string'
    && typeof candidate.mime_type === 'string'
    && typeof candidate.content === 'string';
}

export function isGatewayFileResponse(value: unknown): value is GatewayFileResponse {
  if (typeof value !== 'object' || value === null || !('openaiFileResponse' in value)) {
    return false;
  }
  const files = value.openaiFileResponse;
  return Array.isArray(files) && files.every(isFileEnvelope);
}

export function decodeFile(envelope: unknown): DecodedFile {
  if (!isFileEnvelope(envelope)) {
    throw new Error('Malformed file envelope: name, mime_type and content must all be strings');
  }
  if (!BASE64_PATTERN.test(envelope.content)) {
    throw new Error(`Malformed file envelope: content of ${envelope.name} is not base64`);
  }
  return {
    name: envelope.name,
    mimeType: envelope.mime_type,
    data: Buffer.from(envelope.content, 'base64')
  };
}

/**
 * Wrap one or more envelopes the way the action endpoint answers with files
 */
export function toGatewayFileResponse(...files: FileEnvelope[]): GatewayFileResponse {
  return { openaiFileResponse: files };
}
