/**
 * Gzip archive helpers
 *
 * Node's gzip stream writes a bare header. embedFileName rewrites it to
 * carry the original file name (FNAME) and modification time, which only
 * live in the header and are not covered by the trailer CRC.
 */

import { open } from 'node:fs/promises';
import { Transform, type TransformCallback } from 'node:stream';

export const GZIP_MAGIC = Buffer.from([0x1f, 0x8b]);

const HEADER_LENGTH = 10;
const FLAG_FEXTRA = 0x04;
const FLAG_FNAME = 0x08;
const MAX_HEADER_SCAN = 4096;

export interface GzipHeader {
  originalName?: string;
  modifiedAt?: Date;
}

/**
 * Read the leading bytes of a file
 */
export async function readLeadingBytes(path: string, length: number): Promise<Buffer> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Detect a gzip archive by its two-byte magic number
 */
export async function isCompressedFile(path: string): Promise<boolean> {
  const head = await readLeadingBytes(path, GZIP_MAGIC.length);
  return head.length === GZIP_MAGIC.length && head.equals(GZIP_MAGIC);
}

/**
 * Parse the name and mtime out of a gzip header
 */
export function parseGzipHeader(bytes: Buffer): GzipHeader | undefined {
  if (bytes.length < HEADER_LENGTH || !bytes.subarray(0, 2).equals(GZIP_MAGIC)) {
    return undefined;
  }

  const flags = bytes[3];
  const mtime = bytes.readUInt32LE(4);
  const header: GzipHeader = mtime > 0 ? { modifiedAt: new Date(mtime * 1000) } : {};

  let offset = HEADER_LENGTH;
  if (flags & FLAG_FEXTRA) {
    if (bytes.length < offset + 2) return header;
    offset += 2 + bytes.readUInt16LE(offset);
  }

  if (flags & FLAG_FNAME) {
    const end = bytes.indexOf(0, offset);
    if (end !== -1) {
      header.originalName = bytes.toString('latin1', offset, end);
    }
  }

  return header;
}

export async function readGzipHeader(path: string): Promise<GzipHeader | undefined> {
  return parseGzipHeader(await readLeadingBytes(path, MAX_HEADER_SCAN));
}

/**
 * Transform placed after createGzip() that stamps the header with a file
 * name and modification time
 */
export function embedFileName(name: string, modifiedAt: Date = new Date()): Transform {
  let pending: Buffer | null = Buffer.alloc(0);

  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      if (pending === null) {
        callback(null, chunk);
        return;
      }

      pending = Buffer.concat([pending, chunk]);
      if (pending.length < HEADER_LENGTH) {
        callback();
        return;
      }

      const header = Buffer.from(pending.subarray(0, HEADER_LENGTH));
      header[3] |= FLAG_FNAME;
      header.writeUInt32LE(Math.floor(modifiedAt.getTime() / 1000), 4);

      const output = Buffer.concat([
        header,
        Buffer.from(name, 'latin1'),
        Buffer.from([0]),
        pending.subarray(HEADER_LENGTH),
      ]);
      pending = null;
      callback(null, output);
    },
    flush(callback: TransformCallback) {
      if (pending !== null && pending.length > 0) {
        callback(new Error('Gzip stream ended before its header was complete'));
        return;
      }
      callback();
    },
  });
}
