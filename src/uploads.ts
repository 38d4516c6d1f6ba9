/**
 * Utilities for working with file uploads.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';

import { FileReadError } from './errors';

export class FileUpload {
  filename: string | null;
  content: Buffer;

  constructor(options: { content: Buffer; filename?: string | null }) {
    this.content = options.content;
    this.filename = options.filename ?? null;
  }

  static async fromPath(path: string): Promise<FileUpload> {
    try {
      const content = await readFile(path);
      return new FileUpload({ content, filename: basename(path) });
    } catch (error) {
      throw new FileReadError(path, { cause: error });
    }
  }

  /**
   * The API takes file contents as standard base64.
   */
  toBase64(): string {
    return this.content.toString('base64');
  }
}

export type FileInput = FileUpload | Buffer | string;

/**
 * A string is a path on the local filesystem.
 */
export async function normalizeFileUpload(upload: FileInput): Promise<FileUpload> {
  if (upload instanceof FileUpload) {
    return upload;
  }
  if (Buffer.isBuffer(upload)) {
    return new FileUpload({ content: upload });
  }
  if (typeof upload === 'string') {
    return FileUpload.fromPath(upload);
  }
  throw new TypeError('Unsupported file upload payload');
}
