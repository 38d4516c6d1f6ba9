/**
 * Storage endpoints.
 */

import { RequesterProtocol } from '../client-types';
import { FileInput, normalizeFileUpload } from '../uploads';
import { FileType, ListFilesOutput, ListFilesOutputSchema, StorageFile, StorageFileSchema } from '../types';

export class StorageAPI {
  constructor(private requester: RequesterProtocol) {}

  /**
   * Upload a file. `file` is a local path, a Buffer or a FileUpload; the
   * contents are sent base64 encoded.
   */
  async uploadFile(options: {
    file: FileInput;
    type?: FileType;
    name?: string | null;
    link?: string | null;
  }): Promise<StorageFile> {
    const upload = await normalizeFileUpload(options.file);
    const payload: Record<string, string> = {
      file: upload.toBase64(),
    };
    if (options.type) {
      payload.type = options.type;
    }
    const name = options.name ?? upload.filename;
    if (name) {
      payload.name = name;
    }
    if (options.link) {
      payload.link = options.link;
    }
    return this.requester.post('storage/v1/files', payload, StorageFileSchema);
  }

  async list(options?: {
    type?: FileType | null;
    limit?: number | null;
    startKey?: string | null;
  }): Promise<ListFilesOutput> {
    return this.requester.get(
      'storage/v1/files',
      {
        type: options?.type,
        limit: options?.limit,
        startKey: options?.startKey,
      },
      ListFilesOutputSchema
    );
  }
}
