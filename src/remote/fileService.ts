import { FileState, GoogleAIFileManager, type FileMetadataResponse } from '@google/generative-ai/server';
import { limit } from '../utils/limiter';

export type RemoteFileState = 'processing' | 'ready' | 'failed';

export interface RemoteFileStatus {
  /** Service-side identifier, e.g. `files/abc123`. */
  name: string;
  uri: string;
  mimeType: string;
  state: RemoteFileState;
  error?: string;
}

/**
 * The slice of a file-processing service the extractor needs: upload, state
 * lookup and deletion of one file at a time.
 */
export interface RemoteFileService {
  upload(localPath: string, mimeType: string, displayName: string): Promise<RemoteFileStatus>;
  getStatus(name: string): Promise<RemoteFileStatus>;
  delete(name: string): Promise<void>;
}

function toStatus(file: FileMetadataResponse): RemoteFileStatus {
  let state: RemoteFileState;
  switch (file.state) {
    case FileState.ACTIVE:
      state = 'ready';
      break;
    case FileState.FAILED:
      state = 'failed';
      break;
    default:
      state = 'processing';
  }

  return {
    name: file.name,
    uri: file.uri,
    mimeType: file.mimeType,
    state,
    ...(file.error ? { error: `${file.error.code}: ${file.error.message}` } : {}),
  };
}

export class GeminiFileService implements RemoteFileService {
  private files: GoogleAIFileManager;

  constructor(apiKey: string) {
    this.files = new GoogleAIFileManager(apiKey);
  }

  async upload(localPath: string, mimeType: string, displayName: string): Promise<RemoteFileStatus> {
    const response = await limit('gemini_files', () =>
      this.files.uploadFile(localPath, { mimeType, displayName })
    );
    return toStatus(response.file);
  }

  async getStatus(name: string): Promise<RemoteFileStatus> {
    const file = await limit('gemini_files', () => this.files.getFile(name));
    return toStatus(file);
  }

  async delete(name: string): Promise<void> {
    await limit('gemini_files', () => this.files.deleteFile(name));
  }
}
