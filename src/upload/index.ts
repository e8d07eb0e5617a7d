export { FolderUploadEngine } from './folder-upload-engine.js';
export type {
  FolderUploadEngineOptions,
  RecursiveUploadOptions,
  SingleFileUploadOptions,
} from './folder-upload-engine.js';
export { PathMapper } from './path-mapper.js';
export { HttpRemoteClient } from './http-remote-client.js';
export type { HttpRemoteClientOptions } from './http-remote-client.js';
export type {
  RemoteClient,
  CreateFolderOptions,
  UploadFileOptions,
  ListFolderOptions,
} from './remote-client.js';
export {
  buildClientConfig,
  validateClientConfig,
  DEFAULT_API_URL,
  DEFAULT_ENDPOINTS,
  DEFAULT_TIMEOUT_MS,
} from './config.js';
export type { RemoteClientConfig, ApiEndpoints } from './config.js';
export {
  createUploadContext,
  validateRecursiveTarget,
  validateSingleFileTarget,
} from './context.js';
export type { UploadContext } from './context.js';
export {
  classifyUploadResponse,
  parseKeyValuePairs,
  parseFolderPayload,
  parseFolderListing,
  folderFromFields,
  uploadKeyFor,
  UPLOAD_ACK,
} from './response.js';
export type { UploadResponse, FolderPayload } from './response.js';
export { snapshotDirectory, describeFile, countFiles, pathExists } from './local-tree.js';
export { ProgressTracker } from './progress.js';
export type { ProgressEvent, ProgressSink } from './progress.js';
export { UploadResultBuilder, summarizeResult } from './result.js';
export {
  ConfigurationError,
  FolderCreateError,
  UploadError,
  TraversalError,
  LoginError,
  RemoteListError,
  errorMessage,
  isTimeoutError,
} from './errors.js';
export type {
  Credentials,
  RemoteFolder,
  AccessType,
  RemoteEntry,
  LoginSession,
  LocalFile,
  LocalDirectory,
  LocalEntry,
  UploadTask,
  UploadedFile,
  FailureKind,
  UploadFailure,
  UploadResult,
} from './types.js';
