export type {
  TransferDirection,
  TransferStatus,
  TransferSource,
  PublicRecord,
  ServerMessage,
  ClientMessage,
  MobileTokenPayload,
  SettingsView,
  UploadLimitUpdate,
  DownloadDirUpdate,
  DesktopPathUpload,
  SaveResult,
  ApiResponse,
} from './types.js';
