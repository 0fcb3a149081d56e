export type InputKind = 'file' | 'sheet';

/**
 * Where the submitted spreadsheet comes from; chosen once per request
 */
export type InputSource =
  | { kind: 'file'; filename: string; bytes: Buffer }
  | { kind: 'sheet'; sheetId: string };

/**
 * Spreadsheet bytes ready for checking, whatever the source
 */
export interface ResolvedInput {
  kind: InputKind;
  inputName: string;
  filename: string;
  bytes: Buffer;
}

export interface UploadedFileRecord {
  originalName: string;
  proposalId: string;
  extension: string;
  bytes: Buffer;
  destinationPath: string;
  uploadedAt: Date;
}

export type UploadRejection =
  | 'validation-errors-present'
  | 'auth-failed'
  | 'session-expired'
  | 'storage-failed';

export type UploadResult =
  | { ok: true; record: UploadedFileRecord }
  | { ok: false; reason: UploadRejection };

export interface StoredFile {
  name: string;
  size: number;
  modifiedAt: Date;
}

export interface ContentCheck {
  extension: string;
  extensionOk: boolean;
  contentOk: boolean;
  detectedSignature: string;
  messages: string[];
}
