import { fromBuffer } from 'file-type';
import { ContentCheck } from '../types/upload.types';

/**
 * Reports a file's true format from its bytes
 */
export interface SignatureDetector {
  detect(bytes: Buffer): Promise<string | undefined>;
}

export const fileTypeDetector: SignatureDetector = {
  async detect(bytes: Buffer): Promise<string | undefined> {
    const result = await fromBuffer(bytes);
    return result?.ext;
  },
};

export const UNKNOWN_SIGNATURE = 'unknown';

/**
 * Allowed extensions and, for each, the detected signatures accepted for
 * it. Legacy .xls files are OLE compound documents ("cfb"); .xlsx files
 * are zip containers that are not always recognised past the zip layer.
 */
export const ALLOWED_SIGNATURES: Readonly<Record<string, readonly string[]>> = {
  xlsx: ['xlsx', 'zip'],
  xls: ['xls', 'cfb'],
};

export const ALLOWED_EXTENSIONS = Object.keys(ALLOWED_SIGNATURES);

export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.substring(dot + 1).toLowerCase();
}

/**
 * Checks the declared extension and the content signature independently,
 * so a renamed file and a wrong-format file are told apart
 */
export class ContentService {
  private readonly detector: SignatureDetector;

  constructor(detector: SignatureDetector = fileTypeDetector) {
    this.detector = detector;
  }

  async validate(filename: string, bytes: Buffer): Promise<ContentCheck> {
    const extension = extensionOf(filename);
    const detectedSignature = (await this.detector.detect(bytes)) ?? UNKNOWN_SIGNATURE;
    const messages: string[] = [];

    const extensionOk = Object.prototype.hasOwnProperty.call(ALLOWED_SIGNATURES, extension);
    if (!extensionOk) {
      messages.push(
        `File extension '${extension}' is not allowed. ` +
          `Allowed extensions are: ${ALLOWED_EXTENSIONS.join(', ')}`
      );
    }

    const accepted = extensionOk
      ? ALLOWED_SIGNATURES[extension]
      : Object.values(ALLOWED_SIGNATURES).flat();
    const contentOk = accepted.includes(detectedSignature);
    if (!contentOk) {
      messages.push(
        `Detected file type '${detectedSignature}' does not match ` +
          `the expected type for extension '${extension}'`
      );
    }

    return { extension, extensionOk, contentOk, detectedSignature, messages };
  }
}
