import multer from 'multer';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { UploadConfig } from '../types/config.types';
import { PayloadTooLargeError } from './error.middleware';

/**
 * Upload payload size guard.
 * Rejects requests whose Content-Length exceeds what the configured files
 * could add up to, before the body is read.
 */
export function enforceUploadSize(options: UploadConfig): RequestHandler {
  // Room for the form fields and multipart framing
  const limit = options.maxBytes * options.maxFiles + 64 * 1024;

  return (req: Request, res: Response, next: NextFunction) => {
    const contentLength = req.headers['content-length'];
    if (contentLength) {
      const len = parseInt(contentLength, 10);
      if (!Number.isNaN(len) && len > limit) {
        next(new PayloadTooLargeError(`Upload exceeds limit of ${limit} bytes`));
        return;
      }
    }
    next();
  };
}

/**
 * Multipart parser keeping file parts in memory; files never touch disk
 * before they are checked
 */
export function parseSubmission(options: UploadConfig): RequestHandler {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxBytes,
      files: options.maxFiles,
    },
  }).array('file', options.maxFiles);
}
