import { promises as fs } from 'fs';
import path from 'path';
import { InputError, StorageError } from '../middleware/error.middleware';
import { AuthOutcome, BackendName } from '../types/auth.types';
import { ValidationReport } from '../types/report.types';
import {
  InputKind,
  StoredFile,
  UploadedFileRecord,
  UploadResult,
} from '../types/upload.types';
import { extensionOf } from './content.service';
import { NotificationService } from './notification.service';
import { isNotFound } from '../utils/storage.utils';
import { fileTimestamp } from '../utils/time.utils';
import { logger } from '../utils/logger';

const PROPOSAL_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export interface UploadRequest {
  proposalId: string;
  filename: string;
  bytes: Buffer;
  inputKind: InputKind;
  inputName: string;
  report: ValidationReport;
}

/**
 * Who is uploading: a live session, a login made in the same request, or
 * neither
 */
export interface UploadAccess {
  sessionValid: boolean;
  auth?: AuthOutcome;
  identity?: { backend: BackendName; displayName: string };
}

export interface UploadServiceOptions {
  root: string;
  clock?: () => Date;
}

/**
 * Validate a proposal id and return its canonical upper-case form, which
 * names its upload directory
 */
export function assertProposalId(proposalId: string): string {
  const id = proposalId.trim();
  if (!PROPOSAL_ID_PATTERN.test(id)) {
    throw new InputError(`Invalid proposal identifier '${proposalId}'`);
  }
  return id.toUpperCase();
}

/**
 * `<base>_<timestamp>`, prefixed with the proposal id unless the name
 * already carries it
 */
export function deriveName(proposalId: string, filename: string, at: Date): string {
  const base = path
    .basename(filename)
    .replace(/\.[^.]*$/, '')
    .replace(/[^A-Za-z0-9._-]/g, '_');
  const derived = `${base}_${fileTimestamp(at)}`;

  return derived.toLowerCase().includes(proposalId.toLowerCase())
    ? derived
    : `${proposalId}_${derived}`;
}

/**
 * Proposal-partitioned file store for checked spreadsheets
 */
export class UploadService {
  private readonly root: string;
  private readonly clock: () => Date;
  private readonly notifier: NotificationService;

  constructor(options: UploadServiceOptions, notifier: NotificationService) {
    this.root = options.root;
    this.clock = options.clock ?? (() => new Date());
    this.notifier = notifier;
  }

  proposalDir(proposalId: string): string {
    return path.join(this.root, assertProposalId(proposalId));
  }

  /**
   * Store a checked file. Nothing is written unless the report is clean and
   * the caller is authenticated. Two uploads of the same base name within
   * one second share a name and the later one wins.
   */
  async store(request: UploadRequest, access: UploadAccess): Promise<UploadResult> {
    if (request.report.errorCount > 0) {
      return { ok: false, reason: 'validation-errors-present' };
    }

    if (!access.sessionValid) {
      if (access.auth && !access.auth.success) {
        return { ok: false, reason: 'auth-failed' };
      }
      if (!access.auth?.success) {
        return { ok: false, reason: 'session-expired' };
      }
    }

    const proposalId = assertProposalId(request.proposalId);
    const uploadedAt = this.clock();
    const extension = extensionOf(request.filename);
    const dir = this.proposalDir(proposalId);
    const destinationPath = path.join(
      dir,
      `${deriveName(proposalId, request.filename, uploadedAt)}.${extension}`
    );

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(destinationPath, request.bytes);
    } catch (error) {
      logger.error('Upload write failed', {
        proposalId,
        destinationPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return { ok: false, reason: 'storage-failed' };
    }

    const record: UploadedFileRecord = {
      originalName: request.inputName,
      proposalId,
      extension,
      bytes: request.bytes,
      destinationPath,
      uploadedAt,
    };

    logger.info('File uploaded', {
      proposalId,
      destinationPath,
      size: request.bytes.length,
    });

    const identity = access.identity ?? {
      backend: access.auth?.backend,
      displayName: access.auth?.displayName,
    };
    await this.notifier.notify(
      NotificationService.noticeFor(record, request.inputKind, request.inputName, identity)
    );

    return { ok: true, record };
  }

  /**
   * Files previously stored for a proposal, sorted by name
   */
  async list(proposalId: string): Promise<StoredFile[]> {
    const dir = this.proposalDir(proposalId);

    let names: string[];
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      names = entries.filter((e) => e.isFile()).map((e) => e.name);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      logger.error('Unable to list proposal directory', {
        dir,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StorageError(`Unable to list files for ${proposalId}`);
    }

    const files = await Promise.all(
      names.map(async (name) => {
        const stats = await fs.stat(path.join(dir, name));
        return { name, size: stats.size, modifiedAt: stats.mtime };
      })
    );

    return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}
