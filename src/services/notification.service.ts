import { createTransport, SendMailOptions } from 'nodemailer';
import { AuthOutcome } from '../types/auth.types';
import { MailConfig } from '../types/config.types';
import { InputKind, UploadedFileRecord } from '../types/upload.types';
import { logger } from '../utils/logger';

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export interface UploadNotice {
  record: UploadedFileRecord;
  inputKind: InputKind;
  inputName: string;
  backend: string;
  displayName: string;
}

const VERB: Record<InputKind, string> = {
  file: 'uploaded',
  sheet: 'submitted',
};

const INPUT_LABEL: Record<InputKind, string> = {
  file: 'Excel file',
  sheet: 'online sheet',
};

/**
 * Summarize an upload for the queue operators
 */
export function buildNotice(notice: UploadNotice, options: MailConfig): SendMailOptions {
  const { record, inputKind, inputName, backend, displayName } = notice;
  const verb = VERB[inputKind];

  return {
    from: options.from,
    to: options.to,
    subject: `Queue spreadsheet for ${record.proposalId} was ${verb}`,
    text:
      `A queue spreadsheet for proposal ${record.proposalId} was ${verb} ` +
      `by ${backend} user ${displayName} on ${record.uploadedAt.toISOString()}. ` +
      `Input was ${INPUT_LABEL[inputKind]} named ${inputName}. ` +
      `Output filename is ${record.destinationPath}`,
  };
}

/**
 * Best-effort mail notification; never throws
 */
export class NotificationService {
  private readonly options: MailConfig;
  private readonly transport: MailTransport;

  constructor(options: MailConfig, transport?: MailTransport) {
    this.options = options;
    this.transport =
      transport ??
      createTransport({
        host: options.host,
        port: options.port,
        secure: false,
      });
  }

  async notify(notice: UploadNotice): Promise<boolean> {
    if (!this.options.enabled) {
      return false;
    }

    try {
      await this.transport.sendMail(buildNotice(notice, this.options));
      logger.info('Upload notification sent', {
        proposalId: notice.record.proposalId,
        to: this.options.to,
      });
      return true;
    } catch (error) {
      logger.error('Upload notification failed', {
        proposalId: notice.record.proposalId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  static noticeFor(
    record: UploadedFileRecord,
    inputKind: InputKind,
    inputName: string,
    identity: Pick<AuthOutcome, 'backend' | 'displayName'>
  ): UploadNotice {
    return {
      record,
      inputKind,
      inputName,
      backend: identity.backend ?? 'unknown',
      displayName: identity.displayName ?? 'unknown',
    };
  }
}
