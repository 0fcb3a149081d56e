import { AppConfig } from '../types/config.types';
import { CredentialBackend } from '../types/auth.types';
import { FileParser } from '../types/report.types';
import { AuthService } from './auth.service';
import { ContentService, SignatureDetector } from './content.service';
import { DirectoryService } from './directory.service';
import { GatewayService } from './gateway.service';
import { MailTransport, NotificationService } from './notification.service';
import { ReportService } from './report.service';
import { SessionStore } from './session.service';
import { FetchLike, SheetService } from './sheet.service';
import { UploadService } from './upload.service';
import { Queryable, UserService } from './user.service';
import { WorkbookService } from './workbook.service';

/**
 * Collaborators that can be swapped out, e.g. under test
 */
export interface GatewayOverrides {
  primary?: CredentialBackend;
  secondary?: CredentialBackend;
  detector?: SignatureDetector;
  parser?: FileParser;
  mailTransport?: MailTransport;
  fetch?: FetchLike;
  clock?: () => number;
}

/**
 * Wire the request pipeline from configuration. The credential database
 * is only touched when the secondary backend is actually consulted.
 */
export function buildGateway(
  config: AppConfig,
  db: Queryable,
  overrides: GatewayOverrides = {}
): GatewayService {
  const clock = overrides.clock ?? Date.now;
  const notifier = new NotificationService(config.mail, overrides.mailTransport);

  return new GatewayService({
    sessions: new SessionStore({ dir: config.session.dir, ttlMs: config.session.ttlMs, clock }),
    auth: new AuthService(
      overrides.primary ?? new DirectoryService(config.ldap),
      overrides.secondary ?? new UserService(db)
    ),
    content: new ContentService(overrides.detector),
    parser: overrides.parser ?? new WorkbookService(),
    reports: new ReportService(),
    uploads: new UploadService({ root: config.upload.root, clock: () => new Date(clock()) }, notifier),
    sheets: new SheetService(config.sheet, overrides.fetch),
  });
}
