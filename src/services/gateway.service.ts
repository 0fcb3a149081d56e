import { AuthService } from './auth.service';
import { ContentService } from './content.service';
import { ReportService } from './report.service';
import { SessionStore } from './session.service';
import { SheetService } from './sheet.service';
import { UploadService, assertProposalId } from './upload.service';
import { InputError } from '../middleware/error.middleware';
import { AuthOutcome } from '../types/auth.types';
import { FileParser, ProgramMap, ValidationReport } from '../types/report.types';
import { ClientSession, Session } from '../types/session.types';
import {
  ContentCheck,
  InputSource,
  ResolvedInput,
  StoredFile,
  UploadResult,
} from '../types/upload.types';
import { logger } from '../utils/logger';

export type GatewayAction = 'list_files' | 'check' | 'upload';

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Everything one request carries. Built by the HTTP layer; nothing below
 * reads the process environment or the raw request.
 */
export interface RequestContext {
  clientAddress: string | null;
  session: ClientSession;
  login: boolean;
  logout: boolean;
  credentials?: Credentials;
  action: GatewayAction | null;
  proposalId?: string;
  inputs: InputSource[];
}

export interface RenderedReport {
  errors: string;
  warnings: string;
  summary: string;
}

export interface FileOutcome {
  inputName: string;
  content: ContentCheck;
  report?: ValidationReport;
  rendered?: RenderedReport;
  upload?: UploadResult;
}

export interface GatewayOutcome {
  session: Session | null;
  sessionCreated: boolean;
  sessionPersisted: boolean;
  loggedOut: boolean;
  auth?: AuthOutcome;
  action: GatewayAction | null;
  proposalId?: string;
  files?: StoredFile[];
  results: FileOutcome[];
}

export interface GatewayCollaborators {
  sessions: SessionStore;
  auth: AuthService;
  content: ContentService;
  parser: FileParser;
  reports: ReportService;
  uploads: UploadService;
  sheets: SheetService;
}

/**
 * Per-request control flow: session, optional logout and login, then at
 * most one of listing, checking or uploading. Holds no request state.
 */
export class GatewayService {
  private readonly deps: GatewayCollaborators;

  constructor(deps: GatewayCollaborators) {
    this.deps = deps;
  }

  async handle(ctx: RequestContext): Promise<GatewayOutcome> {
    const { sessions } = this.deps;
    const outcome: GatewayOutcome = {
      session: await sessions.resolve(ctx.session),
      sessionCreated: false,
      sessionPersisted: false,
      loggedOut: false,
      action: ctx.action,
      results: [],
    };

    if (ctx.logout) {
      // Expired records are invalidated too; the id may still be presented
      const existing = outcome.session ?? (await sessions.load(ctx.session.id));
      if (existing) {
        await sessions.invalidate(existing);
      }
      outcome.session = null;
      outcome.loggedOut = true;
    }

    if (ctx.login && !outcome.session) {
      if (!ctx.credentials) {
        throw new InputError('Username and password are both required to log in');
      }

      const auth = await this.deps.auth.authenticate(
        ctx.credentials.username,
        ctx.credentials.password
      );
      outcome.auth = auth;

      if (!auth.success || !auth.backend) {
        logger.info('Login refused', { clientAddress: ctx.clientAddress });
        return outcome;
      }

      const session = sessions.create(auth.backend, auth.displayName ?? ctx.credentials.username);
      outcome.sessionPersisted = await sessions.persist(session);
      outcome.session = session;
      outcome.sessionCreated = true;
    }

    if (!ctx.action) {
      return outcome;
    }

    if (!ctx.proposalId) {
      throw new InputError('A proposal identifier is required');
    }
    const proposalId = assertProposalId(ctx.proposalId);
    outcome.proposalId = proposalId;

    if (ctx.action === 'list_files') {
      outcome.files = await this.deps.uploads.list(proposalId);
      return outcome;
    }

    if (ctx.inputs.length === 0) {
      throw new InputError('No file or sheet was submitted');
    }

    for (const source of ctx.inputs) {
      const input = await this.resolveInput(source, proposalId);
      const result = await this.process(input, proposalId, ctx.action, outcome);
      outcome.results.push(result);

      // A failed write leaves the destination unusable for the remaining inputs
      if (result.upload && !result.upload.ok && result.upload.reason === 'storage-failed') {
        logger.warn('Stopping after storage failure', {
          proposalId,
          skipped: ctx.inputs.length - outcome.results.length,
        });
        break;
      }
    }

    return outcome;
  }

  private async resolveInput(source: InputSource, proposalId: string): Promise<ResolvedInput> {
    switch (source.kind) {
      case 'file':
        return {
          kind: 'file',
          inputName: source.filename,
          filename: source.filename,
          bytes: source.bytes,
        };
      case 'sheet':
        return {
          kind: 'sheet',
          inputName: source.sheetId,
          filename: `${proposalId}.xlsx`,
          bytes: await this.deps.sheets.fetchWorkbook(source.sheetId),
        };
    }
  }

  private async process(
    input: ResolvedInput,
    proposalId: string,
    action: Exclude<GatewayAction, 'list_files'>,
    outcome: GatewayOutcome
  ): Promise<FileOutcome> {
    const content = await this.deps.content.validate(input.filename, input.bytes);
    if (!content.extensionOk || !content.contentOk) {
      logger.info('File rejected by content check', {
        inputName: input.inputName,
        detectedSignature: content.detectedSignature,
      });
      return { inputName: input.inputName, content };
    }

    const programs: ProgramMap = new Map([
      [proposalId, { proposalId }],
    ]);
    const { datasets, report } = await this.deps.parser.check(input.bytes, programs);

    const { reports } = this.deps;
    const result: FileOutcome = {
      inputName: input.inputName,
      content,
      report,
      rendered: {
        errors: reports.format(report, 'error', datasets),
        warnings: reports.format(report, 'warning', datasets),
        summary: reports.summarize(report),
      },
    };

    if (action === 'upload') {
      const session = outcome.session;
      result.upload = await this.deps.uploads.store(
        {
          proposalId,
          filename: input.filename,
          bytes: input.bytes,
          inputKind: input.kind,
          inputName: input.inputName,
          report,
        },
        {
          sessionValid: session !== null,
          auth: outcome.auth,
          identity: session
            ? { backend: session.backend, displayName: session.displayName }
            : undefined,
        }
      );
    }

    return result;
  }
}
