import { promises as fs } from 'fs';
import path from 'path';
import { SendMailOptions } from 'nodemailer';
import { InputError } from '../../src/middleware/error.middleware';
import { MailTransport, NotificationService } from '../../src/services/notification.service';
import {
  UploadRequest,
  UploadService,
  assertProposalId,
  deriveName,
} from '../../src/services/upload.service';
import { AuthOutcome } from '../../src/types/auth.types';
import { MailConfig } from '../../src/types/config.types';
import { makeTempDir, removeDir } from '../helpers';

const PROPOSAL = 'S22B-QN001';
const AT = new Date(Date.UTC(2026, 2, 14, 9, 30, 5));

const mail: MailConfig = {
  enabled: true,
  host: 'smtp.test',
  port: 25,
  from: 'gateway@example.test',
  to: 'queue@example.test',
};

class RecordingTransport implements MailTransport {
  readonly sent: SendMailOptions[] = [];

  async sendMail(message: SendMailOptions): Promise<unknown> {
    this.sent.push(message);
    return { messageId: 'test' };
  }
}

function request(overrides: Partial<UploadRequest> = {}): UploadRequest {
  return {
    proposalId: PROPOSAL,
    filename: `${PROPOSAL}.xlsx`,
    bytes: Buffer.from('workbook bytes'),
    inputKind: 'file',
    inputName: `${PROPOSAL}.xlsx`,
    report: { datasets: [], errorCount: 0, warningCount: 0 },
    ...overrides,
  };
}

const failedLogin: AuthOutcome = {
  success: false,
  attempts: [],
  reason: 'ldap: credentials rejected; database: credentials rejected',
};

describe('assertProposalId', () => {
  it('accepts and trims plain identifiers', () => {
    expect(assertProposalId(' S22B-QN001 ')).toBe('S22B-QN001');
  });

  it('upper-cases the identifier', () => {
    expect(assertProposalId('s22b-qn001')).toBe('S22B-QN001');
  });

  it('rejects identifiers that could escape the upload root', () => {
    expect(() => assertProposalId('../etc')).toThrow(InputError);
    expect(() => assertProposalId('a/b')).toThrow(InputError);
    expect(() => assertProposalId('')).toThrow(InputError);
  });
});

describe('deriveName', () => {
  it('keeps a base name that already carries the proposal id', () => {
    expect(deriveName(PROPOSAL, 'S22B-QN001.xlsx', AT)).toBe('S22B-QN001_20260314_093005');
  });

  it('matches the proposal id case-insensitively', () => {
    expect(deriveName(PROPOSAL, 'queue_s22b-qn001_v2.xlsx', AT)).toBe(
      'queue_s22b-qn001_v2_20260314_093005'
    );
  });

  it('prefixes the proposal id when the name lacks it', () => {
    expect(deriveName(PROPOSAL, 'queue file.xlsx', AT)).toBe(
      'S22B-QN001_queue_file_20260314_093005'
    );
  });

  it('drops directory components from the client name', () => {
    expect(deriveName(PROPOSAL, '../../evil.xlsx', AT)).toBe('S22B-QN001_evil_20260314_093005');
  });
});

describe('UploadService', () => {
  let root: string;
  let transport: RecordingTransport;
  let service: UploadService;

  beforeEach(async () => {
    root = await makeTempDir();
    transport = new RecordingTransport();
    service = new UploadService(
      { root, clock: () => AT },
      new NotificationService(mail, transport)
    );
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('stores a clean file for a live session under the proposal directory', async () => {
    const result = await service.store(request(), {
      sessionValid: true,
      identity: { backend: 'ldap', displayName: 'Test User' },
    });

    const expectedPath = path.join(root, PROPOSAL, 'S22B-QN001_20260314_093005.xlsx');
    expect(result).toEqual({
      ok: true,
      record: {
        originalName: 'S22B-QN001.xlsx',
        proposalId: PROPOSAL,
        extension: 'xlsx',
        bytes: Buffer.from('workbook bytes'),
        destinationPath: expectedPath,
        uploadedAt: AT,
      },
    });
    await expect(fs.readFile(expectedPath, 'utf8')).resolves.toBe('workbook bytes');
  });

  it('sends one notification naming the uploader', async () => {
    await service.store(request(), {
      sessionValid: true,
      identity: { backend: 'ldap', displayName: 'Test User' },
    });

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0].subject).toBe('Queue spreadsheet for S22B-QN001 was uploaded');
    expect(transport.sent[0].text).toBe(
      'A queue spreadsheet for proposal S22B-QN001 was uploaded by ldap user Test User ' +
        'on 2026-03-14T09:30:05.000Z. Input was Excel file named S22B-QN001.xlsx. ' +
        `Output filename is ${path.join(root, PROPOSAL, 'S22B-QN001_20260314_093005.xlsx')}`
    );
  });

  it('accepts a login made in the same request', async () => {
    const result = await service.store(request(), {
      sessionValid: false,
      auth: { success: true, backend: 'database', displayName: 'Db User', attempts: [] },
    });

    expect(result.ok).toBe(true);
    expect(transport.sent[0].text).toContain('by database user Db User');
  });

  it('refuses a report with errors before looking at authentication', async () => {
    const result = await service.store(
      request({ report: { datasets: [], errorCount: 1, warningCount: 0 } }),
      { sessionValid: false, auth: failedLogin }
    );

    expect(result).toEqual({ ok: false, reason: 'validation-errors-present' });
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it('stores a file that only has warnings', async () => {
    const result = await service.store(
      request({ report: { datasets: [], errorCount: 0, warningCount: 3 } }),
      { sessionValid: true }
    );
    expect(result.ok).toBe(true);
  });

  it('refuses after a failed login', async () => {
    const result = await service.store(request(), { sessionValid: false, auth: failedLogin });
    expect(result).toEqual({ ok: false, reason: 'auth-failed' });
  });

  it('refuses without a session or login', async () => {
    const result = await service.store(request(), { sessionValid: false });

    expect(result).toEqual({ ok: false, reason: 'session-expired' });
    expect(transport.sent).toEqual([]);
  });

  it('reports a write failure', async () => {
    await fs.writeFile(path.join(root, PROPOSAL), 'not a directory', 'utf8');

    const result = await service.store(request(), { sessionValid: true });

    expect(result).toEqual({ ok: false, reason: 'storage-failed' });
    expect(transport.sent).toEqual([]);
  });

  it('keeps the stored file when the notification cannot be sent', async () => {
    const failing: MailTransport = {
      async sendMail() {
        throw new Error('smtp down');
      },
    };
    const unnotified = new UploadService(
      { root, clock: () => AT },
      new NotificationService(mail, failing)
    );

    const result = await unnotified.store(request(), { sessionValid: true });

    const expectedPath = path.join(root, PROPOSAL, 'S22B-QN001_20260314_093005.xlsx');
    expect(result.ok).toBe(true);
    await expect(fs.readFile(expectedPath, 'utf8')).resolves.toBe('workbook bytes');
  });

  it('files a lower-case proposal id under its upper-case directory', async () => {
    const result = await service.store(
      request({ proposalId: 's22b-qn001', filename: 'queue.xlsx' }),
      { sessionValid: true }
    );

    const expectedPath = path.join(root, PROPOSAL, 'S22B-QN001_queue_20260314_093005.xlsx');
    expect(result.ok && result.record.destinationPath).toBe(expectedPath);
    await expect(fs.readdir(root)).resolves.toEqual([PROPOSAL]);
    await expect(service.list('s22b-qn001')).resolves.toEqual([
      expect.objectContaining({ name: 'S22B-QN001_queue_20260314_093005.xlsx' }),
    ]);
  });

  it('uses the online sheet wording for sheet inputs', async () => {
    await service.store(
      request({ inputKind: 'sheet', inputName: 'sheet-id-1', filename: `${PROPOSAL}.xlsx` }),
      { sessionValid: true, identity: { backend: 'ldap', displayName: 'Test User' } }
    );

    expect(transport.sent[0].subject).toBe('Queue spreadsheet for S22B-QN001 was submitted');
    expect(transport.sent[0].text).toContain('Input was online sheet named sheet-id-1.');
  });

  describe('list', () => {
    it('returns an empty list for a proposal with no uploads', async () => {
      await expect(service.list(PROPOSAL)).resolves.toEqual([]);
    });

    it('lists stored files sorted by name', async () => {
      const dir = path.join(root, PROPOSAL);
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(path.join(dir, 'b.xlsx'), 'bb', 'utf8');
      await fs.writeFile(path.join(dir, 'a.xlsx'), 'a', 'utf8');
      await fs.mkdir(path.join(dir, 'nested'));

      const files = await service.list(PROPOSAL);

      expect(files.map((f) => [f.name, f.size])).toEqual([
        ['a.xlsx', 1],
        ['b.xlsx', 2],
      ]);
    });

    it('rejects an invalid proposal id', async () => {
      await expect(service.list('../x')).rejects.toBeInstanceOf(InputError);
    });
  });
});

describe('NotificationService', () => {
  it('sends nothing when mail is disabled', async () => {
    const transport = new RecordingTransport();
    const notifier = new NotificationService({ ...mail, enabled: false }, transport);
    const record = {
      originalName: 'a.xlsx',
      proposalId: PROPOSAL,
      extension: 'xlsx',
      bytes: Buffer.from(''),
      destinationPath: '/uploads/a.xlsx',
      uploadedAt: AT,
    };

    await expect(
      notifier.notify(NotificationService.noticeFor(record, 'file', 'a.xlsx', {}))
    ).resolves.toBe(false);
    expect(transport.sent).toEqual([]);
  });

  it('swallows transport failures and reports them', async () => {
    const failing: MailTransport = {
      async sendMail() {
        throw new Error('smtp down');
      },
    };
    const notifier = new NotificationService(mail, failing);
    const record = {
      originalName: 'a.xlsx',
      proposalId: PROPOSAL,
      extension: 'xlsx',
      bytes: Buffer.from(''),
      destinationPath: '/uploads/a.xlsx',
      uploadedAt: AT,
    };

    await expect(
      notifier.notify(NotificationService.noticeFor(record, 'file', 'a.xlsx', {}))
    ).resolves.toBe(false);
  });
});
