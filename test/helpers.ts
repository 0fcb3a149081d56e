import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import { loadConfig } from '../src/config/config';
import { SignatureDetector } from '../src/services/content.service';
import { Queryable } from '../src/services/user.service';
import { BackendName, BackendResult, CredentialBackend } from '../src/types/auth.types';
import { AppConfig } from '../src/types/config.types';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'qfile-gateway-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(root: string): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    SESSION_DIR: path.join(root, 'sessions'),
    UPLOAD_ROOT: path.join(root, 'uploads'),
    SHEET_EXPORT_URL: 'https://sheets.example.test/{id}/export',
    MAIL_ENABLED: 'false',
    LOG_FILE: '',
  });
}

/**
 * Credential backend with a scripted answer
 */
export class FakeBackend implements CredentialBackend {
  readonly name: BackendName;
  readonly calls: string[] = [];
  readonly secrets: string[] = [];
  private result: BackendResult;

  constructor(name: BackendName, result: BackendResult) {
    this.name = name;
    this.result = result;
  }

  async verify(username: string, secret: string): Promise<BackendResult> {
    this.calls.push(username);
    this.secrets.push(secret);
    return this.result;
  }
}

export const unusedDb: Queryable = {
  async query() {
    throw new Error('database not available in tests');
  },
};

export function fixedDetector(signature: string | undefined): SignatureDetector {
  return {
    async detect() {
      return signature;
    },
  };
}

export function buildWorkbook(sheets: Record<string, unknown[][]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  const bytes: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return bytes;
}

/**
 * A queue workbook that passes every check for the given proposal
 */
export function cleanSheets(proposalId: string): Record<string, unknown[][]> {
  return {
    proposal: [
      ['Prop ID', 'Ph1 Seeing', 'Ph1 Transparency', 'Ph1 Moon', 'Allocated Time'],
      [proposalId, 0.8, 0.7, 'dark', 5],
    ],
    telcfg: [
      ['Code', 'Foci', 'Dome'],
      ['t1', 'P_OPT2', 'open'],
    ],
    envcfg: [
      ['Code', 'Seeing', 'Moon', 'Moon Sep', 'Transparency'],
      ['e1', 1.0, 'dark', 40, 0.7],
    ],
    targets: [
      ['Code', 'Target Name', 'RA', 'DEC', 'Equinox'],
      ['tg1', 'M31', '00:42:44.3', '+41:16:09', 'J2000'],
    ],
    inscfg: [
      ['Code', 'Instrument', 'Mode', 'Filter', 'Exp Time', 'Num Exp', 'Dither', 'Guiding', 'PA', 'Offset RA', 'Offset DEC'],
      ['i1', 'HSC', 'imaging', 'r', 300, 5, '5', 'Y', 0, 0, 0],
    ],
    ob: [
      ['Code', 'tgtcfg', 'inscfg', 'telcfg', 'envcfg', 'Priority'],
      ['ob1', 'tg1', 'i1', 't1', 'e1', 1],
    ],
  };
}
