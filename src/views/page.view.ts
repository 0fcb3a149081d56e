import type { FileOutcome, GatewayOutcome } from '../services/gateway.service';
import type { StoredFile, UploadRejection } from '../types/upload.types';
import { escapeHtml } from '../utils/html.utils';

const STYLE = `
body { font-family: sans-serif; margin: 2em; }
.error { color: #b00020; }
.warning { color: #8a6d00; }
table.excerpt { border-collapse: collapse; margin: 0.5em 0 1em; }
table.excerpt td, table.excerpt th { border: 1px solid #999; padding: 2px 6px; }
td.error { background: #fde0e0; }
td.warning { background: #fff4cc; }
`;

const UPLOAD_REJECTIONS: Record<UploadRejection, string> = {
  'validation-errors-present': 'File was not uploaded because the check found errors.',
  'auth-failed': 'File was not uploaded because login failed.',
  'session-expired': 'File was not uploaded: please log in first (your session may have expired).',
  'storage-failed': 'File was not uploaded because it could not be saved. Please try again later.',
};

function layout(title: string, body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html><head><meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${STYLE}</style>`,
    '</head><body>',
    `<h1>${escapeHtml(title)}</h1>`,
    body,
    '</body></html>',
  ].join('\n');
}

function authSection(outcome: GatewayOutcome): string {
  if (outcome.session) {
    return (
      `<p>Logged in as ${escapeHtml(outcome.session.displayName)} ` +
      `(${escapeHtml(outcome.session.backend)}) until ` +
      `${new Date(outcome.session.expiresAt).toISOString()}</p>`
    );
  }

  const parts: string[] = [];
  if (outcome.loggedOut) {
    parts.push('<p>You have been logged out.</p>');
  }
  if (outcome.auth && !outcome.auth.success) {
    parts.push(
      `<p class="error">Login failed: ${escapeHtml(outcome.auth.reason ?? 'unknown reason')}</p>`
    );
  }
  parts.push('<p>Not logged in.</p>');
  return parts.join('\n');
}

function formSection(outcome: GatewayOutcome): string {
  const proposal = escapeHtml(outcome.proposalId ?? '');
  const credentials = outcome.session
    ? '<button type="submit" name="logout" value="1">Log out</button>'
    : [
        '<label>Username <input name="username" autocomplete="username"></label>',
        '<label>Password <input name="password" type="password" autocomplete="current-password"></label>',
        '<button type="submit" name="login" value="1">Log in</button>',
      ].join('\n');

  return [
    '<form method="post" enctype="multipart/form-data">',
    `<label>Proposal <input name="proposal" value="${proposal}"></label>`,
    '<label>Queue file <input type="file" name="file" multiple></label>',
    '<label>or online sheet id <input name="sheet_id"></label>',
    credentials,
    '<button type="submit" name="check" value="1">Check</button>',
    '<button type="submit" name="upload" value="1">Upload</button>',
    '<button type="submit" name="list_files" value="1">List files</button>',
    '</form>',
  ].join('\n');
}

function fileListSection(proposalId: string, files: StoredFile[]): string {
  if (files.length === 0) {
    return `<p>No files have been uploaded for ${escapeHtml(proposalId)}.</p>`;
  }

  const rows = files
    .map(
      (f) =>
        `<tr><td>${escapeHtml(f.name)}</td><td>${f.size}</td>` +
        `<td>${f.modifiedAt.toISOString()}</td></tr>`
    )
    .join('\n');

  return (
    `<h2>Files for ${escapeHtml(proposalId)}</h2>\n` +
    `<table class="excerpt"><tr><th>Name</th><th>Size</th><th>Modified</th></tr>\n${rows}\n</table>`
  );
}

function resultSection(result: FileOutcome): string {
  const parts = [`<h2>${escapeHtml(result.inputName)}</h2>`];

  for (const message of result.content.messages) {
    parts.push(`<p class="error">${escapeHtml(message)}</p>`);
  }

  if (result.rendered) {
    parts.push(`<p>${escapeHtml(result.rendered.summary)}</p>`);
    if (result.rendered.errors) {
      parts.push('<h3 class="error">Errors</h3>', result.rendered.errors);
    }
    if (result.rendered.warnings) {
      parts.push('<h3 class="warning">Warnings</h3>', result.rendered.warnings);
    }
  }

  if (result.upload) {
    parts.push(
      result.upload.ok
        ? `<p>File ${escapeHtml(result.inputName)} uploaded as ` +
            `${escapeHtml(result.upload.record.destinationPath)}</p>`
        : `<p class="error">${UPLOAD_REJECTIONS[result.upload.reason]}</p>`
    );
  }

  return parts.join('\n');
}

export function renderPage(outcome: GatewayOutcome, title: string): string {
  const sections = [authSection(outcome), formSection(outcome)];

  if (outcome.files && outcome.proposalId) {
    sections.push(fileListSection(outcome.proposalId, outcome.files));
  }
  for (const result of outcome.results) {
    sections.push(resultSection(result));
  }

  return layout(title, sections.join('\n'));
}

export function renderErrorPage(statusCode: number, message: string, stack?: string): string {
  const body = [`<p class="error">${escapeHtml(message)}</p>`];
  if (stack) {
    body.push(`<pre>${escapeHtml(stack)}</pre>`);
  }
  return layout(`Error ${statusCode}`, body.join('\n'));
}
