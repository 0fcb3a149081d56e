import { CookieOptions, Request, Response } from 'express';
import { GatewayAction, GatewayService, RequestContext } from '../services/gateway.service';
import { ClientSession, Session } from '../types/session.types';
import { InputSource } from '../types/upload.types';
import { fieldOf, flagOf, rawFieldOf } from '../utils/request.utils';
import { renderPage } from '../views/page.view';
import { logger } from '../utils/logger';

export const SESSION_COOKIES = {
  id: 'qsid',
  createdAt: 'qsession_start',
  expiresAt: 'qsession_expires',
  backend: 'qauth_backend',
  displayName: 'qdisplay_name',
} as const;

// Upload includes a check, so it wins when several flags are set
const ACTIONS: GatewayAction[] = ['upload', 'check', 'list_files'];

export interface GatewayControllerOptions {
  title: string;
  cookieSecure: boolean;
}

export function readClientSession(cookies: unknown): ClientSession {
  return {
    id: fieldOf(cookies, SESSION_COOKIES.id),
    createdAt: fieldOf(cookies, SESSION_COOKIES.createdAt),
    expiresAt: fieldOf(cookies, SESSION_COOKIES.expiresAt),
    backend: fieldOf(cookies, SESSION_COOKIES.backend),
    displayName: fieldOf(cookies, SESSION_COOKIES.displayName),
  };
}

function uploadedFiles(req: Request): Express.Multer.File[] {
  if (Array.isArray(req.files)) {
    return req.files;
  }
  return req.files ? Object.values(req.files).flat() : [];
}

/**
 * Translate an HTTP request into the gateway's request context
 */
export function buildContext(req: Request): RequestContext {
  const fields: unknown = req.method === 'GET' ? req.query : req.body;
  const cookies: unknown = req.cookies;

  const inputs: InputSource[] = uploadedFiles(req)
    .filter((f) => f.originalname)
    .map((f): InputSource => ({ kind: 'file', filename: f.originalname, bytes: f.buffer }));

  const sheetId = fieldOf(fields, 'sheet_id');
  if (inputs.length === 0 && sheetId) {
    inputs.push({ kind: 'sheet', sheetId });
  }

  const username = fieldOf(fields, 'username');
  // Passwords may start or end with spaces
  const password = rawFieldOf(fields, 'password');

  return {
    clientAddress: req.ip ?? null,
    session: readClientSession(cookies),
    login: flagOf(fields, 'login'),
    logout: flagOf(fields, 'logout'),
    credentials: username && password ? { username, password } : undefined,
    action: ACTIONS.find((a) => flagOf(fields, a)) ?? null,
    proposalId: fieldOf(fields, 'proposal'),
    inputs,
  };
}

/**
 * Gateway Controller
 * Runs the request pipeline and renders the resulting page
 */
export class GatewayController {
  private readonly gateway: GatewayService;
  private readonly options: GatewayControllerOptions;

  constructor(gateway: GatewayService, options: GatewayControllerOptions) {
    this.gateway = gateway;
    this.options = options;
  }

  /**
   * GET / and POST /
   */
  async handle(req: Request, res: Response): Promise<void> {
    const startTime = Date.now();
    const outcome = await this.gateway.handle(buildContext(req));

    if (outcome.loggedOut && !outcome.session) {
      this.clearSessionCookies(res);
    }
    if (outcome.sessionCreated && outcome.session) {
      this.setSessionCookies(res, outcome.session);
    }

    logger.info('Gateway request completed', {
      action: outcome.action,
      proposalId: outcome.proposalId,
      files: outcome.results.length,
      loggedIn: outcome.session !== null,
      duration: `${Date.now() - startTime}ms`,
    });

    res.status(200).type('html').send(renderPage(outcome, this.options.title));
  }

  private cookieOptions(session?: Session): CookieOptions {
    const options: CookieOptions = {
      httpOnly: true,
      sameSite: 'lax',
      secure: this.options.cookieSecure,
    };
    // clearCookie supplies its own expiry and must not see an undefined one
    if (session) {
      options.expires = new Date(session.expiresAt);
    }
    return options;
  }

  private setSessionCookies(res: Response, session: Session): void {
    const options = this.cookieOptions(session);
    res.cookie(SESSION_COOKIES.id, session.id, options);
    res.cookie(SESSION_COOKIES.createdAt, new Date(session.createdAt).toISOString(), options);
    res.cookie(SESSION_COOKIES.expiresAt, new Date(session.expiresAt).toISOString(), options);
    res.cookie(SESSION_COOKIES.backend, session.backend, options);
    res.cookie(SESSION_COOKIES.displayName, session.displayName, options);
  }

  private clearSessionCookies(res: Response): void {
    const options = this.cookieOptions();
    for (const name of Object.values(SESSION_COOKIES)) {
      res.clearCookie(name, options);
    }
  }
}

