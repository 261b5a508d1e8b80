import cookie from '@fastify/cookie';
import Fastify, { type FastifyBaseLogger, type FastifyReply } from 'fastify';
import { z } from 'zod';
import { loadConfig, type AppConfig } from './config';
import { provisionCookieKey } from './cookieKeyPolicy';
import { AppError, AuthenticationError } from './errors';
import { SessionContext } from './session';
import { needsTranslation } from './sourceScript';
import { AuthService } from './services/authService';
import {
  HttpIdentityVerifier,
  LocalIdentityVerifier,
  type IdentityVerifier
} from './services/identityVerifier';
import { NoteService } from './services/noteService';
import { PasswordService } from './services/passwordService';
import { REAUTH_COOKIE_NAME, ReauthCookieManager, type IssuedCookie } from './services/reauthCookie';
import { TokenService } from './services/tokenService';
import {
  createTranslationProvider,
  type TranslationProvider
} from './services/translationProvider';
import { TranslationService } from './services/translationService';
import { createStore, type DataStore, type StoreKind } from './store';
import type { IdentitySummary, Note, User, ViewState } from './types';
import { toPublicUser } from './utils';

export interface BuildServerOptions {
  config?: Readonly<AppConfig>;
  storage?: StoreKind;
  databaseUrl?: string;
  store?: DataStore;
  cookieKey?: string;
  logger?: FastifyBaseLogger;
  translationProvider?: TranslationProvider;
  identityVerifier?: IdentityVerifier;
}

function bearerToken(auth?: string): string | undefined {
  if (!auth) {
    return undefined;
  }
  const [type, token] = auth.split(' ');
  if (type?.toLowerCase() !== 'bearer' || !token) {
    return undefined;
  }
  return token;
}

const noteIdParams = z.object({ id: z.coerce.number().int().positive() });

const viewStateBody = z.object({
  open_note_id: z.number().int().positive().nullable().optional(),
  create_note_in_progress: z.boolean().optional()
});

const booleanQuery = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

function fromWireViewState(body: z.infer<typeof viewStateBody>): ViewState {
  const viewState: ViewState = {};
  if (typeof body.open_note_id === 'number') {
    viewState.openNoteId = body.open_note_id;
  }
  if (body.create_note_in_progress !== undefined) {
    viewState.createNoteInProgress = body.create_note_in_progress;
  }
  return viewState;
}

function toWireViewState(viewState: ViewState) {
  return {
    ...(viewState.openNoteId !== undefined ? { open_note_id: viewState.openNoteId } : {}),
    ...(viewState.createNoteInProgress ? { create_note_in_progress: true } : {})
  };
}

function summarize(user: User): IdentitySummary {
  return { id: user.id, username: user.username, email: user.email };
}

function toNoteResponse(note: Note) {
  return {
    id: note.id,
    title: note.title,
    content: note.content,
    is_translated: note.isTranslated,
    original_content: note.originalContent,
    owner_id: note.ownerId,
    created_at: note.createdAt,
    updated_at: note.updatedAt,
    translatable: !note.isTranslated && needsTranslation(note.content)
  };
}

function sessionBody(session: SessionContext) {
  return {
    authenticated: session.authenticated,
    access_token: session.accessToken,
    token_type: 'bearer',
    user: session.identity,
    view_state: toWireViewState(session.snapshotViewState()),
    show_login: session.showLogin
  };
}

export function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig(process.env);
  const storage = options.storage ?? config.storage.kind;
  const databaseUrl = options.databaseUrl ?? config.storage.databaseUrl;

  const app = Fastify({ logger: options.logger ?? false });
  const cookieKey = options.cookieKey ?? provisionCookieKey(config, app.log).key;

  const store = options.store ?? createStore({ kind: storage, databaseUrl });
  const tokenService = new TokenService({
    secret: config.auth.signingKey,
    algorithm: config.auth.algorithm,
    ttlMinutes: config.auth.accessTokenTtlMinutes
  });
  const authService = new AuthService(
    store,
    new PasswordService(config.auth.passwordHashCost),
    tokenService
  );
  const noteService = new NoteService(store);
  const translationService = new TranslationService(
    store,
    noteService,
    options.translationProvider ?? createTranslationProvider(config),
    app.log
  );
  const identityVerifier =
    options.identityVerifier ??
    (config.identityCheck.url
      ? new HttpIdentityVerifier(config.identityCheck.url, config.identityCheck.timeoutMs)
      : new LocalIdentityVerifier(authService, config.identityCheck.timeoutMs));
  const cookies = new ReauthCookieManager(
    { key: cookieKey, algorithm: config.auth.algorithm, ttlDays: config.cookie.ttlDays },
    identityVerifier,
    app.log
  );

  void app.register(cookie);

  const startedAt = Date.now();
  let storeReady = false;

  app.addHook('onReady', async () => {
    await store.init();
    storeReady = true;
  });

  app.addHook('onClose', async () => {
    await store.close();
  });

  const requireUser = async (request: {
    headers: Record<string, string | string[] | undefined>;
  }) => {
    const token = bearerToken(String(request.headers.authorization ?? ''));
    return authService.authenticate(token);
  };

  const setReauthCookie = (reply: FastifyReply, issued: IssuedCookie) => {
    reply.setCookie(REAUTH_COOKIE_NAME, issued.value, {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: config.cookie.secure,
      expires: issued.expiresAt
    });
  };

  const clearReauthCookie = (reply: FastifyReply) => {
    reply.clearCookie(REAUTH_COOKIE_NAME, { path: '/' });
  };

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error instanceof AuthenticationError) {
        reply.header('www-authenticate', 'Bearer');
      }
      if (error.status >= 500) {
        request.log.error({ err: error }, error.message);
      }
      reply.status(error.status).send({
        code: error.code,
        message: error.message,
        details: error.details ?? null
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: 'Invalid request',
        details: { issues: error.issues }
      });
      return;
    }

    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        code: error.statusCode * 100,
        message: error.message,
        details: null
      });
      return;
    }

    request.log.error({ err: error }, 'unhandled error');
    reply.status(500).send({
      code: 50000,
      message: 'Internal server error'
    });
  });

  app.get('/healthz', async () => ({
    code: 0,
    data: { status: 'ok', uptime_sec: Math.floor((Date.now() - startedAt) / 1000) }
  }));

  app.get('/readyz', async (_request, reply) => {
    if (!storeReady) {
      reply.status(503);
      return { code: 50300, message: 'Store not ready', details: null };
    }
    return { code: 0, data: { status: 'ready' } };
  });

  app.post('/auth/register', async (request, reply) => {
    const body = z
      .object({
        username: z.string().min(3).max(50),
        email: z.string().email().max(100),
        password: z.string().min(1)
      })
      .parse(request.body);
    const user = await authService.register(body);
    reply.status(201);
    return toPublicUser(user);
  });

  app.post('/auth/login', async (request) => {
    const body = z
      .object({
        username: z.string().min(1),
        password: z.string().min(1)
      })
      .parse(request.body);
    const result = await authService.login(body.username, body.password);
    return { access_token: result.accessToken, token_type: 'bearer' };
  });

  app.get('/auth/me', async (request) => {
    const user = await requireUser(request);
    return toPublicUser(user);
  });

  app.post('/auth/session', async (request, reply) => {
    const body = z
      .object({
        username: z.string().min(1),
        password: z.string().min(1),
        view_state: viewStateBody.optional()
      })
      .parse(request.body);
    const result = await authService.login(body.username, body.password);

    const session = new SessionContext();
    session.signIn(result.accessToken, summarize(result.user));
    if (body.view_state) {
      session.restoreViewState(fromWireViewState(body.view_state));
    }
    setReauthCookie(
      reply,
      cookies.issue(result.accessToken, summarize(result.user), session.snapshotViewState())
    );
    request.log.info({ userId: result.user.id }, 'web session started');
    return sessionBody(session);
  });

  app.get('/auth/session', async (request, reply) => {
    const session = new SessionContext();
    const result = await cookies.validate(request.cookies[REAUTH_COOKIE_NAME], session);
    if (!result.authenticated) {
      if (result.deleteCookie) {
        clearReauthCookie(reply);
      }
      return { authenticated: false, reason: result.reason, show_login: true };
    }
    setReauthCookie(reply, result.refreshed);
    return sessionBody(session);
  });

  app.put('/auth/session/view-state', async (request, reply) => {
    const body = viewStateBody.parse(request.body);
    const session = new SessionContext();
    const result = await cookies.validate(request.cookies[REAUTH_COOKIE_NAME], session);
    if (!result.authenticated) {
      if (result.deleteCookie) {
        clearReauthCookie(reply);
      }
      throw new AuthenticationError('InvalidToken', 'Not authenticated');
    }
    session.replaceViewState(fromWireViewState(body));
    setReauthCookie(
      reply,
      cookies.issue(result.token, result.identity, session.snapshotViewState())
    );
    return sessionBody(session);
  });

  app.delete('/auth/session', async (_request, reply) => {
    clearReauthCookie(reply);
    return reply.status(204).send();
  });

  app.get('/notes', async (request) => {
    const user = await requireUser(request);
    const query = z
      .object({
        skip: z.coerce.number().int().min(0).default(0),
        limit: z.coerce.number().int().min(1).max(100).default(100)
      })
      .parse(request.query);
    const notes = await noteService.list(user.id, { skip: query.skip, limit: query.limit });
    return notes.map(toNoteResponse);
  });

  app.post('/notes', async (request, reply) => {
    const user = await requireUser(request);
    const body = z
      .object({
        title: z.string().min(1).max(100),
        content: z.string().min(1)
      })
      .parse(request.body);
    const note = await noteService.create(user.id, body);
    reply.status(201);
    return toNoteResponse(note);
  });

  app.get('/notes/:id', async (request) => {
    const user = await requireUser(request);
    const params = noteIdParams.parse(request.params);
    return toNoteResponse(await noteService.get(user.id, params.id));
  });

  app.put('/notes/:id', async (request) => {
    const user = await requireUser(request);
    const params = noteIdParams.parse(request.params);
    const body = z
      .object({
        title: z.string().min(1).max(100).optional(),
        content: z.string().min(1).optional()
      })
      .parse(request.body);
    return toNoteResponse(await noteService.update(user.id, params.id, body));
  });

  app.delete('/notes/:id', async (request, reply) => {
    const user = await requireUser(request);
    const params = noteIdParams.parse(request.params);
    await noteService.delete(user.id, params.id);
    return reply.status(204).send();
  });

  app.post('/notes/:id/translate', async (request) => {
    const user = await requireUser(request);
    const params = noteIdParams.parse(request.params);
    const query = z.object({ preview: booleanQuery }).parse(request.query);

    if (query.preview) {
      const preview = await translationService.translatePreview(user.id, params.id);
      return {
        translated_text: preview.translatedText,
        original_text: preview.originalText,
        note: toNoteResponse(preview.note)
      };
    }
    const note = await translationService.translateAndPersist(user.id, params.id);
    return toNoteResponse(note);
  });

  return app;
}
