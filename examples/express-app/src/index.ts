import express from 'express';
import dotenv from 'dotenv';
import type { IncomingMessage } from 'http';
import { v4 as uuidv4 } from 'uuid';
import {
  AuthorizationServer,
  AuthorizeStage,
  CachedResponse,
  customStage,
  authorizationResponse,
  tokenResponse,
  errorResponse,
  errorPage,
  decodeErrorResponse,
  escapeHtml,
  isAbsoluteURI,
  trimParam,
  serializeAuthorizeRequest,
  deserializeAuthorizeRequest,
} from '../../../src/index';
import type {
  AuthorizeDecoder,
  AuthorizeRequest,
  DecodeResult,
  SerializedAuthorizeRequest,
  TokenFactory,
  TokenStorage,
} from '../../../src/index';

// Load environment variables
dotenv.config();

const app = express();
const PORT = Number(process.env.PORT || 3000);

// In-memory stores (use Redis/persistent store in production)
// WARNING: pending requests and issued tokens are lost on restart!
if (process.env.NODE_ENV === 'production') {
  console.error(
    'ERROR: In-memory stores are not suitable for production!\n' +
    '   Set NODE_ENV=development to suppress this error during local testing.'
  );
  process.exit(1);
}

// Requests waiting for login or consent, keyed by an opaque id
const pending: Map<string, SerializedAuthorizeRequest> = new Map();
const authorizationCodes: Map<string, AuthorizeRequest> = new Map();
const accessTokens: Map<string, AuthorizeRequest> = new Map();

const Denied = customStage(100);

const tokenFactory: TokenFactory = {
  createAuthorizationCode: async () => uuidv4(),
  createAccessToken: async () => uuidv4(),
};

const tokenStorage: TokenStorage = {
  saveAuthorizationCode: async (code, ar) => {
    authorizationCodes.set(code, ar);
  },
  saveAccessToken: async (token, ar) => {
    accessTokens.set(token, ar);
  },
};

function queryOf(req?: IncomingMessage): URLSearchParams {
  const url = req?.url ?? '';
  const index = url.indexOf('?');
  return new URLSearchParams(index === -1 ? '' : url.slice(index + 1));
}

/**
 * Resumes a pending request: the login and consent forms send back the
 * pending id, and the submitted fields pick the next stage.
 */
class ResumingDecoder implements AuthorizeDecoder {
  constructor(private defaults: AuthorizeDecoder) {}

  decodeAuthorize(req: IncomingMessage): DecodeResult {
    const params = queryOf(req);
    const saved = pending.get(trimParam(params.get('pending')));
    if (!saved) {
      return this.defaults.decodeAuthorize(req);
    }

    const request = deserializeAuthorizeRequest(saved);
    request.httpRequest = req;
    if (params.has('username')) {
      request.stage = AuthorizeStage.ToAuthenticate;
    } else if (params.get('decision') === 'allow') {
      request.stage = AuthorizeStage.ToAuthorize;
    } else if (params.get('decision') === 'deny') {
      request.stage = Denied;
    }
    return { request };
  }
}

function page(title: string, content: string): CachedResponse {
  return new CachedResponse({
    status: 200,
    headers: { 'Content-Type': ['text/html; charset=utf-8'], 'Cache-Control': ['no-store'] },
    body: `<!DOCTYPE html>
<html>
<head>
  <title>${escapeHtml(title)}</title>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  ${content}
</body>
</html>`,
  });
}

function loginPage(id: string, ar: AuthorizeRequest): CachedResponse {
  return page(
    'Sign in',
    `<p><code>${escapeHtml(ar.clientId)}</code> wants to access your account.</p>
  <form method="get" action="/authorize">
    <input type="hidden" name="pending" value="${escapeHtml(id)}">
    <input name="username" placeholder="Username" autofocus>
    <button type="submit">Continue</button>
  </form>`
  );
}

function consentPage(id: string, ar: AuthorizeRequest): CachedResponse {
  return page(
    'Authorize access',
    `<p>Signed in as <strong>${escapeHtml(ar.userId)}</strong>.</p>
  <p><code>${escapeHtml(ar.clientId)}</code> requests: ${escapeHtml(ar.scope || '(no scope)')}</p>
  <form method="get" action="/authorize">
    <input type="hidden" name="pending" value="${escapeHtml(id)}">
    <button name="decision" value="allow">Allow</button>
    <button name="decision" value="deny">Deny</button>
  </form>`
  );
}

const server = AuthorizationServer.init(
  {
    allowedResponseTypes: (process.env.ALLOWED_RESPONSE_TYPES || 'code,token').split(','),
    logging: { level: process.env.LOG_LEVEL || 'info', format: 'pretty' },
    metrics: { enabled: true },
  },
  { tokenFactory, tokenStorage }
);

server
  .useDecoder(new ResumingDecoder(server.defaultDecoder))
  .handle(AuthorizeStage.Initialize, (ctx, ar, decodeError) => {
    if (decodeError) {
      return decodeErrorResponse(ar, decodeError);
    }
    if (!isAbsoluteURI(ar.redirectUri)) {
      return errorPage(400, 'invalid_request', 'redirect_uri must be an absolute URI');
    }

    const id = uuidv4();
    pending.set(id, serializeAuthorizeRequest(ar));
    ctx.logger.debug('Authorization request pending login', { requestId: ctx.requestId, clientId: ar.clientId });
    return loginPage(id, ar);
  })
  .handle(AuthorizeStage.ToAuthenticate, (ctx, ar) => {
    const id = trimParam(queryOf(ar.httpRequest).get('pending'));
    const username = trimParam(queryOf(ar.httpRequest).get('username'));
    if (!username) {
      return loginPage(id, ar);
    }

    ar.userId = username;
    pending.set(id, serializeAuthorizeRequest(ar));
    return consentPage(id, ar);
  })
  .handle(AuthorizeStage.ToAuthorize, async (ctx, ar) => {
    pending.delete(trimParam(queryOf(ar.httpRequest).get('pending')));
    if (!ar.userId) {
      return errorResponse(ar, 'access_denied', 'The user is not signed in');
    }

    if (ar.responseType === 'token') {
      const accessToken = await ctx.services.tokenFactory.createAccessToken(ar);
      await ctx.services.tokenStorage.saveAccessToken(accessToken, ar);
      return tokenResponse(ar, { accessToken, tokenType: 'Bearer', expiresIn: 3600, scope: ar.scope || undefined });
    }

    const code = await ctx.services.tokenFactory.createAuthorizationCode(ar);
    await ctx.services.tokenStorage.saveAuthorizationCode(code, ar);
    ctx.logger.info('Authorization code issued', { requestId: ctx.requestId, clientId: ar.clientId });
    return authorizationResponse(ar, code);
  })
  .handle(Denied, (ctx, ar) => {
    pending.delete(trimParam(queryOf(ar.httpRequest).get('pending')));
    return errorResponse(ar, 'access_denied', 'The user denied the request');
  });

const endpoint = server.endpoint();

app.get('/authorize', (req, res, next) => {
  endpoint(req, res).catch(next);
});

app.get('/', (req, res) => {
  const redirectUri = encodeURIComponent(`http://localhost:${PORT}/callback`);
  res.type('html').send(
    `<a href="/authorize?response_type=code&client_id=example-client&redirect_uri=${redirectUri}&state=demo">Start the code flow</a>`
  );
});

// Stand-in for the client's redirection endpoint
app.get('/callback', (req, res) => {
  res.json({ query: req.query });
});

// Metrics endpoint
app.get('/metrics', (req, res, next) => {
  server.metrics
    .getMetrics()
    .then((body) => {
      res.type('text/plain').send(body);
    })
    .catch(next);
});

// Health check
app.get('/health', (req, res) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    pendingRequests: pending.size,
    issuedCodes: authorizationCodes.size,
    issuedTokens: accessTokens.size,
  });
});

app.listen(PORT, () => {
  server.logger.info(`Example authorization server listening on http://localhost:${PORT}`);
});
