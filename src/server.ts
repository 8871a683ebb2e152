import Fastify from 'fastify';
import { z } from 'zod';
import { PinoAuditLogger } from './audit.js';
import { createAuthHook, requireIdentity } from './auth-hook.js';
import { AppConfig, loadConfig } from './config.js';
import { ConfigError, IssuanceError } from './errors.js';
import { IdentityDirectory, StaticIdentityDirectory } from './identity.js';
import { TokenIssuer } from './issuer.js';
import { ConsumptionLimiter } from './limiter.js';
import { createLogger, loggerOptions } from './logging.js';
import { createSigningKey } from './signing.js';
import { createTokenStore } from './stores/index.js';
import { TokenStore } from './token-store.js';
import { TokenVerifier } from './verifier.js';

export const AuthenticationRequestSchema = z.object({
  user: z.object({
    name: z.string().min(1),
    is_admin: z.boolean().optional(),
  }),
  secret: z.object({
    password: z.string().min(1),
  }),
});

export interface ServerOptions {
  config: AppConfig;
  store: TokenStore;
  identities?: IdentityDirectory;
  nowProvider?: () => number; // unix seconds
  logger?: boolean;
}

export function buildServer(options: ServerOptions) {
  const { config, store } = options;
  const app = Fastify({ logger: options.logger === false ? false : loggerOptions(config.LOG_LEVEL) });

  const signingKey = createSigningKey(config.JWT_SECRET, config.JWT_ALGORITHM);
  const auditLogger = new PinoAuditLogger(app.log);
  const identities =
    options.identities ??
    new StaticIdentityDirectory([
      {
        userId: config.ADMIN_USERNAME,
        username: config.ADMIN_USERNAME,
        password: config.ADMIN_PASSWORD,
        roles: ['admin'],
      },
    ]);

  const issuer = new TokenIssuer({
    store,
    signingKey,
    issuer: config.ISSUER_URL,
    ttlSeconds: config.TOKEN_TTL_SECONDS,
    maxUses: config.TOKEN_MAX_USES,
    storeTimeoutMs: config.STORE_TIMEOUT_MS,
    auditLogger,
    nowProvider: options.nowProvider,
  });
  const verifier = new TokenVerifier({
    signingKey,
    issuer: config.ISSUER_URL,
    limiter: new ConsumptionLimiter({
      store,
      timeoutMs: config.STORE_TIMEOUT_MS,
      clockToleranceSeconds: config.CLOCK_TOLERANCE_SECONDS,
      nowProvider: options.nowProvider,
    }),
    auditLogger,
    clockToleranceSeconds: config.CLOCK_TOLERANCE_SECONDS,
    nowProvider: options.nowProvider,
  });
  const authenticate = createAuthHook(verifier);

  app.get('/health', async () => ({ status: 'ok' }));

  app.route({
    method: ['PUT', 'POST'],
    url: '/authenticate',
    handler: async (request, reply) => {
      const parsed = AuthenticationRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'invalid_request',
          details: parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        });
      }

      const subject = await identities.authenticate({
        username: parsed.data.user.name,
        password: parsed.data.secret.password,
      });
      if (!subject) {
        return reply.status(401).send({ error: 'invalid_credentials' });
      }

      try {
        const issued = await issuer.issue(subject);
        return reply
          .status(200)
          .type('application/json')
          .send(JSON.stringify(`bearer ${issued.token}`));
      } catch (error) {
        if (error instanceof IssuanceError) {
          request.log.error({ err: error }, 'failed_to_issue_token');
          return reply.status(500).send({ error: 'server_error' });
        }
        throw error;
      }
    },
  });

  app.delete('/authenticate', { preHandler: authenticate }, async (request, reply) => {
    const identity = requireIdentity(request);
    await issuer.revoke(identity.tokenId);
    return reply.status(204).send();
  });

  app.get('/me', { preHandler: authenticate }, async (request) => {
    const identity = requireIdentity(request);
    return {
      user_id: identity.userId,
      username: identity.username,
      roles: identity.roles,
      groups: identity.groups,
      remaining_uses: identity.remainingUses,
      expires_at: identity.expiresAt,
    };
  });

  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger('fatal').fatal({ issues: err.issues }, err.message);
      process.exit(1);
    }
    throw err;
  }

  const { store, close } = createTokenStore(config);
  const app = buildServer({ config, store });
  app.addHook('onClose', async () => {
    await close();
  });

  if (config.secretSource === 'generated') {
    app.log.warn('JWT_SECRET not set; using a generated per-process secret, tokens will not survive a restart');
  }

  app
    .listen({ port: config.PORT, host: config.HOST })
    .then(() => {
      app.log.info(`token service listening on ${config.PORT}`);
    })
    .catch((err) => {
      app.log.error(err);
      process.exit(1);
    });
}
