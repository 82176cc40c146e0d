import Fastify, { type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { getEnv } from './lib/env.js';
import { createDatabase } from './lib/db.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { scrubRoutes } from './domains/scrub/scrub.routes.js';
import { attestationRoutes } from './domains/attestation/attestation.routes.js';
import { createAttestationRepository } from './domains/attestation/attestation.repository.js';
import { createPdfAttestationRenderer } from './domains/attestation/attestation.document.js';
import { createZipAttestationArchiver } from './domains/attestation/attestation.archive.js';
import {
  recordFlaggedClaims,
  type AttestationServiceDeps,
} from './domains/attestation/attestation.service.js';

// ---------------------------------------------------------------------------
// Application dependencies
// ---------------------------------------------------------------------------

export interface AppDeps {
  attestation: AttestationServiceDeps;
  filingWindowDays: number;
  clock?: () => Date;
}

export interface BuildAppOptions {
  deps: AppDeps;
  logger?: FastifyServerOptions['logger'];
  corsOrigin?: string;
  rateLimitMax?: number;
  maxUploadBytes?: number;
}

export function createAppDeps(
  db: NodePgDatabase,
  filingWindowDays: number,
): AppDeps {
  return {
    attestation: {
      repo: createAttestationRepository(db),
      renderer: createPdfAttestationRenderer(),
      archiver: createZipAttestationArchiver(),
    },
    filingWindowDays,
  };
}

// ---------------------------------------------------------------------------
// App builder
// ---------------------------------------------------------------------------

export function buildApp(opts: BuildAppOptions) {
  const { deps } = opts;

  const app = Fastify({
    logger: opts.logger ?? { level: 'info' },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  app.register(helmet);
  app.register(cors, {
    origin: opts.corsOrigin ?? 'http://localhost:3000',
  });
  app.register(errorHandlerPluginFp);
  app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });

  // Domain routes
  app.register(scrubRoutes, {
    deps: {
      serviceDeps: {
        recorder: {
          recordFlaggedClaims: (flagged) => recordFlaggedClaims(deps.attestation, flagged),
        },
        filingWindowDays: deps.filingWindowDays,
        clock: deps.clock,
      },
      maxUploadBytes: opts.maxUploadBytes ?? 10 * 1024 * 1024,
    },
  });
  app.register(attestationRoutes, {
    deps: { serviceDeps: { clock: deps.clock, ...deps.attestation } },
  });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  return app;
}

// ---------------------------------------------------------------------------
// Start server when run directly
// ---------------------------------------------------------------------------

async function start() {
  const env = getEnv();
  const { db, pool } = createDatabase(env.DATABASE_URL);

  const app = buildApp({
    deps: createAppDeps(db, env.FILING_WINDOW_DAYS),
    logger: { level: env.LOG_LEVEL },
    corsOrigin: env.CORS_ORIGIN,
    rateLimitMax: env.RATE_LIMIT_MAX,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
  });

  app.addHook('onClose', async () => {
    await pool.end();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error(err);
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: env.API_PORT, host: env.API_HOST });
}

if (process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
