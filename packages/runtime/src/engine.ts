// Engine bootstrap
//
// Wires configuration into a ready access gateway. Callers that already hold
// repositories or a signer pass them in; everything else is built from config.

import { postgres, type TransactionalRepositoryContext } from '@arbor/repositories';
import type { EngineConfig } from './config.js';
import { ConfigError } from './errors.js';
import { AccessGateway, type AuditStore } from './gateway/index.js';
import { type Clock, type SnowflakeGenerator, createSnowflakeGenerator } from './ids/index.js';
import { type Logger, createConsoleLogger } from './logger.js';
import { type StorageSigner, createS3StorageSigner } from './storage/index.js';

export type EngineOptions = {
  config: EngineConfig;

  /** Defaults to Postgres at `config.database` */
  repos?: TransactionalRepositoryContext;

  /** Defaults to an S3 signer for `config.storage` */
  signer?: StorageSigner;

  logger?: Logger;
  auditStore?: AuditStore;

  /** Drives id minting, audit and soft-delete timestamps. Defaults to Date.now. */
  clock?: Clock;
};

export type Engine = {
  gateway: AccessGateway;
  ids: SnowflakeGenerator;
  config: EngineConfig;

  /** Release the database pool, if the engine opened one */
  close(): Promise<void>;
};

/**
 * Build an engine.
 *
 * @example
 * ```typescript
 * const engine = createEngine({ config: loadConfig() });
 * const workspace = await engine.gateway.createWorkspace(identity, 'Handbook');
 * await engine.close();
 * ```
 *
 * @throws ConfigError if no repositories are given and no database is configured
 */
export function createEngine(options: EngineOptions): Engine {
  const { config } = options;
  const logger = options.logger ?? createConsoleLogger(config.logLevel);

  const ids = createSnowflakeGenerator({
    generatorId: config.snowflake.generatorId,
    epochMs: config.snowflake.epochMs,
    clockSkewToleranceMs: config.snowflake.clockSkewToleranceMs,
    clock: options.clock,
  });

  let repos = options.repos;
  let close = async () => {};

  if (!repos) {
    if (!config.database) {
      throw new ConfigError(['DATABASE_URL: Required when no repositories are supplied']);
    }
    const { db, client } = postgres.createDatabase({
      connectionString: config.database.url,
      maxConnections: config.database.maxConnections,
    });
    repos = postgres.createTransactionalPgRepositoryContext(db);
    close = async () => {
      await client.end();
    };
  }

  const gateway = new AccessGateway({
    repos,
    ids,
    signer: options.signer ?? createS3StorageSigner(config.storage),
    auditStore: options.auditStore,
    logger,
    storageUrlTtlSeconds: config.storage.urlTtlSeconds,
    listPageSize: config.listPageSize,
    now: options.clock,
  });

  logger.info('Engine ready', {
    generatorId: config.snowflake.generatorId,
    repositories: options.repos ? 'supplied' : 'postgres',
  });

  return { gateway, ids, config, close };
}
