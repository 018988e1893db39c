import { buildApp } from './app.js';
import { LogisticsSubAgent, MedicalSubAgent } from './agents/index.js';
import { TriageCommander } from './commander/index.js';
import { loadConfig } from './config.js';
import { AuditLog } from './crypto/index.js';
import { InferenceRouter, LlmReasoner } from './inference/index.js';
import { createLogger } from './logger.js';
import { HttpPolicyOracle } from './oracle/client.js';
import { loadPolicy, withBaseDirectory } from './policy/loader.js';
import { Shield } from './shield/index.js';

const logger = createLogger('server');

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('Dispatch Shield starting...');

  const policy = withBaseDirectory(
    loadPolicy(config.policies.directory, config.policies.default),
    config.workspace.dispatch_dir
  );
  logger.info({ policy: policy.name, version: policy.version, base: policy.allowedBaseDirectory }, 'Policy loaded');

  const auditLog = new AuditLog(config.crypto.audit_log, config.crypto.key_dir);
  const oracle = config.oracle.url ? new HttpPolicyOracle(config.oracle.url) : undefined;
  if (!oracle) {
    logger.info('No policy oracle configured; deterministic rules only');
  }

  const shield = new Shield({
    policy,
    audit: auditLog,
    oracle,
    oracleTimeoutMs: config.oracle.timeout_ms
  });

  const inferenceRouter = new InferenceRouter(config.inference.backends, config.inference.default);

  const commander = new TriageCommander({
    shield,
    reasoner: new LlmReasoner(inferenceRouter),
    logistics: new LogisticsSubAgent(config.workspace.dispatch_dir),
    medical: new MedicalSubAgent(config.workspace.medical_dir),
    audit: auditLog,
    reasonerTimeoutMs: config.inference.timeout_ms,
    highVolumeThreshold: config.missions.high_volume_threshold,
    maxReflectionAttempts: config.missions.max_reflection_attempts
  });

  const app = await buildApp({
    config,
    commander,
    audit: auditLog,
    policy,
    backends: inferenceRouter.getAvailableBackends()
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info(`Dispatch Shield listening on ${config.server.host}:${config.server.port}`);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
