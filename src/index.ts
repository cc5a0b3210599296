import { createServer } from 'http';

import { JsonRpcProvider, Wallet } from 'ethers';

import { createApp } from './api/app.js';
import { formatError } from './collateral/errors.js';
import { config } from './config/index.js';
import { loadCollateralFile } from './config/collateralSchema.js';
import { startRefreshPoller } from './polling/refreshPoller.js';
import { buildRegistry, chainFactories } from './registry/buildCollaterals.js';
import { createEngineLogger } from './utils/logger.js';

const logger = createEngineLogger(config.logLevel);

async function main(): Promise<void> {
  if (!config.rpcUrl) {
    throw new Error('RPC_URL is required');
  }

  const provider = new JsonRpcProvider(config.rpcUrl);
  const signer = config.claimerPrivateKey ? new Wallet(config.claimerPrivateKey, provider) : null;
  if (!signer) {
    logger.info('[config] CLAIMER_PRIVATE_KEY not set, reward claiming disabled');
  }

  const definitions = loadCollateralFile(config.collateralsFile);
  const factories = chainFactories(signer ?? provider, signer?.address);
  const registry = buildRegistry(definitions, factories, { logger });
  logger.info(`[config] loaded ${registry.size()} collateral(s) from ${config.collateralsFile}`);

  if (config.claimRewardsOnStart) {
    for (const engine of registry.list()) {
      try {
        await engine.claimRewards();
      } catch (err) {
        logger.error(`[rewards] claim failed erc20=${engine.erc20()} error=${formatError(err)}`);
      }
    }
  }

  const poller = startRefreshPoller({
    registry,
    intervalMs: config.refreshIntervalMs,
    logger
  });

  const httpServer = createServer(createApp(registry));
  httpServer.listen(config.port, () => {
    logger.info(`[api] listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`[shutdown] ${signal} received`);
    poller.stop();
    httpServer.close(() => {
      provider.destroy();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
  logger.error(`[startup] fatal: ${formatError(err)}`);
  process.exit(1);
});
