import { createApp, AppDependencies } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase, getDatabaseStatus } from './config/database';
import { connectRedis, disconnectRedis, isRedisConnected } from './config/redis';
import { eventBus } from './events/eventBus';
import { InMemoryEventLog } from './events/eventLog';
import { createServiceLogger } from './observability';
import { InMemoryAssetLedger, MongoAssetLedger } from './services/asset';
import {
  AccrualLedger,
  InMemoryPositionStore,
  MongoPositionStore,
  createAccrualConfig,
  systemClock,
} from './services/staking';
import { EventPublisher } from './types/events';

const log = createServiceLogger('server');

const buildDependencies = async (): Promise<AppDependencies> => {
  const healthChecks: NonNullable<AppDependencies['healthChecks']> = {};
  const accrualConfig = createAccrualConfig(config.staking.rateBps, config.staking.secondsPerYear);

  let events: EventPublisher;
  if (config.staking.publishEventsToRedis) {
    await eventBus.connect();
    await connectRedis();
    healthChecks.eventBus = () => eventBus.getStatus().connected;
    healthChecks.redis = isRedisConnected;
    events = eventBus;
  } else {
    events = new InMemoryEventLog();
  }

  if (config.staking.storage === 'mongo') {
    await connectDatabase();
    healthChecks.database = () => getDatabaseStatus().connected;

    return {
      ledger: new AccrualLedger({
        store: new MongoPositionStore(),
        assets: new MongoAssetLedger(config.staking.custodyAccountId),
        events,
        config: accrualConfig,
        maxWriteRetries: config.staking.maxWriteRetries,
      }),
      clock: systemClock,
      healthChecks,
    };
  }

  log.warn(
    { seededAccounts: config.staking.devBalances.length },
    'Using in-memory storage; positions and balances are lost on restart'
  );
  return {
    ledger: new AccrualLedger({
      store: new InMemoryPositionStore(),
      assets: new InMemoryAssetLedger(config.staking.custodyAccountId, config.staking.devBalances),
      events,
      config: accrualConfig,
      maxWriteRetries: config.staking.maxWriteRetries,
    }),
    clock: systemClock,
    healthChecks,
  };
};

const shutdownDependencies = async (): Promise<void> => {
  await eventBus.disconnect();
  await disconnectRedis();
  await disconnectDatabase();
};

const startServer = async (): Promise<void> => {
  try {
    const app = createApp(await buildDependencies());

    const server = app.listen(config.port, () => {
      log.info(
        { port: config.port, ...getEnvironmentInfo() },
        `Server running on port ${config.port}`
      );
    });

    const shutdown = (signal: string): void => {
      log.info(`${signal} received. Starting graceful shutdown...`);

      server.close(() => {
        log.info('HTTP server closed');

        shutdownDependencies()
          .then(() => {
            log.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            log.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        log.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
