import { loadYieldConfig } from './config/yield-config';
import { Database } from './database';
import { ValidatorYieldRepository } from './database/repositories/ValidatorYieldRepository';
import { ValidatorMetadataRepository } from './database/repositories/ValidatorMetadataRepository';
import { SubnetRepository } from './database/repositories/SubnetRepository';
import { SubtensorClient } from './clients/SubtensorClient';
import { BlockTimeEstimator } from './services/yield/BlockTimeEstimator';
import { ValidatorSweepService } from './services/yield/ValidatorSweepService';
import { LiveYieldService } from './services/yield/LiveYieldService';
import { ValidatorMetadataService } from './services/metadata/ValidatorMetadataService';
import { SubnetService } from './services/subnets/SubnetService';
import { ValidatorQueryService } from './services/validators/ValidatorQueryService';
import { DelegateListingService } from './services/validators/DelegateListingService';
import { YieldScheduler } from './services/scheduler/YieldScheduler';
import { TimedCache } from './services/cache/TimedCache';
import { ValidatorController } from './api/controllers/validator.controller';
import { SubnetController } from './api/controllers/subnet.controller';
import { TrpcController } from './api/controllers/trpc.controller';
import { createApp } from './api/app';
import type { ValidatorRecord } from './types/yield';
import { logger } from './utils/logger';

async function startServer() {
    logger.info('Starting services...');
    const config = loadYieldConfig();

    const database = Database.getInstance();
    await database.connect(config.mongodbUri);

    const chainClient = new SubtensorClient({
        wsUrls: config.subtensorWsUrls,
        timeoutMs: config.chainQueryTimeoutMs
    });
    const yieldRepository = ValidatorYieldRepository.getInstance();
    const metadataRepository = ValidatorMetadataRepository.getInstance();
    const estimator = new BlockTimeEstimator(config.blockIntervalSeconds);
    const chainOptions = {
        timeoutMs: config.chainQueryTimeoutMs,
        subnetConcurrency: config.sweepSubnetConcurrency
    };

    const queryService = new ValidatorQueryService(
        yieldRepository,
        new TimedCache<ValidatorRecord[]>(),
        config.readCacheTtlSeconds * 1000
    );
    const delegateListing = new DelegateListingService(queryService, metadataRepository);
    const subnetService = new SubnetService(SubnetRepository.getInstance());
    const liveService = new LiveYieldService(chainClient, estimator, chainOptions);

    const scheduler = new YieldScheduler(
        new ValidatorSweepService(chainClient, yieldRepository, metadataRepository, estimator, chainOptions),
        new ValidatorMetadataService(chainClient, metadataRepository, config.chainQueryTimeoutMs),
        {
            sweepCron: config.sweepCron,
            metadataSyncCron: config.metadataSyncCron,
            sweepEnabled: config.sweepEnabled
        }
    );

    const app = createApp({
        validatorController: new ValidatorController(queryService, liveService, config.defaultBatchSize),
        subnetController: new SubnetController(subnetService),
        trpcController: new TrpcController({
            'delegates.getDelegates4': context => delegateListing.getDelegates(context),
            'subnets.getSubnetsNameAndSymbol': () => subnetService.listSubnets()
        }, config.defaultBatchSize),
        adminKey: config.adminKey,
        docsBaseUrl: config.publicBaseUrl
    });

    if (!config.adminKey) {
        logger.warn('ADMIN_KEY is not set, admin routes will reject every request');
    }

    // Start server
    const server = app.listen(config.port, () => {
        logger.info(`Server running at http://localhost:${config.port}`);
    });

    scheduler.start();

    const shutdown = async (signal: string) => {
        logger.info(`${signal} signal received. Starting graceful shutdown...`);
        try {
            scheduler.stop();
            await new Promise<void>((resolve, reject) => {
                server.close(error => (error ? reject(error) : resolve()));
            });
            await chainClient.disconnect();
            await database.disconnect();

            logger.info('All services stopped. Waiting for final cleanup...');

            // Close Winston logger
            await new Promise<void>((resolve) => {
                logger.on('finish', resolve);
                logger.end();
            });

            process.exit(0);
        } catch (error) {
            console.error('Error during shutdown:', error);
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
    logger.logError(error, 'Failed to start server');
    process.exit(1);
});
