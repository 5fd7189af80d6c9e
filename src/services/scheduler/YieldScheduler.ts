import cron from 'node-cron';
import { ValidatorSweepService } from '../yield/ValidatorSweepService';
import { ValidatorMetadataService } from '../metadata/ValidatorMetadataService';
import { logger } from '../../utils/logger';

export interface YieldSchedulerOptions {
    sweepCron: string;
    metadataSyncCron: string;
    sweepEnabled: boolean;
}

/**
 * In-process schedule for metadata sync and yield sweeps. Jobs talk to each
 * other only through the store. A sweep that outlives its interval is not
 * cancelled; the next tick starts another one alongside it.
 */
export class YieldScheduler {
    private isRunning: boolean = false;
    private sweepJob: cron.ScheduledTask | null = null;
    private metadataJob: cron.ScheduledTask | null = null;

    constructor(
        private readonly sweepService: ValidatorSweepService,
        private readonly metadataService: ValidatorMetadataService,
        private readonly options: YieldSchedulerOptions
    ) {
        for (const expression of [options.sweepCron, options.metadataSyncCron]) {
            if (!cron.validate(expression)) {
                throw new Error(`Invalid cron expression: ${expression}`);
            }
        }
    }

    /**
     * Start the scheduler; runs a metadata sync and then a sweep right away
     */
    public start(): void {
        if (this.isRunning) {
            logger.warn('[YieldScheduler] Already running');
            return;
        }

        logger.info('[YieldScheduler] Starting...');

        this.metadataJob = cron.schedule(this.options.metadataSyncCron, () => {
            void this.runMetadataSync();
        });

        if (this.options.sweepEnabled) {
            this.sweepJob = cron.schedule(this.options.sweepCron, () => {
                void this.runSweep();
            });
        } else {
            logger.info('[YieldScheduler] Sweeps are disabled by configuration');
        }

        this.isRunning = true;
        logger.info(`[YieldScheduler] Started (sweep: ${this.options.sweepCron}, metadata: ${this.options.metadataSyncCron})`);

        void this.runStartup();
    }

    /**
     * Stop the scheduler
     */
    public stop(): void {
        if (!this.isRunning) {
            logger.warn('[YieldScheduler] Not running');
            return;
        }

        if (this.sweepJob) {
            this.sweepJob.stop();
            this.sweepJob = null;
        }

        if (this.metadataJob) {
            this.metadataJob.stop();
            this.metadataJob = null;
        }

        this.isRunning = false;
        logger.info('[YieldScheduler] Stopped');
    }

    public running(): boolean {
        return this.isRunning;
    }

    /**
     * Never rejects: failures are logged and the next tick retries
     */
    public async runMetadataSync(): Promise<void> {
        try {
            await this.metadataService.syncMetadata();
        } catch (error) {
            logger.logError(error, '[YieldScheduler] Metadata sync failed');
        }
    }

    /**
     * Never rejects: failures are logged and the next tick retries
     */
    public async runSweep(): Promise<void> {
        try {
            await this.sweepService.runSweep();
        } catch (error) {
            logger.logError(error, '[YieldScheduler] Sweep failed');
        }
    }

    private async runStartup(): Promise<void> {
        await this.runMetadataSync();
        if (this.options.sweepEnabled) {
            await this.runSweep();
        }
    }
}
