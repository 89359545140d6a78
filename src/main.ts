import 'dotenv/config';
import fs from 'fs';
import http from './modules/http/index.js';
import logger from './logger.js';
import config from './config.js';
import settings from './settings.js';
import { connect, disconnect, loadState, saveState } from './mongo.js';
import { Runtime, RuntimeOptions, setRuntime } from './runtime.js';
import { CollectionConfig, parseCollectionConfig } from './staking/config-store.js';
import { describeError } from './errors.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection:', { reason_details: describeError(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20, 22];
const currentNodeV = parseInt(process.versions.node.split('.')[0]);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

let closing = false;
let flushing = false;
let flushTimer: NodeJS.Timeout | undefined;

function readCollectionConfig(path: string): CollectionConfig | undefined {
    if (!path) {
        logger.info('No COLLECTION_CONFIG given, waiting for a COLLECTION_INITIALIZE transaction');
        return undefined;
    }
    const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf8'));
    return parseCollectionConfig(raw);
}

export async function main() {
    logger.info(`Starting ${config.networkName} node...`);

    const options: RuntimeOptions = {
        admin: settings.adminAccount,
        collection: readCollectionConfig(settings.collectionConfigPath),
    };

    let runtime: Runtime;
    if (settings.mongoUrl) {
        await connect(settings.mongoUrl, settings.mongoDb);
        runtime = await loadState(options);
        flushTimer = setInterval(() => {
            if (flushing) {
                logger.debug('Previous flush still running, skipping this one');
                return;
            }
            flushing = true;
            saveState(runtime)
                .catch(error => logger.error(`Failed to flush state, changes stay queued: ${describeError(error)}`))
                .finally(() => {
                    flushing = false;
                });
        }, settings.flushInterval * 1000);
    } else {
        logger.warn('MONGO_URL not set, state will only live in memory');
        runtime = new Runtime(options);
    }
    setRuntime(runtime);

    http.init();
    logger.info('Node started successfully.');

    process.on('SIGINT', () => {
        if (closing) return;
        closing = true;
        logger.info('Received SIGINT, saving state...');
        if (flushTimer) clearInterval(flushTimer);

        const shutdown = settings.mongoUrl ? saveState(runtime).then(disconnect) : Promise.resolve();
        shutdown
            .then(() => {
                logger.info('Node exited safely');
                process.exit(0);
            })
            .catch(error => {
                logger.error(`Failed to save state on shutdown: ${describeError(error)}`);
                process.exit(1);
            });
    });
}

main().catch(error => {
    logger.fatal('Critical error during node startup:', error);
    process.exit(1);
});
