import express, { Express } from 'express';
import cors from 'cors';
import { Server } from 'http';
import logger from '../../logger.js';
import settings from '../../settings.js';
import configRouter from './config.js';
import eventsRouter from './events.js';
import tokensRouter from './tokens.js';
import transactionsRouter from './transactions.js';

/**
 * Builds the API application. Routes read the runtime installed with `setRuntime`.
 */
export function createApp(): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    logger.trace('Setting up HTTP endpoints...');
    app.use('/config', configRouter);
    app.use('/tokens', tokensRouter);
    app.use('/events', eventsRouter);
    app.use('/transactions', transactionsRouter);

    app.use((req, res) => {
        res.status(404).json({ error: 'NotFound', message: `No route for ${req.method} ${req.path}` });
    });
    return app;
}

/**
 * HTTP server module
 */
export function init(port = settings.apiPort): Server {
    const app = createApp();
    logger.debug(`Starting HTTP server on port ${port}`);

    const server = app.listen(port, () => {
        const addr = server.address();
        if (addr && typeof addr !== 'string') {
            logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
        } else {
            logger.info(`HTTP server listening on port ${port}`);
        }
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
            logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
        } else if (error.code === 'EACCES') {
            logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
        } else {
            logger.error('HTTP server error:', error);
        }
    });
    return server;
}

export default {
    createApp,
    init
};
