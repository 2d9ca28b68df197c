import http from 'http';
import { logger } from './logger';
import { loadConfig } from './config';
import { createApp } from './app';
import { httpsAgent } from './modules/newsApiClient';

// -------------------------------------------------
// Load & validate configuration
// -------------------------------------------------
const config = loadConfig();

if (!config.newsApiKey) {
    logger.fatal('NEWSAPI_KEY is not set. Add it to the environment (or a Docker secret) before starting the gateway.');
    process.exit(1);
}

// -------------------------------------------------
// HTTP Server
// -------------------------------------------------
const app = createApp({ config, logger });
const server = http.createServer(app);

server.listen(config.port, () => {
    logger.info(
        { port: config.port, upstream: config.newsApiBaseUrl, corsOrigin: config.corsOrigin },
        'Search gateway listening'
    );
});

let isShuttingDown = false;

function shutdown(signal: string) {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Received ${signal}. Shutting down...`);

    server.close((err) => {
        httpsAgent.destroy();
        if (err) {
            logger.error({ err }, 'Shutdown error');
            process.exit(1);
        }
        process.exit(0);
    });

    setTimeout(() => process.exit(0), 3000).unref();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'UNHANDLED_REJECTION');
});
process.on('uncaughtException', (err) => {
    logger.error({ err }, 'UNCAUGHT_EXCEPTION');
});
