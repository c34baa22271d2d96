import { Server } from 'http';
import config, { validateConfig } from './config';
import { createApp } from './http/app';
import { createLogger } from './logger';
import { ContentOrchestrator } from './pipeline/orchestrator';
import { buildRegistry } from './pipeline/registry';

const logger = createLogger('main');

let server: Server | null = null;

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down...`);

    const running = server;
    if (running) {
        await new Promise<void>((resolve, reject) => {
            running.close(error => (error ? reject(error) : resolve()));
        });
    }

    logger.info('Shutdown complete');
    process.exit(0);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    logger.info('Content engine starting...', {
        nodeEnv: config.nodeEnv,
        aiProvider: config.ai.provider,
    });

    try {
        // Missing credentials only downgrade components to their fallbacks
        for (const warning of validateConfig()) {
            logger.warn(warning);
        }

        const registry = buildRegistry(config);
        const orchestrator = new ContentOrchestrator(registry);
        const app = createApp({ registry, orchestrator });

        server = app.listen(config.server.port, () => {
            logger.info(`Engine is listening on port ${config.server.port}. Press Ctrl+C to stop.`);
        });
    } catch (error) {
        logger.error('Startup failed', {
            error: error instanceof Error ? error.message : 'Unknown error'
        });
        process.exit(1);
    }
}

function onSignal(signal: string): void {
    shutdown(signal).catch(error => {
        logger.error('Shutdown failed', {
            error: error instanceof Error ? error.message : 'Unknown error'
        });
        process.exit(1);
    });
}

// Register shutdown handlers
process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason });
    process.exit(1);
});

// Start the engine
main().catch(() => process.exit(1));
