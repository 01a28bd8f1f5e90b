import { createApp } from './app.js';
import { ConfigError, getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { createMeetingPlacePipeline } from './services/meeting-places/index.js';

function start() {
    const config = getConfig();
    const pipeline = createMeetingPlacePipeline(config);

    const app = createApp({ pipeline });
    const server = app.listen(config.port, () => {
        logger.info({ event: 'server_started', port: config.port, env: config.nodeEnv }, `Server listening on http://localhost:${config.port}`);
    });

    function shutdown(signal: NodeJS.Signals) {
        logger.info({ event: 'server_shutdown', signal }, `Received ${signal}. Shutting down gracefully...`);
        server.close(() => {
            logger.info('Server closed');
            process.exit(0);
        });
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

try {
    start();
} catch (err) {
    if (err instanceof ConfigError) {
        logger.fatal({ event: 'config_invalid', keys: err.keys }, err.message);
    } else {
        logger.fatal({ event: 'startup_failed', err }, 'Server failed to start');
    }
    process.exit(1);
}
