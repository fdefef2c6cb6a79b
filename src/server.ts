import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();

// start server
const start = async () => {
    const server = await buildApp(config, {
        logger: {
            level: config.logLevel,
            transport: {
                target: 'pino-pretty'
            }
        }
    });

    try {
        await server.listen({ port: config.port, host: config.host });
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
};

start().catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
});
