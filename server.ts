import dotenv from 'dotenv';
dotenv.config();
import { AppConfig, loadConfig } from './config';
import { createDeezerGateway } from './api';
import { createApp } from './app';
import { ConfigError } from './types/interfaces';

function readConfig(): AppConfig {
    try {
        return loadConfig(process.env);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Invalid configuration: ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

function start(): void {
    const config = readConfig();

    const gateway = createDeezerGateway(config);
    const app = createApp({ config, gateway });

    const server = app.listen(config.port, config.host, () => {
        console.log(`Listening on ${config.host}:${config.port} (Deezer API at ${config.apiBaseUrl})`);
    });

    const shutdown = (signal: string) => {
        console.log(`${signal} received, closing HTTP server`);
        server.close(() => {
            console.log('HTTP server closed');
            process.exit(0);
        });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

start();
