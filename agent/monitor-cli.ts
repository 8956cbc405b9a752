#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type AgentConfig } from './config';
import { createLogger } from './logger';
import { createRuntime } from './runtime';

const args = process.argv.slice(2);

let config: AgentConfig;
try {
    config = loadConfig();
} catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
}

const logger = createLogger(config.logLevel);
const locations = args.length > 0 ? args : config.locations;

if (locations.length === 0) {
    console.error('Usage:');
    console.error('  monitor-cli <location> [location...]   # e.g. monitor-cli Lisbon Porto');
    console.error('  MONITOR_LOCATIONS=Lisbon,Porto monitor-cli');
    process.exit(1);
}

async function main(): Promise<void> {
    const runtime = await createRuntime(config, locations, logger);
    await runtime.server.listen({ port: config.approvalApiPort, host: '0.0.0.0' });
    logger.info(`approval console listening on http://localhost:${config.approvalApiPort}`);

    runtime.daemon.start();

    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) {
            logger.warn({ signal }, 'second signal received; exiting without waiting for in-flight incidents');
            process.exit(1);
        }
        stopping = true;
        logger.info({ signal }, 'shutting down after in-flight incidents settle');

        runtime.daemon
            .stop()
            .then(async () => {
                runtime.gate.dispose();
                await runtime.server.close();
                process.exit(0);
            })
            .catch((err: unknown) => {
                logger.error({ err }, 'shutdown failed');
                process.exit(1);
            });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    logger.fatal({ err }, 'initialisation failed');
    process.exit(1);
});
