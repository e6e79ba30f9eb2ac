import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { ChangeCoordinator } from "../../../libs/snapshots/index.js";
import { CommandSnapshotProvider } from "../../../libs/providers/CommandSnapshotProvider.js";
import { FilesystemChangeSource } from "../../../libs/watcher/FilesystemChangeSource.js";


async function main() {
    const config = bootstrap("snapshot-agent");

    const provider = new CommandSnapshotProvider(config.snapshotCommand);
    const coordinator = new ChangeCoordinator(config.coordinator, provider);
    const source = new FilesystemChangeSource(config.watchPath, coordinator, config.watchIgnored);

    source.start();
    logger.info("Snapshot agent initialized");

    let shuttingDown = false;
    const shutdown = async (signal: NodeJS.Signals) => {
        if (shuttingDown) return;
        shuttingDown = true;

        logger.info({ signal }, "Snapshot agent shutting down");
        await source.stop();
        coordinator.stop();
        logger.info({ stats: coordinator.getStats() }, "Snapshot agent stopped");
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            shutdown(signal).catch(err => {
                logger.fatal(err, "Shutdown failed");
                process.exitCode = 1;
            });
        });
    }
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
