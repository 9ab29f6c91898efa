#!/usr/bin/env node
import { loadConfig } from './config';
import { FileRegistry } from './registry/file-registry';
import { FileService } from './service/file-service';
import { ActivityLog } from './utils/activity-log';
import { MainMenu } from './ui/main-menu';
import { ReadlinePrompter } from './ui/prompter';
import { error } from './ui/console-view';
import { describeError } from './errors';

async function main(): Promise<number> {
    const config = loadConfig();
    const activityLog = ActivityLog.inDirectory(config.logDirectory, config.activityLogEnabled);

    let registry: FileRegistry;
    try {
        registry = await FileRegistry.open(config.registryDirectory);
    } catch (err) {
        // Without a working registry there is nothing to do
        error(`Failed to initialise the application: ${describeError(err)}`);
        return 1;
    }

    activityLog.attach(registry);
    await activityLog.record('service', 'startup', {
        registryFile: registry.registryFilePath,
        records: registry.count()
    });

    const service = new FileService(registry, { logger: activityLog });
    const menu = new MainMenu(service, new ReadlinePrompter(), config.registryDirectory);

    await menu.run();
    await activityLog.flush();
    return 0;
}

if (require.main === module) {
    main()
        .then(code => {
            process.exitCode = code;
        })
        .catch(err => {
            error(`Unexpected error: ${describeError(err)}`);
            process.exitCode = 1;
        });
}
