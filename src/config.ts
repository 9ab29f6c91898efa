/**
 * Application settings for filekeeper.
 *
 * Loads overrides from a local .env via dotenv. The registry core never
 * reads the environment itself; index.ts passes these values in.
 */
import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

dotenv.config();

export interface AppConfig {
    registryDirectory: string;
    logDirectory: string;
    activityLogEnabled: boolean;
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const registryDirectory = nonEmpty(env.FILEKEEPER_REGISTRY_DIR) ?? path.join(os.homedir(), '.filekeeper_data');

    return {
        registryDirectory,
        logDirectory: nonEmpty(env.FILEKEEPER_LOG_DIR) ?? path.join(registryDirectory, 'logs'),
        activityLogEnabled: env.FILEKEEPER_ACTIVITY_LOG?.trim().toLowerCase() !== 'false'
    };
}
