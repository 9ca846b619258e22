import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import logger from './logger';

export interface EnvLoadResult {
    loadedFrom: string[];
    tried: string[];
    errors: string[];
}

/**
 * Loads .env files from the working directory and the user's home so that
 * REPOLENS_* and LOG_* settings need no manual export.
 */
export class EnvLoader {
    load(): EnvLoadResult {
        const tried: string[] = [];
        const loadedFrom: string[] = [];
        const errors: string[] = [];

        for (const candidate of this.buildCandidatePaths()) {
            if (tried.includes(candidate)) continue;
            tried.push(candidate);

            if (!fs.existsSync(candidate)) {
                continue;
            }

            const result = dotenv.config({ path: candidate });
            if (result.error) {
                errors.push(result.error.message);
                logger.warn(`Failed to load env file ${candidate}: ${result.error.message}`);
                continue;
            }
            loadedFrom.push(candidate);
            logger.debug(`Loaded environment variables from ${candidate}`);
        }

        return { loadedFrom, tried, errors };
    }

    private buildCandidatePaths(): string[] {
        return [
            path.resolve(process.cwd(), '.env'),
            // User-level override
            path.join(os.homedir(), '.repolens.env'),
        ];
    }
}
