import dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';

const envFilePath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
dotenv.config({ path: envFilePath });

export interface FraglogConfig {
    port: number;
    uploadLimitBytes: number;
}

function readPositiveInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '')
        return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        console.warn(`[config] ignoring ${name}=${raw}; using ${fallback}`);
        return fallback;
    }
    return value;
}

export function loadConfig(): FraglogConfig {
    return {
        port: readPositiveInt('PORT', 3000),
        uploadLimitBytes: readPositiveInt('FRAGLOG_UPLOAD_LIMIT', 3000000),
    };
}

export default loadConfig;
