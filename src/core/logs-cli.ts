import * as fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { getLogFilePath } from '../utils/logger.js';
import type { CliIo } from './cli.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function currentDateIso(): string {
    return new Date().toISOString().slice(0, 10);
}

/**
 * Handle the `logs` command.
 * Prints the daily activity log for `dateIso` (today when omitted).
 */
export async function handleLogsCli(dateIso: string | undefined, io: CliIo): Promise<number> {
    const day = dateIso ?? currentDateIso();
    if (!DATE_PATTERN.test(day)) {
        io.stderr(`[Diffwatch Logs] Invalid date '${day}'. Expected YYYY-MM-DD.\n`);
        return 1;
    }

    const logPath = getLogFilePath(day);
    if (!existsSync(logPath)) {
        io.stderr(`[Diffwatch Logs] No logs found for ${day} at ${logPath}.\n`);
        return 1;
    }

    io.stdout(await fs.readFile(logPath, 'utf8'));
    return 0;
}
