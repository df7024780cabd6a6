import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';

export interface LoggerOptions {
    enabled: boolean;
    /** Directory holding one `<YYYY-MM-DD>.md` file per day. */
    directory: string;
}

export const DEFAULT_LOG_DIRECTORY = path.join(os.homedir(), '.diffwatch', 'logs');

let loggerOptions: LoggerOptions = {
    enabled: true,
    directory: DEFAULT_LOG_DIRECTORY,
};

export function configureLogger(options: Partial<LoggerOptions>): void {
    loggerOptions = {
        enabled: options.enabled ?? loggerOptions.enabled,
        directory: options.directory ? path.resolve(options.directory) : loggerOptions.directory,
    };
}

export function getLoggerOptions(): LoggerOptions {
    return { ...loggerOptions };
}

/** Absolute path of the log file for the given day (today when omitted). */
export function getLogFilePath(dateIso: string = new Date().toISOString().slice(0, 10)): string {
    return path.join(loggerOptions.directory, `${dateIso}.md`);
}

/**
 * Append a timestamped entry to the daily log.
 * Never throws: a failed write is reported on stderr.
 */
export async function logThought(message: string): Promise<void> {
    if (!loggerOptions.enabled) return;

    const now = new Date().toISOString();
    const filePath = getLogFilePath(now.slice(0, 10));
    const entry = `- [${now.slice(11, 19)}] ${message.replace(/\r?\n/g, ' ')}\n`;

    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.appendFile(filePath, entry, 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write log entry to ${filePath}: ${reason}`);
    }
}
