#!/usr/bin/env node
import { runCli } from './core/cli.js';

const controller = new AbortController();
const stop = (): void => {
    controller.abort();
};

process.once('SIGINT', stop);
process.once('SIGTERM', stop);

try {
    process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
} catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Diffwatch] ${message}`);
    process.exitCode = 1;
} finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
}
