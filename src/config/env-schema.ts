/**
 * Registry of environment variables that override values from `diffwatch.json`.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        How the raw string is parsed.
 *   - `target`      Dotted path of the config field it replaces.
 *   - `description` Human-readable purpose.
 */

export type EnvOverrideType = 'integer' | 'boolean' | 'path';

export type EnvOverrideTarget =
  | 'watcher.debounceMs'
  | 'watcher.usePolling'
  | 'diff.maxFileSizeBytes'
  | 'logging.enabled'
  | 'logging.directory';

export interface EnvOverrideSpec {
  key: string;
  type: EnvOverrideType;
  target: EnvOverrideTarget;
  description: string;
}

/** Not an override itself: selects the config file that overrides are applied to. */
export const CONFIG_PATH_ENV_KEY = 'DIFFWATCH_CONFIG_PATH';

export const ENV_OVERRIDE_SCHEMA: readonly EnvOverrideSpec[] = [
  // ── Watcher ─────────────────────────────────────────────────────────────────
  {
    key: 'DIFFWATCH_DEBOUNCE_MS',
    type: 'integer',
    target: 'watcher.debounceMs',
    description: 'Quiet period in ms before a change to one path is reported (default: 100).',
  },
  {
    key: 'DIFFWATCH_USE_POLLING',
    type: 'boolean',
    target: 'watcher.usePolling',
    description: 'Poll the filesystem instead of using native notifications (default: false).',
  },

  // ── Diff ────────────────────────────────────────────────────────────────────
  {
    key: 'DIFFWATCH_MAX_FILE_SIZE_BYTES',
    type: 'integer',
    target: 'diff.maxFileSizeBytes',
    description: 'Files larger than this are reported as too large instead of diffed (default: 1048576).',
  },

  // ── Logging ─────────────────────────────────────────────────────────────────
  {
    key: 'DIFFWATCH_LOG_ENABLED',
    type: 'boolean',
    target: 'logging.enabled',
    description: 'Write the daily activity log (default: true).',
  },
  {
    key: 'DIFFWATCH_LOG_DIR',
    type: 'path',
    target: 'logging.directory',
    description: 'Directory for daily log files (default: ~/.diffwatch/logs).',
  },
];
