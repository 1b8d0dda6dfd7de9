/**
 * Centralized registry of every environment key the report gate reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        'gate' for CI-injected gating inputs, 'setting' for the tool's own
 *                   knobs, 'secret' for values that must never reach a log.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyType = 'gate' | 'setting' | 'secret';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  /** Default applied when a 'setting' key is unset. */
  defaultValue?: string;
  description: string;
  remediation: string;
}

export const DEFAULT_REPORTER_BIN = './cc-test-reporter';
export const DEFAULT_INTERPRETER = 'python';
export const DEFAULT_QUERY_TIMEOUT_MS = 15_000;
export const MAX_QUERY_TIMEOUT_MS = 120_000;
export const LOG_DIR_DISABLED = 'off';

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Travis CI gating inputs ────────────────────────────────────────────────
  {
    key: 'TRAVIS_OS_NAME',
    type: 'gate',
    description: 'Build host operating system label injected by Travis CI.',
    remediation: 'Coverage is only uploaded from the linux build of the matrix.',
  },
  {
    key: 'TRAVIS_PULL_REQUEST',
    type: 'gate',
    description: "Pull request number, or the literal string 'false' for push builds.",
    remediation: 'Coverage is only uploaded from push builds, never from pull requests.',
  },
  {
    key: 'TRAVIS_BRANCH',
    type: 'gate',
    description: 'Branch being built.',
    remediation: 'Coverage is only uploaded from master.',
  },
  {
    key: 'TRAVIS_SECURE_ENV_VARS',
    type: 'gate',
    description: "'true' when Travis decrypted the repository's secure variables for this build.",
    remediation:
      'Add CC_TEST_REPORTER_ID as an encrypted variable; forks and pull requests never receive it.',
  },
  {
    key: 'TRAVIS_TEST_RESULT',
    type: 'gate',
    description: 'Exit status of the build script, forwarded to the reporter as --exit-code.',
    remediation: 'Travis sets this automatically in after_script; set it manually when rehearsing locally.',
  },

  // ── Tool settings ──────────────────────────────────────────────────────────
  {
    key: 'CC_TEST_REPORTER_BIN',
    type: 'setting',
    defaultValue: DEFAULT_REPORTER_BIN,
    description: 'Path to the cc-test-reporter executable, resolved from the working directory.',
    remediation: 'Download the reporter in before_script or point CC_TEST_REPORTER_BIN at it.',
  },
  {
    key: 'REPORT_GATE_PYTHON',
    type: 'setting',
    defaultValue: DEFAULT_INTERPRETER,
    description: 'Interpreter whose major version is checked against the gate.',
    remediation: 'Set REPORT_GATE_PYTHON to the interpreter used by the build, e.g. python2.7.',
  },
  {
    key: 'REPORT_GATE_QUERY_TIMEOUT_MS',
    type: 'setting',
    defaultValue: String(DEFAULT_QUERY_TIMEOUT_MS),
    description: `Upper bound for the interpreter version query (1–${MAX_QUERY_TIMEOUT_MS} ms).`,
    remediation: 'Set REPORT_GATE_QUERY_TIMEOUT_MS to a positive integer number of milliseconds.',
  },
  {
    key: 'REPORT_GATE_LOG_DIR',
    type: 'setting',
    defaultValue: LOG_DIR_DISABLED,
    description: "Directory receiving the daily markdown log. File logging is off unless this is set.",
    remediation: `Set REPORT_GATE_LOG_DIR to a writable directory or '${LOG_DIR_DISABLED}'.`,
  },

  // ── Secrets consumed by the reporter ───────────────────────────────────────
  {
    key: 'CC_TEST_REPORTER_ID',
    type: 'secret',
    description: 'Repository token the reporter uploads with. Read by the reporter, never by the gate.',
    remediation: 'Store CC_TEST_REPORTER_ID as an encrypted Travis variable.',
  },
] as const;
