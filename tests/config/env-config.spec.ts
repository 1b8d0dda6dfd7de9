import { describe, expect, it } from 'vitest';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import { captureEnvironmentSnapshot } from '../../src/config/env-snapshot.js';
import { validateGateSettings } from '../../src/config/env-validator.js';

describe('CONFIG_SCHEMA', () => {
  it('contains unique key entries', () => {
    const keys = CONFIG_SCHEMA.map((s) => s.key);
    expect(keys.length).toBe(new Set(keys).size);
  });

  it('registers every Travis key read by the snapshot as a gate input', () => {
    for (const key of Object.keys(captureEnvironmentSnapshot({}))) {
      expect(CONFIG_SCHEMA.find((spec) => spec.key === key)?.type, key).toBe('gate');
    }
  });

  it('gives every setting a default', () => {
    const missing = CONFIG_SCHEMA.filter((s) => s.type === 'setting' && s.defaultValue === undefined);
    expect(missing).toHaveLength(0);
  });
});

describe('captureEnvironmentSnapshot', () => {
  it('copies values verbatim and maps unset keys to empty strings', () => {
    const snapshot = captureEnvironmentSnapshot({
      TRAVIS_OS_NAME: 'linux',
      TRAVIS_BRANCH: ' master ',
      TRAVIS_PULL_REQUEST: 'False',
    });

    expect(snapshot).toEqual({
      TRAVIS_OS_NAME: 'linux',
      TRAVIS_PULL_REQUEST: 'False',
      TRAVIS_BRANCH: ' master ',
      TRAVIS_SECURE_ENV_VARS: '',
      TRAVIS_TEST_RESULT: '',
    });
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(captureEnvironmentSnapshot({}))).toBe(true);
  });
});

describe('validateGateSettings', () => {
  it('applies defaults when nothing is set', () => {
    const result = validateGateSettings({});

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.settings).toEqual({
      reporterBin: './cc-test-reporter',
      interpreter: 'python',
      queryTimeoutMs: 15_000,
      logDir: null,
    });
  });

  it('reads overrides from the environment', () => {
    const result = validateGateSettings({
      CC_TEST_REPORTER_BIN: '/usr/local/bin/cc-test-reporter',
      REPORT_GATE_PYTHON: 'python2.7',
      REPORT_GATE_QUERY_TIMEOUT_MS: '3000',
      REPORT_GATE_LOG_DIR: 'build/logs',
    });

    expect(result.settings).toEqual({
      reporterBin: '/usr/local/bin/cc-test-reporter',
      interpreter: 'python2.7',
      queryTimeoutMs: 3000,
      logDir: 'build/logs',
    });
  });

  it('disables file logging with REPORT_GATE_LOG_DIR=off', () => {
    expect(validateGateSettings({ REPORT_GATE_LOG_DIR: 'OFF' }).settings.logDir).toBeNull();
  });

  it.each(['0', '-5', '1.5', 'soon', '120001'])('rejects REPORT_GATE_QUERY_TIMEOUT_MS=%s', (value) => {
    const result = validateGateSettings({ REPORT_GATE_QUERY_TIMEOUT_MS: value });

    expect(result.ok).toBe(false);
    expect(result.issues).toEqual([
      {
        key: 'REPORT_GATE_QUERY_TIMEOUT_MS',
        class: 'format_error',
        message: `REPORT_GATE_QUERY_TIMEOUT_MS must be an integer in range 1–120000, got '${value}'.`,
        remediation: 'Set REPORT_GATE_QUERY_TIMEOUT_MS to a positive integer number of milliseconds.',
      },
    ]);
  });

  it('flags settings that are set but blank', () => {
    const result = validateGateSettings({ CC_TEST_REPORTER_BIN: '   ' });

    expect(result.ok).toBe(false);
    expect(result.issues.map((i) => [i.key, i.class])).toEqual([['CC_TEST_REPORTER_BIN', 'empty_value']]);
  });

  it('ignores unexpected values on gate inputs', () => {
    expect(validateGateSettings({ TRAVIS_BRANCH: '', TRAVIS_PULL_REQUEST: 'nope' }).ok).toBe(true);
  });
});

describe('invalid settings', () => {
  it('fall back to their defaults and are all reported', () => {
    const result = validateGateSettings({
      CC_TEST_REPORTER_BIN: '',
      REPORT_GATE_PYTHON: ' ',
      REPORT_GATE_QUERY_TIMEOUT_MS: 'x',
      REPORT_GATE_LOG_DIR: '',
    });

    expect(result.issues.map((i) => i.key)).toEqual([
      'CC_TEST_REPORTER_BIN',
      'REPORT_GATE_PYTHON',
      'REPORT_GATE_QUERY_TIMEOUT_MS',
      'REPORT_GATE_LOG_DIR',
    ]);
    expect(result.settings).toEqual({
      reporterBin: './cc-test-reporter',
      interpreter: 'python',
      queryTimeoutMs: 15_000,
      logDir: null,
    });
  });
});
