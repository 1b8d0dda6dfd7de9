/**
 * Settings resolver for the report gate.
 *
 * Produces structured diagnostics for:
 *   - Empty values on keys that need a non-empty command or path.
 *   - Format/range violations on numeric settings.
 *
 * Gate inputs (TRAVIS_*) are never validated here: an unexpected value there is
 * a skip, not a configuration problem.
 */

import {
  CONFIG_SCHEMA,
  DEFAULT_INTERPRETER,
  DEFAULT_QUERY_TIMEOUT_MS,
  DEFAULT_REPORTER_BIN,
  LOG_DIR_DISABLED,
  MAX_QUERY_TIMEOUT_MS,
} from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import type { ReportGateSettings } from '../types/report-gate.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'empty_value' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface SettingsValidationResult {
  ok: boolean;
  issues: ConfigIssue[];
  /** Settings with defaults applied. A key named in `issues` falls back to its default. */
  settings: ReportGateSettings;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

function settingSpecs(): ConfigKeySpec[] {
  return CONFIG_SCHEMA.filter((spec) => spec.type === 'setting');
}

/**
 * Returns an issue when a set-but-unusable value is found, null otherwise.
 * Unset keys fall back to their default and are never an issue.
 */
function checkSetting(spec: ConfigKeySpec, raw: string | undefined): ConfigIssue | null {
  if (raw === undefined) {
    return null;
  }

  const value = raw.trim();
  if (value.length === 0) {
    return {
      key: spec.key,
      class: 'empty_value',
      message: `${spec.key} is set but empty.`,
      remediation: spec.remediation,
    };
  }

  if (spec.key === 'REPORT_GATE_QUERY_TIMEOUT_MS') {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_QUERY_TIMEOUT_MS) {
      return {
        key: spec.key,
        class: 'format_error',
        message: `${spec.key} must be an integer in range 1–${MAX_QUERY_TIMEOUT_MS}, got '${value}'.`,
        remediation: spec.remediation,
      };
    }
  }

  return null;
}

function nonEmpty(raw: string | undefined, fallback: string): string {
  const value = raw?.trim() ?? '';
  return value.length > 0 ? value : fallback;
}

function resolveSettings(env: NodeJS.ProcessEnv): ReportGateSettings {
  const timeout = Number(env.REPORT_GATE_QUERY_TIMEOUT_MS?.trim());
  const logDir = nonEmpty(env.REPORT_GATE_LOG_DIR, LOG_DIR_DISABLED);

  return {
    reporterBin: nonEmpty(env.CC_TEST_REPORTER_BIN, DEFAULT_REPORTER_BIN),
    interpreter: nonEmpty(env.REPORT_GATE_PYTHON, DEFAULT_INTERPRETER),
    queryTimeoutMs:
      Number.isInteger(timeout) && timeout >= 1 && timeout <= MAX_QUERY_TIMEOUT_MS
        ? timeout
        : DEFAULT_QUERY_TIMEOUT_MS,
    logDir: logDir.toLowerCase() === LOG_DIR_DISABLED ? null : logDir,
  };
}

// ── Public API ───────────────────────────────────────────────────────────────

/** Never throws: an unusable value is listed in `issues` and replaced by its default. */
export function validateGateSettings(env: NodeJS.ProcessEnv = process.env): SettingsValidationResult {
  const issues: ConfigIssue[] = [];

  for (const spec of settingSpecs()) {
    const issue = checkSetting(spec, env[spec.key]);
    if (issue) {
      issues.push(issue);
    }
  }

  return {
    ok: issues.length === 0,
    issues,
    settings: resolveSettings(env),
  };
}
