import { captureEnvironmentSnapshot } from '../config/env-snapshot.js';
import { validateGateSettings } from '../config/env-validator.js';
import type { ConfigIssue } from '../config/env-validator.js';
import type {
  EnvironmentSnapshot,
  GateCheckResult,
  GateVerdict,
  InterpreterVersionQuery,
  ReportGateOutcome,
  ReportGateReport,
  ReportGateRunOptions,
  ReportGateSettings,
  ReporterCommand,
  ReporterRunner,
} from '../types/report-gate.js';
import { logThought } from '../utils/logger.js';
import { queryInterpreterMajorVersion } from './interpreter-version.js';
import {
  GATE_REQUIREMENTS,
  REPORTER_EXIT_CODE_FLAG,
  REPORTER_SUBCOMMAND,
} from './report-gate-config.js';
import type { EnvRequirement, GateRequirement, InterpreterRequirement } from './report-gate-config.js';
import { formatReporterCommand, runReporter } from './reporter-runner.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Split the way an unquoted shell expansion does under the default IFS. */
function splitWords(value: string): string[] {
  return value.split(/[ \t\n]+/).filter((word) => word.length > 0);
}

export function buildReporterCommand(reporterBin: string, testResult: string): ReporterCommand {
  return {
    executable: reporterBin,
    args: [REPORTER_SUBCOMMAND, REPORTER_EXIT_CODE_FLAG, ...splitWords(testResult)],
  };
}

function buildSummary(failedCheck: GateCheckResult | null, command: ReporterCommand | null): string {
  if (command) {
    return `All ${GATE_REQUIREMENTS.length} gate checks passed. Uploading coverage with: ${formatReporterCommand(command)}`;
  }
  return ['Coverage upload skipped.', failedCheck?.detail].filter(Boolean).join(' ');
}

function skippedCheck(requirement: GateRequirement): GateCheckResult {
  return {
    id: requirement.id,
    label: requirement.label,
    status: 'skipped',
    expected: requirement.expected,
    actual: null,
    detail: 'Not evaluated: an earlier gate check failed.',
  };
}

// ─── Service ──────────────────────────────────────────────────────────────────

export interface ReportGateServiceOptions {
  workspaceRoot?: string;
  /**
   * Source of the one-shot snapshot and, unless `settings` is given, of the
   * settings. An unusable setting falls back to its default and is reported
   * through `settingIssues`; it never changes the verdict.
   */
  env?: NodeJS.ProcessEnv;
  settings?: ReportGateSettings;
  interpreterQuery?: InterpreterVersionQuery;
  reporterRunner?: ReporterRunner;
  now?: () => Date;
}

export class ReportGateService {
  readonly #workspaceRoot: string;
  readonly #snapshot: EnvironmentSnapshot;
  readonly #settings: ReportGateSettings;
  readonly #settingIssues: readonly ConfigIssue[];
  readonly #interpreterQuery: InterpreterVersionQuery;
  readonly #reporterRunner: ReporterRunner;
  readonly #now: () => Date;

  constructor(options: ReportGateServiceOptions = {}) {
    const env = options.env ?? process.env;
    this.#workspaceRoot = options.workspaceRoot ?? process.cwd();
    this.#snapshot = captureEnvironmentSnapshot(env);
    if (options.settings) {
      this.#settings = options.settings;
      this.#settingIssues = [];
    } else {
      const validation = validateGateSettings(env);
      this.#settings = validation.settings;
      this.#settingIssues = validation.issues;
    }
    this.#interpreterQuery = options.interpreterQuery ?? queryInterpreterMajorVersion;
    this.#reporterRunner = options.reporterRunner ?? runReporter;
    this.#now = options.now ?? (() => new Date());
  }

  get snapshot(): EnvironmentSnapshot {
    return this.#snapshot;
  }

  get settings(): ReportGateSettings {
    return this.#settings;
  }

  get settingIssues(): readonly ConfigIssue[] {
    return this.#settingIssues;
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  /** Evaluate every gate check without side effects beyond the version query. */
  async evaluate(): Promise<ReportGateReport> {
    const checks: GateCheckResult[] = [];
    let failedCheck: GateCheckResult | null = null;

    for (const requirement of GATE_REQUIREMENTS) {
      if (failedCheck) {
        checks.push(skippedCheck(requirement));
        continue;
      }

      const check =
        requirement.source === 'env'
          ? this.#runEnvCheck(requirement)
          : await this.#runInterpreterCheck(requirement);
      checks.push(check);

      if (check.status === 'failed') {
        failedCheck = check;
      }
    }

    const verdict: GateVerdict = failedCheck ? 'skip' : 'report';
    const command =
      verdict === 'report'
        ? buildReporterCommand(this.#settings.reporterBin, this.#snapshot.TRAVIS_TEST_RESULT)
        : null;

    return {
      reportVersion: 1,
      generatedAt: this.#now().toISOString(),
      verdict,
      checks,
      failedCheck,
      command,
      summary: buildSummary(failedCheck, command),
    };
  }

  /**
   * Evaluate the gate and, when it passes, run the reporter. The outcome's
   * `exitCode` is 0 for a skip or a dry run, else the reporter's own status.
   */
  async run(options: ReportGateRunOptions = {}): Promise<ReportGateOutcome> {
    const dryRun = options.dryRun ?? false;
    const report = await this.evaluate();

    if (report.command === null) {
      await logThought(`[ReportGate] ${report.summary}`);
      return { report, reporterRun: null, dryRun, exitCode: 0 };
    }

    const commandPreview = formatReporterCommand(report.command);
    if (dryRun) {
      await logThought(`[ReportGate] Dry run, not executing: ${commandPreview}`);
      return { report, reporterRun: null, dryRun, exitCode: 0 };
    }

    await logThought(`[ReportGate] Gate passed. Executing: ${commandPreview}`);
    const reporterRun = await this.#reporterRunner(report.command, this.#workspaceRoot);
    await logThought(
      reporterRun.spawnError
        ? `[ReportGate] Reporter could not be started (exit ${reporterRun.exitCode}): ${reporterRun.spawnError}`
        : `[ReportGate] Reporter exited with code ${reporterRun.exitCode} after ${reporterRun.durationMs}ms.`,
    );

    return { report, reporterRun, dryRun, exitCode: reporterRun.exitCode };
  }

  // ── Gate Checks ─────────────────────────────────────────────────────────────

  #runEnvCheck(requirement: EnvRequirement): GateCheckResult {
    const actual = this.#snapshot[requirement.key];
    const passed = actual === requirement.expected;
    const observed = actual.length === 0 ? 'is unset or empty' : `is '${actual}'`;

    return {
      id: requirement.id,
      label: requirement.label,
      status: passed ? 'passed' : 'failed',
      expected: requirement.expected,
      actual,
      detail: passed
        ? `${requirement.key} ${observed}.`
        : `${requirement.key} ${observed}, expected '${requirement.expected}'.`,
    };
  }

  async #runInterpreterCheck(requirement: InterpreterRequirement): Promise<GateCheckResult> {
    const { interpreter, queryTimeoutMs } = this.#settings;
    const version = await this.#interpreterQuery(interpreter, queryTimeoutMs);
    const passed = version.output === requirement.expected;

    let detail: string;
    if (passed) {
      detail = `${interpreter} reported major version '${version.output}'.`;
    } else if (version.ok) {
      detail = `${interpreter} reported major version '${version.output}', expected '${requirement.expected}'.`;
    } else {
      detail = `${version.detail} Expected major version '${requirement.expected}'.`;
    }

    return {
      id: requirement.id,
      label: requirement.label,
      status: passed ? 'passed' : 'failed',
      expected: requirement.expected,
      actual: version.output,
      detail,
    };
  }
}
