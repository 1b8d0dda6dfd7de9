import { ReportGateService } from '../services/report-gate.js';
import type { ReportGateServiceOptions } from '../services/report-gate.js';
import { formatReporterCommand } from '../services/reporter-runner.js';
import type { ReportGateOutcome } from '../types/report-gate.js';
import { configureLogger, logThought } from '../utils/logger.js';

// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: report-gate [options]

Runs "cc-test-reporter after-build --exit-code $TRAVIS_TEST_RESULT" only when
every gate holds:
  TRAVIS_OS_NAME          == linux
  python major version    == 2
  TRAVIS_PULL_REQUEST     == false
  TRAVIS_BRANCH           == master
  TRAVIS_SECURE_ENV_VARS  == true

Options:
  --json        Print the full gate outcome as JSON on stdout
  --dry-run     Evaluate the gate and show the reporter command without running it
  --help, -h    Show this help message

Settings (environment):
  CC_TEST_REPORTER_BIN          Reporter executable (default: ./cc-test-reporter)
  REPORT_GATE_PYTHON            Interpreter to query (default: python)
  REPORT_GATE_QUERY_TIMEOUT_MS  Version query timeout (default: 15000)
  REPORT_GATE_LOG_DIR           Daily log directory (default: off)

An unusable setting is reported on stderr and replaced by its default.

Exit codes:
  0    gate skipped, dry run, or reporter succeeded
  1    unknown option
  n    the reporter's own exit status
`.trim();

// ── Argument parsing ─────────────────────────────────────────────────────────

export interface ParsedArgs {
  help: boolean;
  json: boolean;
  dryRun: boolean;
  unknown: string[];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { help: false, json: false, dryRun: false, unknown: [] };

  for (const token of argv) {
    if (token === '--help' || token === '-h') {
      parsed.help = true;
      continue;
    }
    if (token === '--json') {
      parsed.json = true;
      continue;
    }
    if (token === '--dry-run') {
      parsed.dryRun = true;
      continue;
    }
    parsed.unknown.push(token);
  }

  return parsed;
}

// ── Output ───────────────────────────────────────────────────────────────────

export function formatHumanSummary(outcome: ReportGateOutcome): string[] {
  const { report, reporterRun } = outcome;
  const lines = [`[ReportGate] ${report.summary}`];

  if (report.command === null) {
    return lines;
  }

  if (outcome.dryRun) {
    lines.push(`[ReportGate] Dry run: ${formatReporterCommand(report.command)} was not executed.`);
    return lines;
  }

  if (reporterRun?.spawnError) {
    lines.push(`[ReportGate] Reporter could not be started: ${reporterRun.spawnError}`);
  } else if (reporterRun?.signal) {
    lines.push(`[ReportGate] Reporter was terminated by ${reporterRun.signal}.`);
  }
  lines.push(`[ReportGate] Exit code: ${outcome.exitCode}`);
  return lines;
}

// ── Entry ────────────────────────────────────────────────────────────────────

/**
 * Run the gate for `argv` and return the process exit code. Human-readable
 * lines go to stderr; stdout is reserved for `--help` and `--json`.
 */
export async function runReportGateCli(
  argv: string[],
  options: ReportGateServiceOptions = {},
): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (args.unknown.length > 0) {
    console.error(`[ReportGate] Unknown argument(s): ${args.unknown.join(' ')}`);
    console.error(HELP_TEXT);
    return 1;
  }

  const service = new ReportGateService(options);
  configureLogger(service.settings.logDir);

  for (const issue of service.settingIssues) {
    const warning = `[ReportGate] Ignoring invalid setting: ${issue.message} Using the default.`;
    console.error(warning);
    await logThought(warning);
  }

  const outcome = await service.run({ dryRun: args.dryRun });

  if (args.json) {
    console.log(JSON.stringify(outcome, null, 2));
  }
  for (const line of formatHumanSummary(outcome)) {
    console.error(line);
  }

  return outcome.exitCode;
}
