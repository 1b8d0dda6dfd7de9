// ─── Environment Snapshot ────────────────────────────────────────────────────

export type TravisEnvKey =
  | 'TRAVIS_OS_NAME'
  | 'TRAVIS_PULL_REQUEST'
  | 'TRAVIS_BRANCH'
  | 'TRAVIS_SECURE_ENV_VARS'
  | 'TRAVIS_TEST_RESULT';

/**
 * Values of the Travis variables as they stood when the snapshot was taken.
 * Unset variables are recorded as the empty string.
 */
export type EnvironmentSnapshot = Readonly<Record<TravisEnvKey, string>>;

// ─── Gate Checks ─────────────────────────────────────────────────────────────

export type GateCheckId =
  | 'os-name'
  | 'interpreter-major'
  | 'pull-request'
  | 'branch'
  | 'secure-env-vars';

export type GateCheckStatus = 'passed' | 'failed' | 'skipped';

export type GateVerdict = 'report' | 'skip';

export interface GateCheckResult {
  id: GateCheckId;
  label: string;
  status: GateCheckStatus;
  expected: string;
  /** `null` when the check was never evaluated. */
  actual: string | null;
  detail: string;
}

// ─── Reporter Invocation ─────────────────────────────────────────────────────

export interface ReporterCommand {
  executable: string;
  args: string[];
}

export interface ReporterRunResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
  durationMs: number;
  /** Set when the process could not be started at all. */
  spawnError?: string;
}

export type ReporterRunner = (command: ReporterCommand, cwd: string) => Promise<ReporterRunResult>;

// ─── Interpreter Version ───────────────────────────────────────────────────────

export interface InterpreterVersionResult {
  /** Captured stdout with trailing newlines removed. Empty when nothing was printed. */
  output: string;
  ok: boolean;
  detail: string;
}

export type InterpreterVersionQuery = (interpreter: string, timeoutMs: number) => Promise<InterpreterVersionResult>;

// ─── Gate Report ─────────────────────────────────────────────────────────────

export interface ReportGateReport {
  reportVersion: 1;
  generatedAt: string;
  verdict: GateVerdict;
  checks: GateCheckResult[];
  failedCheck: GateCheckResult | null;
  command: ReporterCommand | null;
  summary: string;
}

export interface ReportGateOutcome {
  report: ReportGateReport;
  reporterRun: ReporterRunResult | null;
  dryRun: boolean;
  exitCode: number;
}

export interface ReportGateRunOptions {
  /** Evaluate the gate and describe the command without starting it. */
  dryRun?: boolean;
}

// ─── Settings ────────────────────────────────────────────────────────────────

export interface ReportGateSettings {
  reporterBin: string;
  interpreter: string;
  queryTimeoutMs: number;
  /** `null` disables file logging. */
  logDir: string | null;
}
