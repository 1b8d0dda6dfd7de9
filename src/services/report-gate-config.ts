import type { GateCheckId, TravisEnvKey } from '../types/report-gate.js';

// ─── Gate Requirements ────────────────────────────────────────────────────────

interface RequirementBase {
  id: GateCheckId;
  label: string;
  /** Exact, case-sensitive literal the observed value must equal. */
  expected: string;
}

export interface EnvRequirement extends RequirementBase {
  source: 'env';
  key: TravisEnvKey;
}

export interface InterpreterRequirement extends RequirementBase {
  source: 'interpreter';
}

export type GateRequirement = EnvRequirement | InterpreterRequirement;

/**
 * Evaluated in this order; evaluation stops at the first failure, so the
 * interpreter is never spawned on non-linux hosts.
 */
export const GATE_REQUIREMENTS: readonly GateRequirement[] = [
  {
    id: 'os-name',
    label: 'Linux build host',
    source: 'env',
    key: 'TRAVIS_OS_NAME',
    expected: 'linux',
  },
  {
    id: 'interpreter-major',
    label: 'Python 2 interpreter',
    source: 'interpreter',
    expected: '2',
  },
  {
    id: 'pull-request',
    label: 'Push build (not a pull request)',
    source: 'env',
    key: 'TRAVIS_PULL_REQUEST',
    expected: 'false',
  },
  {
    id: 'branch',
    label: 'master branch',
    source: 'env',
    key: 'TRAVIS_BRANCH',
    expected: 'master',
  },
  {
    id: 'secure-env-vars',
    label: 'Secure variables available',
    source: 'env',
    key: 'TRAVIS_SECURE_ENV_VARS',
    expected: 'true',
  },
];

// ─── Reporter Invocation ──────────────────────────────────────────────────────

export const REPORTER_SUBCOMMAND = 'after-build';
export const REPORTER_EXIT_CODE_FLAG = '--exit-code';
