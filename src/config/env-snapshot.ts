import type { EnvironmentSnapshot } from '../types/report-gate.js';

/**
 * Read the Travis variables once. Values are copied verbatim (no trimming, no
 * case folding) and unset keys become the empty string.
 */
export function captureEnvironmentSnapshot(env: NodeJS.ProcessEnv = process.env): EnvironmentSnapshot {
  return Object.freeze({
    TRAVIS_OS_NAME: env.TRAVIS_OS_NAME ?? '',
    TRAVIS_PULL_REQUEST: env.TRAVIS_PULL_REQUEST ?? '',
    TRAVIS_BRANCH: env.TRAVIS_BRANCH ?? '',
    TRAVIS_SECURE_ENV_VARS: env.TRAVIS_SECURE_ENV_VARS ?? '',
    TRAVIS_TEST_RESULT: env.TRAVIS_TEST_RESULT ?? '',
  });
}
