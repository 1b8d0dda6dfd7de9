import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { validateGateSettings } from '../config/env-validator.js';

const REDACTED = '[REDACTED]';
const MIN_SECRET_VALUE_LENGTH = 8;
const SENSITIVE_KEY_PATTERN = /(SECRET|TOKEN|PASSWORD|API_KEY|REPORTER_ID)/i;
const SENSITIVE_ASSIGNMENT_PATTERN =
  /\b([A-Z0-9_]*(?:SECRET|TOKEN|PASSWORD|API_KEY|REPORTER_ID)[A-Z0-9_]*)\s*=\s*("[^"]*"|'[^']*'|\S+)/gi;

let configuredLogDir: string | null | undefined;

/**
 * Pin the log directory for the rest of the process. `null` disables file
 * logging. Without a call, the directory is resolved from the environment on
 * every write.
 */
export function configureLogger(logDir: string | null): void {
  configuredLogDir = logDir;
}

export function resetLoggerForTests(): void {
  configuredLogDir = undefined;
}

function activeLogDir(): string | null {
  if (configuredLogDir !== undefined) {
    return configuredLogDir;
  }
  return validateGateSettings(process.env).settings.logDir;
}

/**
 * Redact secrets from free text: `KEY=value` pairs whose key names a secret,
 * and raw values of secret-named environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string, env: NodeJS.ProcessEnv = process.env): string {
  let scrubbed = text.replace(SENSITIVE_ASSIGNMENT_PATTERN, `$1=${REDACTED}`);

  for (const [key, value] of Object.entries(env)) {
    if (!value || value.length < MIN_SECRET_VALUE_LENGTH || !SENSITIVE_KEY_PATTERN.test(key)) {
      continue;
    }
    scrubbed = scrubbed.split(value).join(REDACTED);
  }

  return scrubbed;
}

async function appendEntry(render: (time: string) => string): Promise<void> {
  const logDir = activeLogDir();
  if (logDir === null) {
    return;
  }

  const iso = new Date().toISOString();
  const logPath = path.resolve(logDir, `${iso.slice(0, 10)}.md`);

  try {
    await mkdir(path.dirname(logPath), { recursive: true });
    await appendFile(logPath, render(iso.slice(11, 19)), 'utf8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ReportGate] Failed to write log entry to ${logPath}: ${message}`);
  }
}

export async function logThought(message: string): Promise<void> {
  await appendEntry((time) => `- [${time}] ${scrubSensitiveText(message)}\n`);
}

export async function logSystemCommand(command: string, output: string, exitCode: number): Promise<void> {
  const body = scrubSensitiveText(output.trim() || '(no output)');
  await appendEntry(
    (time) =>
      `- [${time}] \`$ ${scrubSensitiveText(command)}\` → exit ${exitCode}\n\n` +
      '```text\n' +
      `${body}\n` +
      '```\n\n',
  );
}
