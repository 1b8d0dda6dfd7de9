#!/usr/bin/env node
import 'dotenv/config';
import { runReportGateCli } from './core/cli.js';
import { logThought } from './utils/logger.js';

async function main(): Promise<void> {
  try {
    process.exitCode = await runReportGateCli(process.argv.slice(2));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ReportGate] Unexpected failure: ${message}`);
    await logThought(`[ReportGate] Unexpected failure: ${message}`);
    process.exitCode = 1;
  }
}

void main();
