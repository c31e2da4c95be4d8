#!/usr/bin/env node
/**
 * Analyze one window of exported telemetry and print the result as JSON.
 *
 * Usage:
 *   npx tsx src/scripts/analyze-telemetry.ts <input.json> [--output <file>] [--system-tables]
 *
 * The input file holds `{ "job_runs": [...], "cluster_samples": [...] }`.
 * With --system-tables the rows are read as job run timeline / node timeline
 * rows and mapped before normalization.
 *
 * Env vars: LONG_RUNNING_MINUTES_THRESHOLD, FAILURE_RATE_THRESHOLD,
 * TOP_N_LONG_RUNNING, TOP_N_HIGH_FAILURE, CLUSTER_*_PCT, LOG_LEVEL
 */

import { realpathSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import { analyzeTelemetryWindow, type TelemetryAnalysis } from '../services/telemetry-analyzer.js';
import { fromJobRunTimelineRow, fromNodeTimelineRow } from '../services/system-table-rows.js';
import { createChildLogger } from '../utils/logger.js';

const log = createChildLogger('analyze-telemetry');

const InputFileSchema = z.object({
  job_runs: z.array(z.unknown()).default([]),
  cluster_samples: z.array(z.unknown()).default([]),
});

export interface CliArgs {
  inputPath: string;
  outputPath: string | null;
  systemTables: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  let inputPath: string | null = null;
  let outputPath: string | null = null;
  let systemTables = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--system-tables') {
      systemTables = true;
    } else if (arg === '--output' || arg === '-o') {
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`${arg} requires a file path`);
      outputPath = value;
      i++;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (inputPath === null) {
      inputPath = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (inputPath === null) {
    throw new Error('Usage: analyze-telemetry <input.json> [--output <file>] [--system-tables]');
  }
  return { inputPath, outputPath, systemTables };
}

export async function runAnalysis(
  args: CliArgs,
): Promise<TelemetryAnalysis & { generated_at: string }> {
  const raw = await readFile(args.inputPath, 'utf8');
  const parsed = InputFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid input file ${args.inputPath}:\n${errors}`);
  }

  const { job_runs: jobRuns, cluster_samples: clusterSamples } = parsed.data;
  const analysis = analyzeTelemetryWindow({
    jobRuns: args.systemTables ? jobRuns.map(fromJobRunTimelineRow) : jobRuns,
    clusterSamples: args.systemTables ? clusterSamples.map(fromNodeTimelineRow) : clusterSamples,
  });

  return { generated_at: new Date().toISOString(), ...analysis };
}

async function main(): Promise<void> {
  try {
    const args = parseArgs(process.argv.slice(2));
    const report = await runAnalysis(args);
    const json = `${JSON.stringify(report, null, 2)}\n`;

    if (args.outputPath) {
      await writeFile(args.outputPath, json, 'utf8');
      log.info({ output: args.outputPath }, 'Analysis written');
    } else {
      process.stdout.write(json);
    }
  } catch (err) {
    log.error({ err }, 'Telemetry analysis failed');
    process.exitCode = 1;
  }
}

// Run only when executed directly (including through the npm bin symlink)
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  void main();
}
