#!/usr/bin/env node
/**
 * Appointments ETL CLI
 *
 * Loads appointments from the scheduling system into the analytics database.
 * The load wipes and rebuilds the analytics schema, so it asks first unless
 * --yes is given.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora, { Ora } from 'ora';
import { DestinationConnectionManager } from '../lib/database-connections';
import { getConfig, getConfigForLogging, configUtils } from '../lib/environment-config';
import { getLogger, initializeLogging, parseLogLevel } from '../lib/error-handler';
import { AppointmentExtractor } from '../services/appointment-extractor';
import { AppointmentsEtlService, EtlRunReport } from '../services/appointments-etl-service';
import { LoadOrchestrator } from '../services/load-orchestrator';
import { SchemaBuilder } from '../services/schema-builder';
import { NameDatasetSexInferrer } from '../services/sex-inference';

interface RunCommandOptions {
  yes?: boolean;
  logLevel?: string;
  fileLogging: boolean;
}

/**
 * Format duration for display
 */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

async function confirmDestructiveLoad(recordCount: number): Promise<boolean> {
  console.log(chalk.green(`✅ ${recordCount.toLocaleString()} records extracted`));

  const answers = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: 'WARNING: this deletes ALL data in the analytics database and recreates its structure. Continue?',
      default: false
    }
  ]);

  return answers.proceed;
}

/**
 * Display run results
 */
export function displayReport(report: EtlRunReport): void {
  console.log('');
  console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
  console.log(`📊 Run ID: ${report.runId}`);
  console.log(`📥 Extracted: ${report.recordsExtracted.toLocaleString()}`);

  switch (report.outcome) {
    case 'loaded':
      if (report.summary) {
        console.log(`👤 Patients: ${report.summary.patientsResolved.toLocaleString()}`);
        console.log(`🩺 Services: ${report.summary.servicesResolved.toLocaleString()}`);
        console.log(`🔗 Appointment/service links: ${report.summary.appointmentServicesLinked.toLocaleString()}`);
        console.log(chalk.green(`✅ Done. ${report.summary.appointmentsLoaded.toLocaleString()} records processed and inserted.`));
      }
      break;
    case 'no_data':
      console.log(chalk.yellow(
        report.noDataReason === 'extraction_failed'
          ? `⚠️  No data to process: extraction failed (${report.error?.message ?? 'unknown error'})`
          : '⚠️  No data to process: the source returned no appointments'
      ));
      break;
    case 'cancelled':
      console.log(chalk.yellow('⚠️  Operation cancelled by the user. The analytics database was not touched.'));
      break;
    case 'failed':
      console.error(chalk.red(
        report.error?.code === 'INVALID_SOURCE_ROW'
          ? '❌ Source data rejected. The analytics database was not touched.'
          : '❌ An error occurred and the transaction was rolled back.'
      ));
      if (report.error) {
        console.error(chalk.red(`   ${report.error.message}`));
        if (report.error.cause) {
          console.error(chalk.red(`   Caused by ${report.error.cause.name}: ${report.error.cause.message}`));
        }
      }
      break;
  }

  console.log(`⏱️  Duration: ${formatDuration(report.durationMs)}`);
  console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n`);
}

async function handleRunCommand(options: RunCommandOptions): Promise<number> {
  const config = getConfig();
  const logger = initializeLogging({
    level: parseLogLevel(options.logLevel ?? config.logging.level),
    enableFile: options.fileLogging && config.logging.enableFileLogging,
    logDirectory: config.logging.logDirectory,
    enableStructuredLogging: true
  });

  logger.debug('Loaded configuration', getConfigForLogging());

  console.log(chalk.blue('🚀 Appointments ETL'));
  console.log(`   Source:      ${configUtils.getMaskedConnectionString('source')}`);
  console.log(`   Destination: ${configUtils.getMaskedConnectionString('destination')}\n`);

  const destination = new DestinationConnectionManager(config.destination);
  const orchestrator = new LoadOrchestrator(destination, new SchemaBuilder(logger), new NameDatasetSexInferrer(), logger);
  const service = new AppointmentsEtlService(new AppointmentExtractor(config.source, logger), orchestrator, logger);

  const progress: { spinner: Ora | null } = { spinner: null };

  try {
    const report = await service.run({
      confirm: options.yes ? undefined : confirmDestructiveLoad,
      onProgress: (processed, total) => {
        const spinner = progress.spinner ?? ora(`Loading 0/${total}`).start();
        progress.spinner = spinner;
        spinner.text = `Loading ${processed.toLocaleString()}/${total.toLocaleString()}`;
        if (processed === total) {
          spinner.succeed(`Loaded ${total.toLocaleString()} records`);
        }
      }
    });

    if (progress.spinner?.isSpinning) {
      progress.spinner.fail('Load failed');
    }

    displayReport(report);
    return report.status === 'success' ? 0 : 1;
  } finally {
    await destination.close();
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('appointments-etl')
    .description('Load scheduling appointments into the analytics database')
    .version('1.0.0');

  program
    .command('run')
    .description('Extract appointments, rebuild the analytics schema and load them')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('-l, --log-level <level>', 'Log level (debug|info|warn|error)')
    .option('--no-file-logging', 'Disable file logging for this run')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await handleRunCommand(options);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      getLogger().error('Appointments ETL aborted', error);
      console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    });
}
