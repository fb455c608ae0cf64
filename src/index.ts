#!/usr/bin/env node
import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import ora from 'ora';
import { DEFAULT_CONFIG_FILE, loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { FfmpegFrameSampler } from './frame-sampler.js';
import { logger } from './logger.js';
import { runScan } from './pipeline.js';
import {
  DUPLICATES_REPORT_FILE,
  JUNK_REPORT_FILE,
  buildDuplicatesReport,
  buildJunkReport,
  formatFileSize,
  writeReport,
} from './report.js';
import { openStore } from './store.js';
import type { Config } from './types.js';

interface CliArgs {
  command: string;
  positional: string[];
  configFile: string;
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let configFile = process.env.MEDIA_DEDUPE_CONFIG ?? DEFAULT_CONFIG_FILE;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--config' && argv[i + 1]) {
      configFile = argv[++i];
      continue;
    }

    positional.push(argv[i]);
  }

  return { command: positional[0] ?? 'all', positional: positional.slice(1), configFile };
}

async function runScanCommand(config: Config, root?: string): Promise<void> {
  console.log(chalk.cyan('\n🔍 Media Scanner\n'));

  const store = openStore(config.dbPath);
  const sampler = new FfmpegFrameSampler({ timeoutMs: config.frameTimeoutMs });
  const controller = new AbortController();
  const onSigint = () => {
    console.log(chalk.yellow('\nStopping after the files in progress...'));
    controller.abort();
  };

  process.once('SIGINT', onSigint);

  const spinner = ora('Discovering media files...').start();
  const progressBar = new cliProgress.SingleBar({
    format: 'Signing |{bar}| {percentage}% | {value}/{total} files | {eta}s remaining',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  let barStarted = false;

  try {
    const result = await runScan({
      config,
      store,
      sampler,
      root,
      signal: controller.signal,
      onDiscovered: (total, queued) => {
        spinner.succeed(`Found ${total} media files, ${queued} to sign`);
        if (queued > 0) {
          progressBar.start(queued, 0);
          barStarted = true;
        }
      },
      onProgress: (done) => {
        progressBar.update(done);
      },
    });

    if (barStarted) {
      progressBar.stop();
    }

    console.log(chalk.green(result.aborted ? '\n⚠ Scan interrupted' : '\n✓ Scan complete!'));
    console.log(chalk.gray(`  New: ${result.new}  Changed: ${result.changed}  Unchanged: ${result.unchanged}`));
    console.log(chalk.gray(`  Removed since last scan: ${result.tombstoned}`));
    console.log(chalk.gray(`  Signed: ${result.signed}  Errors: ${result.errors}  Junk: ${result.junk}`));
    console.log(chalk.gray(`  Duplicate groups: ${result.exactGroups} exact, ${result.nearGroups} near`));

    for (const dir of result.skippedDirectories) {
      console.log(chalk.yellow(`  Skipped unreadable directory: ${dir}`));
    }

    for (const failure of result.failures) {
      console.log(chalk.red(`  ${failure.stage} failure: ${failure.path}: ${failure.message}`));
    }

    if (result.clusterError) {
      console.log(chalk.red(`  Clustering failed: ${result.clusterError}`));
    }
  } catch (error) {
    if (barStarted) {
      progressBar.stop();
    }
    if (spinner.isSpinning) {
      spinner.fail('Failed to scan');
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
    store.close();
  }
}

async function runDupesCommand(config: Config): Promise<void> {
  console.log(chalk.cyan('\n🔎 Duplicate Groups\n'));

  const store = openStore(config.dbPath);

  try {
    const report = buildDuplicatesReport(store);

    if (report.totalGroups === 0) {
      console.log(chalk.yellow('No duplicate groups. Run "npm run scan" first.'));
      return;
    }

    for (const group of report.groups) {
      const label = group.relation === 'exact' ? chalk.red('exact') : chalk.yellow(`near ≤${group.threshold}`);
      console.log(`${label} ${chalk.white(group.canonical)}`);

      for (const file of group.files) {
        if (file !== group.canonical) {
          console.log(chalk.gray(`    ${file}`));
        }
      }
    }

    const reclaimable = report.groups.reduce((sum, group) => sum + group.reclaimableBytes, 0);
    const target = await writeReport(config.dataDir, DUPLICATES_REPORT_FILE, report);

    console.log(chalk.gray(`\n${report.totalGroups} groups, ${formatFileSize(reclaimable)} in non-canonical copies`));
    console.log(chalk.gray(`Results saved to: ${target}`));
  } finally {
    store.close();
  }
}

async function runJunkCommand(config: Config): Promise<void> {
  console.log(chalk.cyan('\n🗑  Junk Files\n'));

  const store = openStore(config.dbPath);

  try {
    const report = buildJunkReport(store);

    if (report.totalFiles === 0) {
      console.log(chalk.green('No junk files found.'));
      return;
    }

    for (const file of report.files) {
      console.log(`${chalk.yellow(file.reason.padEnd(22))} ${file.path} ${chalk.gray(formatFileSize(file.size))}`);
    }

    const target = await writeReport(config.dataDir, JUNK_REPORT_FILE, report);

    console.log(chalk.gray(`\nNo files have been deleted. Results saved to: ${target}`));
  } finally {
    store.close();
  }
}

function runStatsCommand(config: Config): void {
  const store = openStore(config.dbPath);

  try {
    const stats = store.getStats();

    console.log(chalk.cyan('\n📊 Library Stats\n'));
    console.log(`  Files:        ${stats.totalFiles} (${stats.images} images, ${stats.videos} videos)`);
    console.log(`  Total size:   ${formatFileSize(stats.totalSize)}`);
    console.log(`  Signed:       ${stats.signed}`);
    console.log(`  Errors:       ${stats.errors}`);
    console.log(`  Junk:         ${stats.junk}`);
    console.log(`  Groups:       ${stats.exactGroups} exact, ${stats.nearGroups} near (${stats.filesInGroups} files)`);
    console.log(`  Tombstoned:   ${stats.removed}`);
  } finally {
    store.close();
  }
}

async function runPurgeCommand(config: Config): Promise<void> {
  const store = openStore(config.dbPath);

  try {
    const { removed } = store.getStats();

    if (removed === 0) {
      console.log(chalk.green('Nothing to purge.'));
      return;
    }

    const proceed = await confirm({
      message: `Permanently forget ${removed} files that are no longer on disk?`,
      default: false,
    });

    if (!proceed) {
      console.log(chalk.yellow('Purge cancelled.'));
      return;
    }

    const result = store.purgeRemoved();
    console.log(chalk.green(`Purged ${result.filesPurged} files and ${result.groupsPurged} retired groups.`));
  } finally {
    store.close();
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = await loadConfig(args.configFile);

  logger.setLevel(config.logLevel);

  switch (args.command) {
    case 'scan':
      await runScanCommand(config, args.positional[0]);
      break;

    case 'dupes':
      await runDupesCommand(config);
      break;

    case 'junk':
      await runJunkCommand(config);
      break;

    case 'stats':
      runStatsCommand(config);
      break;

    case 'purge':
      await runPurgeCommand(config);
      break;

    case 'all':
      await runScanCommand(config, args.positional[0]);
      await runDupesCommand(config);
      await runJunkCommand(config);
      break;

    default:
      console.error(chalk.red(`Unknown command: ${args.command}`));
      console.error(chalk.gray('Commands: scan [root], dupes, junk, stats, purge, all'));
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red(errorMessage(error)));
  process.exitCode = 1;
});
