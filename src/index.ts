#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import process from 'node:process';
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import cliProgress from 'cli-progress';
import { type CliOptions, needsCatalog, parseArgs, printHelp } from './args.js';
import { SpotifyCatalog } from './catalog.js';
import { type AppConfig, RETRY_FOLDER_NAME, ledgerPathFor, loadConfig, requireCredentials } from './config.js';
import { configureFfmpeg } from './download.js';
import { isDownloaderError, toErrorMessage } from './errors.js';
import { type BatchSummary, persistLedger, retryFailed, summarize } from './ledger.js';
import { createNotifier } from './notify.js';
import { DownloadOrchestrator, createCollaborators, orchestratorOptionsFrom } from './orchestrator.js';
import { InMemoryProgressStore } from './progress.js';
import type { DownloadOutcome, RunProgress } from './types.js';
import {
  type Logger,
  cleanupTempFiles,
  consoleLogger,
  createPlaylistDirectory,
  logFailure,
  logPlaylistSummary,
  parsePlaylistLocator,
} from './utils.js';
import { startWebServer } from './web.js';

const TEMP_MAX_AGE_MS = 24 * 60 * 60 * 1000;

/**
 * Builds the configuration, applying CLI overrides through the same env-driven loader.
 */
const resolveConfig = (options: CliOptions): AppConfig =>
  loadConfig({
    ...process.env,
    ...(options.outputDir ? { DOWNLOADS_DIR: options.outputDir } : {}),
    ...(options.port ? { PORT: String(options.port) } : {}),
  });

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

/**
 * A multi-bar with one running-count bar; log lines are printed above it.
 */
const createProgressDisplay = (
  total: number,
): { logger: Logger; onProgress: (progress: RunProgress) => void; stop: () => void } => {
  const multiBar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {value}/{total} | ✅ {success} ⏭️ {skipped} ❌ {failed} | {title}',
    },
    cliProgress.Presets.shades_grey,
  );
  const bar = multiBar.create(total, 0, { success: 0, skipped: 0, failed: 0, title: '' });

  const write = (message: string): void => {
    multiBar.log(`${message}\n`);
  };

  return {
    logger: { info: write, warn: write, error: write },
    onProgress: (progress) => {
      bar.update(progress.index, {
        success: progress.successCount,
        skipped: progress.skippedCount,
        failed: progress.failedCount,
        title: truncateTitle(progress.current),
      });
    },
    stop: () => multiBar.stop(),
  };
};

/**
 * Summarizes overall processing results at the end of the execution.
 */
const printSummary = (outcomes: readonly DownloadOutcome[], summary: BatchSummary): void => {
  console.log('\nDownload summary');
  console.table(
    outcomes.map((outcome, index) => ({
      '#': index + 1,
      Query: outcome.track.searchQuery,
      Status: outcome.status,
      Reason: outcome.reason ?? '',
      File: outcome.filePath ? path.basename(outcome.filePath) : '',
    })),
  );
  console.log(
    `Totals => processed: ${outcomes.length}, completed: ${summary.successCount}, skipped: ${summary.skippedCount}, failed: ${summary.failedCount}`,
  );
  if (summary.failedTracks.length > 0) {
    console.log('\nFailed searches:');
    for (const track of summary.failedTracks) {
      console.log(`  - ${track.searchQuery}`);
    }
  }
};

/**
 * Persists whatever is unfinished and exits when the process is interrupted.
 */
const installSignalHandlers = (orchestrator: DownloadOrchestrator, ledgerPath: string): (() => void) => {
  const handler = (signal: NodeJS.Signals): void => {
    console.warn(`\n⚠️  Received ${signal}, saving unfinished tracks...`);
    orchestrator.stop();
    persistLedger(orchestrator.unfinished(), ledgerPath).then(
      () => {
        console.warn(`💾 Saved unfinished tracks to: ${ledgerPath}`);
        process.exit(130);
      },
      (error: unknown) => {
        console.error(`Could not save retry ledger: ${toErrorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
};

/**
 * Downloads one playlist into `<output root>/<playlist name>/` and rewrites the ledger.
 */
const runDownloadSession = async (config: AppConfig, locator: string): Promise<void> => {
  const playlistId = parsePlaylistLocator(locator);
  const catalog = SpotifyCatalog.fromConfig(config, consoleLogger);

  console.log(`📋 Fetching playlist: ${playlistId}`);
  const playlist = await catalog.loadPlaylist(playlistId);
  console.log(`📋 Playlist: ${playlist.meta.name}`);
  console.log(`👤 Owner: ${playlist.meta.owner}`);
  console.log(`📊 Total tracks: ${playlist.tracks.length}`);
  if (playlist.skippedCount > 0) {
    console.log(`⏭️  Ignored ${playlist.skippedCount} local file(s) or episode(s)`);
  }
  if (playlist.tracks.length === 0) {
    console.error('No downloadable tracks found in the playlist.');
    return;
  }

  const targetDir = await createPlaylistDirectory(config.downloadsDir, playlist.meta.name, config.maxFileNameLength);
  console.log(`📁 Download path: ${targetDir}`);

  const display = createProgressDisplay(playlist.tracks.length);
  const orchestrator = new DownloadOrchestrator(
    createCollaborators(config, display.logger),
    orchestratorOptionsFrom(config, {
      logger: display.logger,
      notifier: await createNotifier(config.isTermux, consoleLogger),
      playlistName: playlist.meta.name,
      onProgress: display.onProgress,
    }),
  );
  const ledgerPath = ledgerPathFor(config);
  const removeHandlers = installSignalHandlers(orchestrator, ledgerPath);

  let outcomes: DownloadOutcome[];
  try {
    outcomes = await orchestrator.run(playlist.tracks, targetDir);
  } finally {
    display.stop();
    removeHandlers();
  }

  const summary = summarize(outcomes);
  printSummary(outcomes, summary);
  await persistLedger(summary.failedTracks, ledgerPath);
  if (summary.failedCount > 0) {
    console.log(`💾 Failed downloads saved to: ${ledgerPath}`);
  }
  await logPlaylistSummary(config.downloadsDir, playlist.meta.name, playlist.tracks.length, summary.successCount);
};

/**
 * Retries the ledger's tracks into the retry folder.
 */
const runRetrySession = async (config: AppConfig): Promise<void> => {
  const ledgerPath = ledgerPathFor(config);
  const targetDir = path.join(config.downloadsDir, RETRY_FOLDER_NAME);
  const orchestrator = new DownloadOrchestrator(
    createCollaborators(config, consoleLogger),
    orchestratorOptionsFrom(config, {
      notifier: await createNotifier(config.isTermux, consoleLogger),
    }),
  );
  const removeHandlers = installSignalHandlers(orchestrator, ledgerPath);

  let summary: BatchSummary | null;
  try {
    summary = await retryFailed(orchestrator, ledgerPath, targetDir);
  } finally {
    removeHandlers();
  }

  if (!summary) {
    console.log('📝 No failed downloads file found');
    return;
  }
  const attempted = summary.successCount + summary.skippedCount + summary.failedCount;
  if (attempted === 0) {
    console.log('📝 No failed downloads to retry');
    return;
  }
  console.log(`\n🔄 Retry completed: ${summary.successCount}/${attempted} successful`);
  if (summary.failedCount > 0) {
    console.log(`💾 ${summary.failedCount} track(s) still failing, kept in ${ledgerPath}`);
  }
};

const runServer = (config: AppConfig): void => {
  startWebServer({
    config,
    store: new InMemoryProgressStore(),
    logger: consoleLogger,
    catalog: SpotifyCatalog.fromConfig(config, consoleLogger),
    collaborators: createCollaborators(config, consoleLogger),
  });
};

/**
 * Presents an interactive menu so the user can choose what to run.
 */
const promptForMode = async (): Promise<'download' | 'retry' | 'exit'> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    for (;;) {
      console.log('\nOptions:');
      console.log('  1. Download playlist');
      console.log('  2. Retry failed downloads');
      console.log('  3. Exit');
      const answer = (await rl.question('Enter choice (1-3): ')).trim();
      if (answer === '1') {
        return 'download';
      }
      if (answer === '2') {
        return 'retry';
      }
      if (answer === '3' || answer === 'q') {
        return 'exit';
      }
      console.log('Invalid selection, please enter 1, 2, or 3.');
    }
  } finally {
    rl.close();
  }
};

const promptForPlaylist = async (): Promise<string> => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    return (await rl.question('Enter Spotify playlist URL: ')).trim();
  } finally {
    rl.close();
  }
};

const interactiveLoop = async (config: AppConfig): Promise<void> => {
  for (;;) {
    const mode = await promptForMode();
    if (mode === 'exit') {
      console.log('👋 Goodbye!');
      return;
    }
    try {
      if (mode === 'download') {
        await runDownloadSession(config, await promptForPlaylist());
      } else {
        await runRetrySession(config);
      }
    } catch (error) {
      if (isDownloaderError(error) && error.category === 'CredentialsMissing') {
        throw error;
      }
      console.error(`❌ ${isDownloaderError(error) ? error.toUserMessage() : toErrorMessage(error)}`);
    }
  }
};

/**
 * Entry point that orchestrates CLI argument parsing, prompting, and session control.
 */
const main = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  if (options.mode === 'help') {
    printHelp();
    return;
  }

  const config = resolveConfig(options);
  if (needsCatalog(options.mode)) {
    requireCredentials(config);
  }
  configureFfmpeg(config.ffmpegPath);
  await cleanupTempFiles(config.tempDir, TEMP_MAX_AGE_MS, consoleLogger);

  switch (options.mode) {
    case 'download':
      await runDownloadSession(config, options.playlist ?? '');
      break;
    case 'retry':
      await runRetrySession(config);
      break;
    case 'serve':
      runServer(config);
      break;
    case 'interactive':
      await interactiveLoop(config);
      break;
  }
};

main().catch(async (error: unknown) => {
  const message = isDownloaderError(error) ? error.toUserMessage() : toErrorMessage(error);
  console.error(`Fatal error: ${message}`);
  try {
    await logFailure(loadConfig().downloadsDir, `Fatal :: ${message}`);
  } catch (logError) {
    console.error(`Could not write error log: ${toErrorMessage(logError)}`);
  }
  process.exit(1);
});
