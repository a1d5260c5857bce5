import path from 'node:path';

export type CliMode = 'download' | 'retry' | 'serve' | 'interactive' | 'help';

export interface CliOptions {
  readonly mode: CliMode;
  readonly playlist?: string;
  readonly outputDir?: string;
  readonly port?: number;
}

/**
 * Parses incoming CLI arguments and resolves the effective execution mode.
 */
export const parseArgs = (argv: readonly string[], cwd: string = process.cwd()): CliOptions => {
  let playlist: string | undefined;
  let outputDir: string | undefined;
  let port: number | undefined;
  let retry = false;
  let serve = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { mode: 'help' };
      case '--output':
      case '-o': {
        const next = argv[i + 1];
        if (next) {
          outputDir = path.resolve(cwd, next);
          i += 1;
        }
        break;
      }
      case '--retry':
      case '-r':
        retry = true;
        break;
      case '--serve':
        serve = true;
        break;
      case '--port':
      case '-p': {
        const parsed = Number.parseInt(argv[i + 1] ?? '', 10);
        if (!Number.isNaN(parsed) && parsed > 0) {
          port = parsed;
        }
        i += 1;
        break;
      }
      default: {
        if (arg.startsWith('--output=')) {
          outputDir = path.resolve(cwd, arg.slice('--output='.length));
        } else if (!arg.startsWith('-') && !playlist) {
          playlist = arg;
        }
        break;
      }
    }
  }

  if (serve) {
    return { mode: 'serve', outputDir, port };
  }
  if (retry) {
    return { mode: 'retry', outputDir };
  }
  if (playlist) {
    return { mode: 'download', playlist, outputDir };
  }
  return { mode: 'interactive', outputDir };
};

/**
 * Modes that talk to the Spotify catalog and so cannot start without credentials.
 * A retry reads its tracks from the ledger instead.
 */
export const needsCatalog = (mode: CliMode): boolean =>
  mode === 'download' || mode === 'serve' || mode === 'interactive';

/**
 * Displays a concise help menu describing supported CLI options.
 */
export const printHelp = (): void => {
  console.log('\nSpotify playlist to MP3 downloader\n');
  console.log('Usage:');
  console.log('  playlist-to-mp3 <playlist>             # Download a playlist (URL, URI or 22-char id)');
  console.log('  playlist-to-mp3 --retry                # Retry tracks that failed last time');
  console.log('  playlist-to-mp3 --serve [--port 5000]  # Start the web front');
  console.log('  playlist-to-mp3                        # Interactive menu');
  console.log('\nOptions:');
  console.log('  -o, --output <dir>   Output root (default ./downloads, or Android Music in Termux)');
  console.log('  -p, --port <n>       Port for --serve');
  console.log('  -h, --help           Show this help message');
};
