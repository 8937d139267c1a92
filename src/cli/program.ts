import { Command, CommanderError } from 'commander';
import type { Logger } from 'pino';
import { loadConfig, type EnvSource } from '../config/loadConfig.js';
import { ConfigError } from '../errors.js';
import { createLogger } from '../logger.js';
import { BuildCoordinator, EXIT_CODES } from '../build/BuildCoordinator.js';
import { Notifier } from '../notify/Notifier.js';
import { expandUncacheUrls } from '../notify/uncache.js';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  env: EnvSource;
  /** Logger factory; tests pass one that stays quiet. */
  logger?: (level: string) => Logger;
}

type BuildFlags = {
  config?: string;
  full?: boolean;
  exclude?: boolean;
  searchIndex?: boolean;
  logLevel?: string;
};

type UncacheFlags = {
  config?: string;
  zip?: boolean;
  url?: string[];
  dryRun?: boolean;
};

const defaultIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  env: process.env
};

function createProgram(io: CliIo, setExit: (code: number) => void): Command {
  const makeLogger = io.logger ?? createLogger;
  const program = new Command();
  program
    .name('archive-indexer')
    .description('Build the index pages, manifest and feed of a file archive')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd())
    });

  program
    .command('build')
    .description('regenerate what changed since the last build')
    .option('-c, --config <path>', 'configuration file (default: $ARCHIVE_INDEX_CONFIG)')
    .option('--full', 'ignore the build marker and regenerate everything')
    .option('--exclude', 'leave undocumented files out of the pages')
    .option('--search-index', 'ask the search service to reindex afterwards')
    .option('--log-level <level>', 'pino log level')
    .action(async (flags: BuildFlags) => {
      const config = loadConfig({
        configPath: flags.config,
        env: io.env,
        overrides: {
          forceFull: flags.full,
          excludeUndocumented: flags.exclude,
          triggerSearchIndex: flags.searchIndex,
          logLevel: flags.logLevel
        }
      });
      const result = await new BuildCoordinator({ config, logger: makeLogger(config.logLevel) }).run();
      if (result.error) io.err(result.error.message);
      setExit(EXIT_CODES[result.status]);
    });

  program
    .command('uncache')
    .description('purge archive files from the CDN cache')
    .argument('<paths...>', 'archive paths or public URLs')
    .option('-c, --config <path>', 'configuration file (default: $ARCHIVE_INDEX_CONFIG)')
    .option('--zip', 'also purge the unboxed members of zip files')
    .option('--url <url...>', 'extra URLs to purge as given')
    .option('--dry-run', 'print the URLs instead of purging')
    .action(async (paths: string[], flags: UncacheFlags) => {
      const config = loadConfig({ configPath: flags.config, env: io.env });
      const logger = makeLogger(config.logLevel);
      if (!config.purge) throw new ConfigError('no purge service configured');
      const urls = await expandUncacheUrls(paths, {
        rootName: config.rootName,
        treeDir: config.treeDir,
        purge: config.purge,
        logger,
        zip: flags.zip ?? false,
        rawUrls: flags.url
      });
      if (flags.dryRun) {
        for (const url of urls) io.out(url);
        setExit(0);
        return;
      }
      const ok = await new Notifier({ purge: config.purge, logger }).purgeUrls(urls);
      setExit(ok ? 0 : 1);
    });

  return program;
}

/** Parses `argv` (without node and script) and returns the process exit code. */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  let code = 0;
  const program = createProgram(io, (value) => {
    code = value;
  });
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof ConfigError) {
      io.err(err.message);
      return 1;
    }
    throw err;
  }
  return code;
}
