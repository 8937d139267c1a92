import type { Logger } from 'pino';
import type { BuildConfig } from '../types/config.js';
import type { BuildPlan } from '../types/plan.js';
import type { ChecksumStats } from '../types/checksum.js';
import type { Diagnostic } from '../types/diagnostic.js';
import type { FileSystemSource } from '../types/fs.js';
import { LockHeldError } from '../errors.js';
import { DiagnosticLog } from '../diagnostics/DiagnosticLog.js';
import { IndexDocumentParser } from '../document/IndexDocumentParser.js';
import { FilesystemCorrelator } from '../scanner/FilesystemCorrelator.js';
import { NodeFileSystem } from '../scanner/NodeFileSystem.js';
import { MetadataResolver } from '../resolve/MetadataResolver.js';
import { ChecksumCache } from '../checksum/ChecksumCache.js';
import { hashModel } from '../checksum/hashModel.js';
import { IncrementalPlanner } from '../plan/IncrementalPlanner.js';
import { BuildMarker } from '../plan/BuildMarker.js';
import { collectPageLinks, PageLinkStore } from '../plan/PageLinks.js';
import { Renderer } from '../render/Renderer.js';
import { TemplateSet } from '../render/TemplateSet.js';
import { OutputWriter } from '../render/OutputWriter.js';
import { Notifier } from '../notify/Notifier.js';
import { systemClock, toEpochSeconds, type Clock } from '../utils/time.js';
import { BuildLock } from './BuildLock.js';
import { applyOutputModes } from './permissions.js';

export type BuildStatus = 'success' | 'failed' | 'locked';

export interface BuildResult {
  status: BuildStatus;
  plan: BuildPlan | null;
  diagnostics: Diagnostic[];
  checksumStats: ChecksumStats;
  /** Output paths written, relative to destDir. */
  written: string[];
  error?: Error;
}

export interface BuildCoordinatorOptions {
  config: BuildConfig;
  logger: Logger;
  fs?: FileSystemSource;
  clock?: Clock;
  notifier?: Notifier;
}

export const EXIT_CODES: Record<BuildStatus, number> = {
  success: 0,
  failed: 1,
  locked: 3
};

const NO_STATS: ChecksumStats = { hits: 0, computed: 0, failed: 0 };

/**
 * Runs one build under the exclusive lock. Persisted state (checksum cache,
 * marker) changes only after every output has been written.
 */
export class BuildCoordinator {
  private readonly fs: FileSystemSource;
  private readonly clock: Clock;
  private readonly notifier: Notifier;

  constructor(private readonly options: BuildCoordinatorOptions) {
    this.fs = options.fs ?? new NodeFileSystem();
    this.clock = options.clock ?? systemClock;
    this.notifier =
      options.notifier ??
      new Notifier({
        search: options.config.search,
        purge: options.config.purge,
        logger: options.logger.child({ component: 'notifier' })
      });
  }

  async run(): Promise<BuildResult> {
    const { config, logger } = this.options;
    const lock = new BuildLock(config.lockPath, logger.child({ component: 'lock' }), this.clock);
    try {
      lock.acquire();
    } catch (err) {
      if (err instanceof LockHeldError) {
        logger.warn({ holder: err.holder, ageMs: err.ageMs }, err.message);
        return { status: 'locked', plan: null, diagnostics: [], checksumStats: NO_STATS, written: [], error: err };
      }
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error({ err: error, lockPath: config.lockPath }, 'could not acquire build lock');
      return { status: 'failed', plan: null, diagnostics: [], checksumStats: NO_STATS, written: [], error };
    }

    const diagnostics = new DiagnosticLog(logger.child({ component: 'diagnostics' }));
    let cache: ChecksumCache | undefined;
    let plan: BuildPlan | null = null;
    let written: string[] = [];
    try {
      const result = await this.build(diagnostics);
      cache = result.cache;
      plan = result.plan;
      written = result.written;
      logger.info(
        { status: 'success', full: plan.full, written: written.length, diagnostics: diagnostics.all().length, ...cache.stats() },
        'build finished'
      );
      return { status: 'success', plan, diagnostics: diagnostics.all(), checksumStats: cache.stats(), written };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error({ err: error }, 'build failed');
      return {
        status: 'failed',
        plan,
        diagnostics: diagnostics.all(),
        checksumStats: cache?.stats() ?? NO_STATS,
        written,
        error
      };
    } finally {
      lock.release();
    }
  }

  private async build(
    diagnostics: DiagnosticLog
  ): Promise<{ cache: ChecksumCache; plan: BuildPlan; written: string[] }> {
    const { config, logger } = this.options;
    const marker = new BuildMarker(config.markerPath, logger.child({ component: 'marker' }));
    const since = marker.read();
    const linkStore = new PageLinkStore(config.linksPath, logger.child({ component: 'links' }));
    const previous = since === null ? null : linkStore.read();

    const document = new IndexDocumentParser({
      rootName: config.rootName,
      logger: logger.child({ component: 'parser' })
    }).parseFile(config.indexPath);
    logger.debug({ sections: document.sections.length }, 'parsed index document');

    const walkStart = toEpochSeconds(this.clock.now());
    const scan = await new FilesystemCorrelator({
      treeDir: config.treeDir,
      rootName: config.rootName,
      fragmentName: config.fragmentName,
      reserved: config.reserved,
      fs: this.fs,
      diagnostics,
      logger: logger.child({ component: 'correlator' })
    }).scan();

    const model = new MetadataResolver({
      identifierKeys: config.identifierKeys,
      quietPrefixes: config.quietPrefixes,
      excludeUndocumented: config.excludeUndocumented,
      diagnostics,
      logger: logger.child({ component: 'resolver' })
    }).resolve(document, scan);

    const cache = new ChecksumCache({ path: config.cachePath, fs: this.fs, logger: logger.child({ component: 'checksum' }) });
    await hashModel(model, cache, { treeDir: config.treeDir, concurrency: config.hashConcurrency, diagnostics });

    const plan = new IncrementalPlanner(logger.child({ component: 'planner' })).plan(model, {
      since,
      now: walkStart,
      force: config.forceFull,
      previous
    });

    const renderLogger = logger.child({ component: 'renderer' });
    const renderer = new Renderer({
      config,
      templates: TemplateSet.load(renderLogger, config.templateDir),
      logger: renderLogger
    });
    const written = renderer.render(model, plan, new OutputWriter(config.destDir));

    applyOutputModes(config.destDir, written, config.outputModes);
    cache.commit();
    linkStore.write(collectPageLinks(model));
    marker.write(walkStart);
    await this.notifier.afterBuild(config.manifestName, config.triggerSearchIndex);
    return { cache, plan, written };
  }
}
