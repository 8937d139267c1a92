import type { Logger } from 'pino';
import type { ArchiveModel, DirectoryNode } from '../types/model.js';
import type { ArchivePath, EpochSeconds } from '../types/ids.js';
import { DateWindow, type BuildPlan } from '../types/plan.js';
import { ALL_WINDOWS, inWindow, windowSeconds } from './windows.js';
import { collectPageLinks, type PageLinkMap } from './PageLinks.js';

export interface PlanRequest {
  since: EpochSeconds | null;
  now: EpochSeconds;
  force: boolean;
  /** Link graph recorded by the last successful build, when there is one. */
  previous?: PageLinkMap | null;
}

/** Inclusive of the marker's own second, so nothing written during it is missed. */
function newerThan(mtimeMs: number | undefined, since: EpochSeconds): boolean {
  return mtimeMs !== undefined && mtimeMs >= since * 1000;
}

/**
 * Decides which outputs a build regenerates. Directory pages are planned
 * from mtimes against the last marker; date windows additionally regenerate
 * when a file ages out of them.
 */
export class IncrementalPlanner {
  constructor(private readonly logger: Logger) {}

  plan(model: ArchiveModel, request: PlanRequest): BuildPlan {
    const { since, now } = request;
    if (since === null || request.force) {
      this.logger.info({ reason: since === null ? 'no marker' : 'forced' }, 'planning full build');
      return {
        full: true,
        since,
        now,
        dirs: new Set(model.dirs.keys()),
        windows: new Set(ALL_WINDOWS),
        always: true
      };
    }

    const graphs = [collectPageLinks(model)];
    if (request.previous) graphs.push(request.previous);
    const changed = this.changedDirs(model, since, graphs);
    const dirs = new Set(changed);
    for (const path of changed) {
      const parent = model.dirs.get(path)?.parent;
      if (parent && model.dirs.has(parent)) dirs.add(parent);
    }

    const structural = [...model.dirs.values()].some((dir) => newerThan(dir.mtimeMs, since));
    const windows = new Set<DateWindow>();
    for (const window of ALL_WINDOWS) {
      if (structural || this.windowTouched(model, window, changed, since, now)) windows.add(window);
    }

    this.logger.info(
      { since, changed: changed.size, pages: dirs.size, windows: [...windows] },
      'planned incremental build'
    );
    return { full: false, since, now, dirs, windows, always: true };
  }

  private changedDirs(model: ArchiveModel, since: EpochSeconds, graphs: PageLinkMap[]): Set<ArchivePath> {
    const changed = new Set<ArchivePath>();
    for (const dir of model.dirs.values()) {
      if (this.ownChange(dir, since)) changed.add(dir.path);
    }

    // Links from the last build count too, so removing one still refreshes both ends.
    const partners = new Map<ArchivePath, Set<ArchivePath>>();
    const connect = (a: ArchivePath, b: ArchivePath): void => {
      const set = partners.get(a);
      if (set) set.add(b);
      else partners.set(a, new Set([b]));
    };
    for (const graph of graphs) {
      for (const [page, links] of graph) {
        const described = links.sections.some((section) => newerThan(model.dirs.get(section)?.fragmentMtimeMs, since));
        if (described && model.dirs.has(page)) changed.add(page);
        for (const other of links.partners) {
          connect(page, other);
          connect(other, page);
        }
      }
    }

    // A partner directory that is gone changed too.
    for (const [path, others] of partners) {
      if (model.dirs.has(path)) continue;
      for (const other of others) {
        if (model.dirs.has(other)) changed.add(other);
      }
    }

    // Cluster pages link each other, so a change spreads to every partner directory.
    const queue = [...changed];
    while (queue.length > 0) {
      const path = queue.pop();
      if (path === undefined) break;
      for (const other of partners.get(path) ?? []) {
        if (!changed.has(other) && model.dirs.has(other)) {
          changed.add(other);
          queue.push(other);
        }
      }
    }
    return changed;
  }

  private ownChange(dir: DirectoryNode, since: EpochSeconds): boolean {
    if (newerThan(dir.mtimeMs, since) || newerThan(dir.fragmentMtimeMs, since)) return true;
    return dir.files.some((entry) => newerThan(entry.mtimeMs, since));
  }

  private windowTouched(
    model: ArchiveModel,
    window: DateWindow,
    changed: Set<ArchivePath>,
    since: EpochSeconds,
    now: EpochSeconds
  ): boolean {
    if (window === DateWindow.ALL) return changed.size > 0;
    const length = windowSeconds(window) ?? 0;
    for (const dir of model.dirs.values()) {
      for (const entry of dir.files) {
        if (changed.has(dir.path) && inWindow(window, entry.date, now)) return true;
        const expiry = entry.date + length;
        if (expiry > since && expiry <= now) return true;
      }
    }
    return false;
  }
}
