import { fetch, type Dispatcher } from 'undici';
import type { Logger } from 'pino';
import type { PurgeNotifyConfig, SearchNotifyConfig } from '../types/config.js';

export const PURGE_BATCH_SIZE = 16;

export interface NotifierOptions {
  search?: SearchNotifyConfig;
  purge?: PurgeNotifyConfig;
  logger: Logger;
  dispatcher?: Dispatcher;
}

/** Keyed HTTP signals sent after a build. Failures are logged and reported as `false`. */
export class Notifier {
  constructor(private readonly options: NotifierOptions) {}

  async triggerSearchIndex(): Promise<boolean> {
    const { search, logger } = this.options;
    if (!search) return false;
    try {
      const response = await fetch(search.url, {
        method: 'POST',
        headers: { 'X-Api-Key': search.key },
        dispatcher: this.options.dispatcher
      });
      await response.body?.cancel();
      if (!response.ok) {
        logger.warn({ status: response.status, url: search.url }, 'search reindex request rejected');
        return false;
      }
      logger.info({ url: search.url }, 'search reindex requested');
      return true;
    } catch (err) {
      logger.warn({ err, url: search.url }, 'search reindex request failed');
      return false;
    }
  }

  /** POSTs `{ files }` in batches; stops at the first failed batch. */
  async purgeUrls(urls: string[]): Promise<boolean> {
    const { purge, logger } = this.options;
    if (!purge || urls.length === 0) return false;
    for (let start = 0; start < urls.length; start += PURGE_BATCH_SIZE) {
      const files = urls.slice(start, start + PURGE_BATCH_SIZE);
      try {
        const response = await fetch(purge.url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'X-Auth-Key': purge.key,
            'X-Auth-Email': purge.email
          },
          body: JSON.stringify({ files }),
          dispatcher: this.options.dispatcher
        });
        const text = await response.text();
        if (!response.ok) {
          logger.warn({ status: response.status, body: text, batch: files.length }, 'cache purge rejected');
          return false;
        }
        logger.info({ status: response.status, batch: files.length }, 'cache purge accepted');
      } catch (err) {
        logger.warn({ err, batch: files.length }, 'cache purge failed');
        return false;
      }
    }
    return true;
  }

  /** Post-build signals: the manifest purge and, when asked, a search reindex. */
  async afterBuild(manifestName: string, triggerSearchIndex: boolean): Promise<void> {
    const { purge } = this.options;
    const tasks: Promise<boolean>[] = [];
    if (purge) tasks.push(this.purgeUrls(purge.prefixes.map((prefix) => `${prefix}/${manifestName}`)));
    if (triggerSearchIndex) tasks.push(this.triggerSearchIndex());
    await Promise.all(tasks);
  }
}
