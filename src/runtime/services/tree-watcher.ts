/**
 * Trace Tree Watcher
 *
 * Polls a span database for the most recently updated span and emits the
 * current tree whenever that changes. Works against a file other
 * processes are writing to.
 *
 * ## Usage
 *
 * ```typescript
 * const watcher = new TreeWatcher({ dbPath: '.treetrace/traces.db' });
 * watcher.on('change', ({ tree }) => console.log(formatTree(tree)));
 * watcher.start();
 * ```
 *
 * @module tree-watcher
 */

import { TREE_WATCH_INTERVAL_MS } from '../../shared/config/timeouts.js';
import { createChildLogger } from '../../shared/logging/structured.js';
import { spanIdFromString, spanIdToString, treeToDict, type SpanId, type TreeDict } from '../../shared/tracing/index.js';
import { SpanDatabase } from '../../infra/storage/sqlite/span-db.js';
import { SqliteTraceTree } from '../../infra/storage/sqlite/sqlite-tracing.js';

const log = createChildLogger({ component: 'tree-watcher' });

export interface TreeWatcherConfig {
  dbPath: string;
  /** Polling interval in ms */
  intervalMs: number;
  /** Root to render; default is the latest root */
  rootId?: SpanId | string;
}

/**
 * Payload of a `change` event
 */
export interface TreeChange {
  /** Display id of the rendered root */
  rootId: string;
  /** Display id of the span that changed most recently */
  lastUpdatedId: string;
  /** Unix seconds of that change */
  lastUpdated: number;
  tree: TreeDict;
}

interface TreeWatcherEvents {
  change: TreeChange;
  error: Error;
  start: { timestamp: Date };
  stop: { timestamp: Date };
}

type Listener<T> = (data: T) => void;

/**
 * Pick the root to render: the given one, else the greatest root id
 */
export function selectRootId(db: SpanDatabase, rootId?: SpanId | string): SpanId | undefined {
  if (rootId !== undefined) {
    return typeof rootId === 'string' ? spanIdFromString(rootId) : rootId;
  }
  const roots = db.getRootIds();
  return roots[roots.length - 1];
}

export class TreeWatcher {
  private readonly config: TreeWatcherConfig;
  private readonly db: SpanDatabase;
  private interval: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  private polling = false;
  private lastSeen: string | undefined;
  private lastSnapshot: string | undefined;
  private readonly listeners: { [K in keyof TreeWatcherEvents]: Listener<TreeWatcherEvents[K]>[] } = {
    change: [],
    error: [],
    start: [],
    stop: [],
  };

  constructor(config: Partial<TreeWatcherConfig> & Pick<TreeWatcherConfig, 'dbPath'>) {
    this.config = { intervalMs: TREE_WATCH_INTERVAL_MS, ...config };
    this.db = new SpanDatabase(this.config.dbPath);
  }

  /**
   * Start polling; the first poll runs at once
   */
  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.emit('start', { timestamp: new Date() });
    void this.tick();
    this.interval = setInterval(() => void this.tick(), this.config.intervalMs);
  }

  /**
   * Stop polling
   */
  stop(): void {
    if (!this.isRunning) return;

    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }

    this.isRunning = false;
    this.emit('stop', { timestamp: new Date() });
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Check once; emits `change` and returns it when the latest update
   * differs from the last one seen
   *
   * `last_updated` has millisecond resolution, so the rendered tree is
   * compared as well: two updates within one millisecond still count.
   */
  async poll(): Promise<TreeChange | undefined> {
    const last = this.db.getLastUpdatedSpanId();
    if (!last) return undefined;

    const rootId = selectRootId(this.db, this.config.rootId);
    if (!rootId) return undefined;

    const key = `${spanIdToString(last.id)}@${last.lastUpdated}`;
    const tree = await treeToDict(new SqliteTraceTree(this.db, rootId));
    const snapshot = JSON.stringify(tree);
    if (key === this.lastSeen && snapshot === this.lastSnapshot) return undefined;

    const change: TreeChange = {
      rootId: spanIdToString(rootId),
      lastUpdatedId: spanIdToString(last.id),
      lastUpdated: last.lastUpdated,
      tree,
    };
    this.lastSeen = key;
    this.lastSnapshot = snapshot;
    this.emit('change', change);
    return change;
  }

  on<K extends keyof TreeWatcherEvents>(event: K, listener: Listener<TreeWatcherEvents[K]>): () => void {
    const listeners: Listener<TreeWatcherEvents[K]>[] = this.listeners[event];
    listeners.push(listener);

    return () => {
      const index = listeners.indexOf(listener);
      if (index >= 0) {
        listeners.splice(index, 1);
      }
    };
  }

  private async tick(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      await this.poll();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log.debug('Tree poll failed', { error: err.message });
      this.emit('error', err);
    } finally {
      this.polling = false;
    }
  }

  private emit<K extends keyof TreeWatcherEvents>(event: K, data: TreeWatcherEvents[K]): void {
    const listeners: Listener<TreeWatcherEvents[K]>[] = this.listeners[event];
    for (const listener of [...listeners]) {
      try {
        listener(data);
      } catch (listenerError) {
        log.debug('Tree watcher listener failed', {
          event,
          error: listenerError instanceof Error ? listenerError.message : String(listenerError),
        });
      }
    }
  }
}
