/**
 * Config file watcher
 *
 * Watches the config file's directory (editors often replace the file
 * instead of writing it in place) and triggers a reload once changes have
 * settled.
 */

import { watch, type FSWatcher } from 'fs';
import path from 'path';
import { TIME } from './constants.js';
import { toError } from './errors.js';
import type { Logger } from './logger.js';

export class ConfigWatcher {
  private watcher?: FSWatcher;
  private timer?: NodeJS.Timeout;
  private readonly fileName: string;
  private readonly directory: string;

  constructor(
    configPath: string,
    private readonly onChange: () => Promise<void>,
    private readonly logger: Logger,
    private readonly debounceMs: number = TIME.CONFIG_RELOAD_DEBOUNCE_MS
  ) {
    const absolute = path.resolve(configPath);
    this.fileName = path.basename(absolute);
    this.directory = path.dirname(absolute);
  }

  start(): void {
    if (this.watcher) return;

    this.watcher = watch(this.directory, (_event, filename) => {
      if (filename !== null && filename.toString() === this.fileName) {
        this.schedule();
      }
    });
    this.watcher.on('error', error => this.logger.error('Config watcher error', toError(error)));
    this.logger.info('Watching config file', { directory: this.directory, file: this.fileName });
  }

  /**
   * Restart the debounce window; the reload runs once no event arrived for
   * `debounceMs`.
   */
  schedule(): void {
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.logger.info('Config file changed', { file: this.fileName });
      this.onChange().catch(error => this.logger.error('Config reload failed', toError(error)));
    }, this.debounceMs);
  }

  stop(): void {
    clearTimeout(this.timer);
    this.timer = undefined;
    this.watcher?.close();
    this.watcher = undefined;
  }
}
