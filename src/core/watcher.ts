// src/core/watcher.ts

import path from 'path';
import chokidar from 'chokidar';
import {generate, type GenerateOptions} from './runner';
import {defaultLogger, type Logger} from '../util/logger';
import {isSubPath} from '../util/fs-utils';

export interface WatchOptions extends Omit<GenerateOptions, 'force' | 'dryRun' | 'ask'> {
   /**
    * Debounce delay in milliseconds between detected changes
    * and a re-run.
    *
    * Default: 150 ms
    */
   debounceMs?: number;
}

export interface TemplateWatcher {
   close(): Promise<void>;
}

/**
 * Watch the template directory and regenerate on changes.
 *
 * Runs are forced (the previous output is replaced) and never overlap;
 * a change during a run schedules one more run. Failures are logged and
 * the watcher keeps going.
 */
export function watchTemplate(options: WatchOptions): TemplateWatcher {
   const logger = options.logger ?? defaultLogger.child('[watch]');
   const templateDir = path.resolve(options.templateDir);
   const outDir = path.resolve(options.outDir);
   const debounceMs = options.debounceMs ?? 150;

   logger.info(`Watching template directory: ${templateDir}`);

   let timer: NodeJS.Timeout | undefined;
   let running = false;
   let pending = false;

   async function run() {
      if (running) {
         pending = true;
         return;
      }
      running = true;
      try {
         logger.info('Change detected → regenerating...');
         await generate({...options, force: true, logger});
      } catch (err) {
         logger.error('Generation failed:', err);
      } finally {
         running = false;
         if (pending) {
            pending = false;
            scheduleRun();
         }
      }
   }

   function scheduleRun() {
      if (timer) clearTimeout(timer);
      timer = setTimeout(() => {
         void run();
      }, debounceMs);
   }

   // The output (and its temp siblings) may live inside the template.
   function isIgnored(filePath: string): boolean {
      const abs = path.resolve(filePath);
      if (isSubPath(outDir, abs)) return true;
      const base = path.basename(outDir);
      return path.dirname(abs) === path.dirname(outDir) && path.basename(abs).startsWith(`.${base}.tforge-`);
   }

   const watcher = chokidar.watch(templateDir, {
      ignoreInitial: true,
      persistent: true,
      ignored: (p: string) => isIgnored(p) || /[\\/](\.git|node_modules)([\\/]|$)/.test(p),
   });

   watcher
      .on('all', (event, filePath) => {
         logger.debug(`Event ${event} on ${filePath}`);
         scheduleRun();
      })
      .on('error', (error) => {
         logger.error('Watcher error:', error);
      });

   // Initial run
   scheduleRun();

   return {
      async close() {
         if (timer) clearTimeout(timer);
         await watcher.close();
      },
   };
}
