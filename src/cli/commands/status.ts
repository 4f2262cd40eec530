// src/cli/commands/status.ts
import { Command } from 'commander';
import { existsSync } from 'fs';
import { JsonStore } from '../../core/store/json-store.js';
import { resolveProjectPaths } from '../../core/config/project.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show what the project store holds')
    .option('--project <dir>', 'Project directory (default: app data directory)')
    .action(async (options: { project?: string }) => {
      const paths = resolveProjectPaths(options.project);
      if (!existsSync(paths.storePath)) {
        console.log(`No store at ${paths.storePath} yet; run "watchtrail ingest" first`);
        return;
      }

      const store = new JsonStore(paths.storePath);
      try {
        await store.load();
        console.log(`Store: ${paths.storePath}`);
        console.log(`Videos: ${await store.countVideos()}`);
        console.log(`Timestamps: ${await store.countTimestamps()}`);
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
