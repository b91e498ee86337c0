import { Command } from 'commander';

import * as log from '../utils/logger';
import { configureLogger } from '../common/logger';
import { loadConfig, type AppConfig, type EnvMap } from '../common/config';
import { PlaywrightLauncher } from '../browser/playwright_driver';
import { createBrowserStages, runPipeline, type PipelineStages } from '../pipeline/run_pipeline';

export interface ProgramDeps {
  env?: EnvMap;
  cwd?: string;
  createStages?: (config: AppConfig) => PipelineStages;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const createStages = deps.createStages ?? (() => createBrowserStages(new PlaywrightLauncher()));

  return new Command()
    .name('sync-document')
    .description('Export the PDF behind a read-only share link and upload it to a document library. Configured through environment variables.')
    .action(async () => {
      const config = loadConfig(deps.env ?? process.env, deps.cwd ?? process.cwd());
      configureLogger({ level: config.logLevel });
      log.registerSecrets([config.username, config.password]);
      log.info(`[cli] headless=${config.headless} download=${config.downloadPath} cookies=${config.cookiesFile || '(none)'}`);

      const result = await runPipeline(config, createStages(config));
      process.exitCode = result.exitCode;
    });
}
