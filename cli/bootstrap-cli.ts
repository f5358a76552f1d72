#!/usr/bin/env node
/**
 * search-bootstrap: waits for a search engine, ensures its index and loads the
 * dataset once. Exit code 0 on success (including a skipped load), 1 otherwise.
 */

import { confirm, select } from '@inquirer/prompts';
import { ENGINE_NAMES, type EngineName } from '../core/contracts/engine';
import { BootstrapRunner } from '../core/bootstrap/bootstrap-runner';
import { describeError, isBootstrapError } from '../core/bootstrap/errors';
import { loadBootstrapConfig } from '../config/bootstrap-config';
import { buildContainer, resolveAdapter, type BuildContainerOptions } from '../config/container';
import { redactUrlCredentials, type StructuredBootstrapLogger } from '../logging/bootstrap-logger';
import { formatReport, parseCliArgs, usage } from './bootstrap-cli-helpers';

export interface CliPrompts {
  selectEngine(): Promise<EngineName>;
  confirmForce(): Promise<boolean>;
}

export interface CliDependencies extends BuildContainerOptions {
  interactive?: boolean;
  prompts?: CliPrompts;
  print?: (line: string) => void;
}

const inquirerPrompts: CliPrompts = {
  selectEngine: () => select({
    message: 'Which search engine should be bootstrapped?',
    choices: ENGINE_NAMES.map((engine) => ({ name: engine, value: engine }))
  }),
  confirmForce: () => confirm({
    message: 'Force a reindex? Existing documents may be replaced.',
    default: false
  })
};

export async function run(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  deps: CliDependencies = {}
): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const interactive = deps.interactive ?? Boolean(process.stdin.isTTY && process.stdout.isTTY);
  const prompts = deps.prompts ?? inquirerPrompts;
  let logger: StructuredBootstrapLogger | undefined;

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      print(usage());
      return 0;
    }

    let engine = args.engine;
    if (!engine && !env.ENGINE?.trim() && interactive) {
      engine = await prompts.selectEngine();
    }

    let config = loadBootstrapConfig(env, { engine, forceReindex: args.force ? true : undefined });
    if (config.forceReindex && interactive && !(await prompts.confirmForce())) {
      print('Forced reindex cancelled.');
      config = loadBootstrapConfig(env, { engine, forceReindex: false });
    }

    const container = buildContainer(config, deps);
    logger = container.resolve('logger');
    logger.info('run', `Bootstrapping ${config.engine} at ${config.engineUrl}`, {
      index: config.indexName,
      dataset: config.dataset.path,
      force: config.forceReindex
    });

    const runner = new BootstrapRunner({
      adapter: resolveAdapter(container),
      config,
      logger,
      sleep: deps.sleep
    });
    const report = await runner.run();
    print(formatReport(report));
    return 0;
  } catch (error) {
    const kind = isBootstrapError(error) ? error.kind : 'unexpected';
    const message = `${describeError(error)} (${kind})`;
    const details = isBootstrapError(error) ? error.details : undefined;
    if (logger) {
      logger.error('run', message, details ? { details } : undefined);
    } else {
      console.error(`[ERROR] ${redactUrlCredentials(message)}`);
    }
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('[ERROR]', describeError(error));
      process.exitCode = 1;
    });
}
