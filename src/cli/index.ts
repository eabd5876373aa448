#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig } from '../config/env.js';
import { listEntities, loadPipelineConfig, resolveEntitySpec } from '../config/pipelineConfig.js';
import { errorMessage } from '../lib/errors.js';
import { log, setLogLevel } from '../lib/log.js';
import { runEntityPipeline } from '../pipeline/orchestrator.js';

interface RunOptions {
  config?: string;
  outputDir?: string;
  xlsx?: boolean;
}

interface ConfigOptions {
  config?: string;
}

async function runEntity(entity: string, options: RunOptions): Promise<void> {
  const appConfig = loadConfig({ configPath: options.config, outputDir: options.outputDir });
  setLogLevel(appConfig.LOG_LEVEL);

  const pipelineConfig = await loadPipelineConfig(appConfig.resolvedConfigPath);
  const outcome = await runEntityPipeline({
    config: pipelineConfig,
    entity,
    outputDir: appConfig.resolvedOutputDir,
    exportWorkbook: options.xlsx === true
  });

  console.log(
    `[run] entity=${entity} status=${outcome.status} rows_final=${outcome.summary.counts.rows_final} projections=${outcome.summary.projections.length} output=${appConfig.resolvedOutputDir}`
  );
  if (outcome.status !== 'completed') {
    process.exitCode = 1;
  }
}

async function runCheckConfig(entity: string | undefined, options: ConfigOptions): Promise<void> {
  const appConfig = loadConfig({ configPath: options.config });
  setLogLevel(appConfig.LOG_LEVEL);

  const pipelineConfig = await loadPipelineConfig(appConfig.resolvedConfigPath);
  const entities = entity === undefined ? listEntities(pipelineConfig) : [entity];
  let failures = 0;

  for (const name of entities) {
    try {
      const spec = resolveEntitySpec(pipelineConfig, name);
      console.log(
        `[config] ${name}: ok fields=${spec.fields.size} rules=${spec.rules.length} composite_keys=${spec.compositeKeys.length} projections=${spec.projections.length}`
      );
    } catch (error) {
      failures += 1;
      console.log(`[config] ${name}: error ${errorMessage(error)}`);
    }
  }

  log.info('configuration check finished', { path: pipelineConfig.path, entities: entities.length, failures });
  if (failures > 0) {
    process.exitCode = 1;
  }
}

async function runListEntities(options: ConfigOptions): Promise<void> {
  const appConfig = loadConfig({ configPath: options.config });
  setLogLevel(appConfig.LOG_LEVEL);

  const pipelineConfig = await loadPipelineConfig(appConfig.resolvedConfigPath);
  for (const name of listEntities(pipelineConfig)) {
    console.log(name);
  }
}

const program = new Command();
program
  .name('entity-pipeline')
  .description('Validate, deduplicate and project delimited entity files')
  .version('0.1.0');

program
  .command('run')
  .description('Run the pipeline for one entity')
  .argument('<entity>', 'entity name under transformations_config')
  .option('-c, --config <path>', 'pipeline configuration file (defaults to PIPELINE_CONFIG)')
  .option('-o, --output-dir <dir>', 'output root for errors/ and exports/ (defaults to OUTPUT_DIR)')
  .option('--xlsx', 'also write the projections to one workbook')
  .action(runEntity);

program
  .command('check-config')
  .description('Resolve one or all entities without reading their sources')
  .argument('[entity]', 'entity name; all entities when omitted')
  .option('-c, --config <path>', 'pipeline configuration file (defaults to PIPELINE_CONFIG)')
  .action(runCheckConfig);

program
  .command('list-entities')
  .description('List the entities defined in the configuration')
  .option('-c, --config <path>', 'pipeline configuration file (defaults to PIPELINE_CONFIG)')
  .action(runListEntities);

program.parseAsync(process.argv).catch((error) => {
  log.error('command failed', error);
  process.exitCode = 1;
});
