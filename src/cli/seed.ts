#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError } from 'commander';
import { errorMessage, isError } from '../common/errors/skyvision.errors';
import { SeedOptions, SeedReport, SeedService, SeedStage } from '../modules/pipeline/seed.service';
import { SeedCliModule } from './seed-cli.module';

export interface CliOptions {
  rawDir?: string;
  processedDir?: string;
  urlsCsv?: string;
  mediaDir?: string;
  dbHost?: string;
  dbPort?: number;
  dbUser?: string;
  dbPassword?: string;
  dbName?: string;
  model?: string;
  dim?: number;
  maxErrors?: number;
  chunkSize?: number;
  overwrite?: boolean;
  strict?: boolean;
  preferImage?: boolean;
  publicBaseUrl?: string;
}

const logger = new Logger('SeedCli');

function parseInteger(minimum: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
      throw new InvalidArgumentError(`Expected an integer >= ${minimum}.`);
    }
    return parsed;
  };
}

function withPipelineOptions(command: Command): Command {
  return command
    .option('--raw-dir <dir>', 'directory holding airports.dat|csv and airlines.dat|csv')
    .option('--processed-dir <dir>', 'directory for normalized records and embeddings')
    .option('--urls-csv <file>', 'image URL table')
    .option('--media-dir <dir>', 'local image cache')
    .option('--db-host <host>', 'MariaDB host')
    .option('--db-port <port>', 'MariaDB port', parseInteger(1))
    .option('--db-user <user>', 'MariaDB user')
    .option('--db-password <password>', 'MariaDB password')
    .option('--db-name <name>', 'MariaDB database')
    .option('--model <name>', 'CLIP model name')
    .option('--dim <n>', 'embedding dimension', parseInteger(1))
    .option('--max-errors <n>', 'malformed rows tolerated per input file', parseInteger(0))
    .option('--chunk-size <n>', 'rows per load transaction', parseInteger(1))
    .option('--overwrite', 're-download images that are already cached')
    .option('--strict', 'fail the localize stage when any image fails')
    .option('--prefer-image', 'embed the cached image when there is one')
    .option('--no-prefer-image', 'always embed the text prompt')
    .option('--public-base-url <url>', 'base for absolute media URLs');
}

/**
 * Connection and model settings are read by the config namespaces, so CLI
 * values are placed in the environment before the context is created.
 */
function applyEnvironmentOverrides(options: CliOptions): void {
  const overrides: Record<string, string | number | undefined> = {
    DB_HOST: options.dbHost,
    DB_PORT: options.dbPort,
    DB_USER: options.dbUser,
    DB_PASSWORD: options.dbPassword,
    DB_NAME: options.dbName,
    EMBEDDING_MODEL: options.model,
    EMBEDDING_DIM: options.dim,
  };
  const dbFlags = [options.dbHost, options.dbPort, options.dbUser, options.dbPassword, options.dbName];
  if (dbFlags.some((value) => value !== undefined)) {
    // individual flags must not be shadowed by a connection URL
    delete process.env.DATABASE_URL;
  }
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      process.env[name] = String(value);
    }
  }
  // the embed stage loads the model itself; other stages never need it
  process.env.EMBEDDING_LOAD_ON_START = 'false';
}

function toSeedOverrides(options: CliOptions): Partial<SeedOptions> {
  return {
    rawDir: options.rawDir,
    processedDir: options.processedDir,
    urlsCsv: options.urlsCsv,
    mediaDir: options.mediaDir,
    maxErrors: options.maxErrors,
    chunkSize: options.chunkSize,
    overwrite: options.overwrite,
    strict: options.strict,
    preferImage: options.preferImage,
    publicBaseUrl: options.publicBaseUrl,
  };
}

export type ContextFactory = () => Promise<INestApplicationContext>;

function createSeedContext(): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(SeedCliModule, {
    logger: ['log', 'warn', 'error'],
    // a failing bootstrap must reach the catch below instead of aborting the process
    abortOnError: false,
  });
}

/** Run the stages and resolve to the process exit code. */
export async function runStages(
  stages: SeedStage[],
  options: CliOptions,
  createContext: ContextFactory = createSeedContext,
): Promise<number> {
  applyEnvironmentOverrides(options);

  let app: INestApplicationContext | null = null;
  let ok = false;
  try {
    app = await createContext();
    const seedService = app.get(SeedService);
    const report = await seedService.run(stages, seedService.resolveOptions(toSeedOverrides(options)));
    printSummary(report);
    ok = report.ok;
  } catch (error) {
    logger.error(`Seeding failed: ${errorMessage(error)}`, isError(error) ? error.stack : undefined);
  } finally {
    await app?.close();
  }
  return ok ? 0 : 1;
}

export function formatSummary(report: SeedReport): string[] {
  const lines: string[] = [];
  if (report.cleanUrls) {
    const { path, created, rows, dropped } = report.cleanUrls;
    lines.push(`clean-urls: ${path} ${created ? 'created' : `kept ${rows} rows, dropped ${dropped}`}`);
  }
  if (report.ingest) {
    for (const counts of [report.ingest.airport, report.ingest.airline]) {
      lines.push(
        `ingest: ${counts.file} rows=${counts.rows} written=${counts.written} skipped=${counts.skipped} duplicates=${counts.duplicates}`,
      );
    }
  }
  if (report.localize) {
    const counts = Object.entries(report.localize.counts)
      .map(([status, count]) => `${status}=${count}`)
      .join(' ');
    lines.push(`localize: ${report.localize.outputCsv} ${counts}`);
  }
  if (report.embed) {
    for (const [kind, counts] of Object.entries(report.embed)) {
      lines.push(
        `embed ${kind}: text=${counts.text} image=${counts.image} failed=${counts.failed} imageErrors=${counts.imageErrors}`,
      );
    }
  }
  if (report.load) {
    for (const [kind, counts] of Object.entries(report.load)) {
      lines.push(
        `load ${kind}: inserted=${counts.inserted} updated=${counts.updated} failed=${counts.failed} skipped=${counts.skipped}`,
      );
      for (const error of counts.errors) {
        lines.push(`  ${error}`);
      }
    }
  }
  lines.push(report.ok ? 'seed: ok' : 'seed: completed with failures');
  return lines;
}

function printSummary(report: SeedReport): void {
  for (const line of formatSummary(report)) {
    logger.log(line);
  }
}

export function buildProgram(): Command {
  const program = new Command()
    .name('skyvision-seed')
    .description('Build the airport and airline vector tables from OpenFlights data');

  const commands: Array<{ name: string; description: string; stages: SeedStage[]; isDefault?: boolean }> = [
    {
      name: 'run',
      description: 'ingest, localize, embed and load',
      stages: ['ingest', 'localize', 'embed', 'load'],
      isDefault: true,
    },
    { name: 'ingest', description: 'normalize the raw OpenFlights files', stages: ['ingest'] },
    { name: 'localize', description: 'download images into the media cache', stages: ['localize'] },
    { name: 'embed', description: 'compute one CLIP vector per entity', stages: ['embed'] },
    { name: 'load', description: 'upsert records and vectors into MariaDB', stages: ['load'] },
    { name: 'clean-urls', description: 'drop empty and duplicate rows from the image URL table', stages: ['clean-urls'] },
  ];

  for (const { name, description, stages, isDefault } of commands) {
    withPipelineOptions(program.command(name, { isDefault }).description(description)).action(
      async (options: CliOptions) => {
        process.exitCode = await runStages(stages, options);
      },
    );
  }
  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error(errorMessage(error));
      process.exitCode = 1;
    });
}
