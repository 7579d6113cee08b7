/**
 * packrat CLI
 *
 * Usage:
 *   packrat compress <input> <output> [-l level] [-e pattern]... [--no-hash] [--no-parallel] [-s]
 *   packrat decompress <input> <output> [--no-verify]
 *   packrat extract <zip> <dir> [-e pattern]... [-p password] [--no-verify]
 *   packrat info <file>
 *   packrat config [--show | --user [--force]]
 *   packrat --help
 */

import { statSync } from 'node:fs';
import pc from 'picocolors';
import { formatBytes } from '../core/compressor.js';
import { defaultConfigPath, loadConfig, resolveConfig, writeUserConfig, type EngineConfig } from '../core/config.js';
import { ArchiveError, describeError, summarizeFailures } from '../core/errors.js';
import { createLogger, type Logger } from '../core/logger.js';
import { compressFile, compressFolder, decompress, extractZip, inspect } from '../core/operations.js';
import { renderProgressEvent, type ProgressListener } from '../core/progress.js';
import type { CompressionResult } from '../core/types.js';
import { parseArgs, type ParsedArgs } from './args.js';

const VERSION = '1.0.0';

type Options = ParsedArgs['options'];

interface Context {
  config: EngineConfig;
  logger: Logger;
  onProgress?: ProgressListener;
  quiet: boolean;
}

function printHelp() {
  console.log(`
${pc.bold('packrat')} - streaming zstd archives for files, folders and ZIPs

${pc.bold('USAGE')}
  packrat <command> [options] <paths...>

${pc.bold('COMMANDS')}
  compress <input> <output>     Compress a file, or a folder into one archive
  decompress <input> <output>   Decompress an archive (file or folder, auto-detected)
  extract <zip> <dir>           Extract a ZIP archive
  info <file>                   Show archive type, size and stored digest
  config                        Show or create the configuration file

${pc.bold('OPTIONS')}
  -l, --level <n>           Compression level (1-22, default from config or 3)
  -e, --exclude <pattern>   Skip paths containing <pattern> (repeatable)
  -p, --password <pw>       Password for encrypted ZIP archives
  --no-hash                 Do not write a .sha256 sidecar
  --no-parallel             Compress folders on a single codec thread
  --no-verify               Skip hash / integrity verification
  -s, --stats               Show detailed statistics
  --show                    (config) Print the effective configuration
  --user [-f]               (config) Create the user config file
  -c, --config <path>       Configuration file
  -v, --verbose             Verbose output
  -q, --quiet               Only print errors
  -h, --help                Show this help
  -V, --version             Show version

${pc.bold('EXAMPLES')}
  ${pc.dim('# Compress a file (writes data.csv.zst and data.csv.zst.sha256)')}
  packrat compress data.csv data.csv.zst -l 9

  ${pc.dim('# Compress a folder, leaving out build output')}
  packrat compress project project.tar.zst -e node_modules -e dist

  ${pc.dim('# Restore it')}
  packrat decompress project.tar.zst restore

  ${pc.dim('# Extract an encrypted ZIP')}
  packrat extract bundle.zip out -p secret
`);
}

function printVersion() {
  console.log(`packrat v${VERSION}`);
}

function fail(message: string) {
  console.error(pc.red(`✗ ${message}`));
  process.exitCode = 1;
}

function requirePaths(files: string[], count: number, usage: string): boolean {
  if (files.length < count) {
    fail(`Missing arguments. Usage: packrat ${usage}`);
    return false;
  }
  return true;
}

function createReporter(verbose: boolean): ProgressListener {
  return (event) => {
    if (event.type === 'chunk' || (event.type === 'entry' && !verbose)) return;
    const line = renderProgressEvent(event);
    if (line === null) return;
    console.log(event.type === 'warning' ? pc.yellow(line) : line);
  };
}

function printStats(result: CompressionResult) {
  const seconds = result.durationMs / 1000;
  const speed = seconds > 0 ? result.originalSize / seconds / 1024 / 1024 : 0;
  console.log(`\n${pc.bold('Compression Statistics:')}`);
  console.log(`  Original size:     ${result.originalSize.toLocaleString('en-US')} bytes (${formatBytes(result.originalSize)})`);
  console.log(`  Compressed size:   ${result.compressedSize.toLocaleString('en-US')} bytes (${formatBytes(result.compressedSize)})`);
  console.log(`  Compression ratio: ${result.compressionRatio.toFixed(2)}:1`);
  console.log(`  Files processed:   ${result.filesProcessed}`);
  console.log(`  Duration:          ${seconds.toFixed(2)} seconds`);
  console.log(`  Speed:             ${speed.toFixed(2)} MB/s`);
}

async function commandCompress(files: string[], options: Options, ctx: Context) {
  if (!requirePaths(files, 2, 'compress <input> <output>')) return;
  const [input = '', output = ''] = files;

  let isDirectory: boolean;
  try {
    isDirectory = statSync(input).isDirectory();
  } catch {
    fail(`${input} does not exist`);
    return;
  }

  const common = {
    config: ctx.config,
    logger: ctx.logger,
    ...(ctx.onProgress && { onProgress: ctx.onProgress }),
    ...(options.level !== undefined && { level: options.level }),
  };

  let result: CompressionResult;
  if (isDirectory) {
    const folder = await compressFolder(input, output, {
      ...common,
      excludePatterns: options.exclude,
      parallel: !options.noParallel,
    });
    if (folder.skipped.length > 0) {
      console.error(pc.yellow(`⚠ ${folder.skipped.length} entries were skipped:`));
      for (const line of summarizeFailures(folder.skipped)) console.error(pc.yellow(line));
    }
    result = folder;
  } else {
    result = await compressFile(input, output, { ...common, computeHash: !options.noHash });
  }

  if (!ctx.quiet) {
    console.log(pc.green('✓ Compression completed successfully'));
    if (options.stats) printStats(result);
  }
}

async function commandDecompress(files: string[], options: Options, ctx: Context) {
  if (!requirePaths(files, 2, 'decompress <input> <output>')) return;
  const [input = '', output = ''] = files;

  const result = await decompress(input, output, {
    config: ctx.config,
    logger: ctx.logger,
    ...(ctx.onProgress && { onProgress: ctx.onProgress }),
    ...(options.noVerify && { verifyHash: false }),
  });

  if (result.skipped.length > 0) {
    console.error(pc.yellow(`⚠ ${result.skipped.length} entries were skipped:`));
    for (const line of summarizeFailures(result.skipped)) console.error(pc.yellow(line));
  }
  if (!ctx.quiet) {
    const kind = result.format === 'container' ? 'folder' : 'file';
    console.log(pc.green(`✓ Decompression completed successfully (${kind}, ${result.extractedCount} extracted)`));
  }
}

async function commandExtract(files: string[], options: Options, ctx: Context) {
  if (!requirePaths(files, 2, 'extract <zip> <dir>')) return;
  const [archive = '', outputDir = ''] = files;

  const result = await extractZip(archive, outputDir, {
    config: ctx.config,
    logger: ctx.logger,
    excludePatterns: options.exclude,
    ...(ctx.onProgress && { onProgress: ctx.onProgress }),
    ...(options.password !== undefined && { password: options.password }),
    ...(options.noVerify && { verifyIntegrity: false }),
  });

  if (result.corrupted.length > 0) {
    console.error(pc.yellow(`⚠ Integrity check flagged: ${result.corrupted.join(', ')}`));
  }
  if (result.success) {
    if (!ctx.quiet) console.log(pc.green('✓ Extraction completed successfully'));
    return;
  }

  console.error(pc.yellow(`⚠ Extraction completed with errors (${result.failures.length} of ${result.totalMembers} members)`));
  for (const line of summarizeFailures(result.failures)) console.error(pc.yellow(line));
  process.exitCode = 1;
}

async function commandInfo(files: string[], ctx: Context) {
  if (!requirePaths(files, 1, 'info <file>')) return;
  const info = await inspect(files[0] ?? '', { logger: ctx.logger });

  const type =
    info.format === 'container'
      ? 'Compressed TAR archive (folder)'
      : info.format === 'single-file'
        ? 'Compressed single file'
        : 'Unknown';

  console.log(`${pc.bold('File:')}   ${info.path}`);
  console.log(`${pc.bold('Size:')}   ${info.size.toLocaleString('en-US')} bytes (${formatBytes(info.size)})`);
  console.log(`${pc.bold('SHA256:')} ${info.digest ?? pc.dim('<no hash file found>')}`);
  console.log(`${pc.bold('Type:')}   ${type}${info.tagged ? '' : pc.dim(' (detected from content)')}`);
}

function commandConfig(options: Options, ctx: Context) {
  if (options.user) {
    const path = writeUserConfig(options.config ?? defaultConfigPath(), options.force ?? false);
    console.log(`Created config file at: ${path}`);
    console.log('You can edit this file to customize packrat behavior.');
    return;
  }

  console.log('Current configuration:');
  console.log(JSON.stringify(ctx.config, null, 2));
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const { options } = args;

  if (options.version) {
    printVersion();
    return;
  }

  if (options.help || !args.command) {
    printHelp();
    return;
  }

  if (args.errors.length > 0) {
    for (const error of args.errors) fail(error);
    return;
  }

  const logger = createLogger({ level: options.verbose ? 'debug' : options.quiet ? 'error' : 'warn' });

  // `config --user` must work even when the existing file is broken
  const config =
    args.command === 'config' && options.user
      ? resolveConfig()
      : loadConfig(options.config !== undefined ? { path: options.config } : {});

  const ctx: Context = {
    config,
    logger,
    quiet: options.quiet ?? false,
    ...(!options.quiet && { onProgress: createReporter(options.verbose ?? false) }),
  };

  switch (args.command) {
    case 'compress':
    case 'c':
      await commandCompress(args.files, options, ctx);
      break;

    case 'decompress':
    case 'd':
      await commandDecompress(args.files, options, ctx);
      break;

    case 'extract':
    case 'x':
      await commandExtract(args.files, options, ctx);
      break;

    case 'info':
    case 'i':
      await commandInfo(args.files, ctx);
      break;

    case 'config':
      commandConfig(options, ctx);
      break;

    default:
      console.error(pc.red(`Unknown command: ${args.command}`));
      console.log('Run "packrat --help" for usage information.');
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (error instanceof ArchiveError) {
    fail(error.message);
  } else {
    console.error(pc.red('Error:'), describeError(error));
    process.exitCode = 1;
  }
});
