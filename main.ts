#!/usr/bin/env node
import { Command } from 'commander';
import { glob } from 'glob';
import fs from 'fs-extra';
import path from 'path';
import { Logger } from './src/utils/Logger';
import { SketchProbe } from './src/SketchProbe';
import { loadSpecTable } from './src/SpecTable';
import type { SpecEntry, VerificationResult } from './src/PinVerifier';
import { toEspMain, toHostCpp } from './src/SketchConverter';
import { loadConfig, parseCompareMode, parseTimeoutSeconds } from './src/ProbeConfig';
import type { ProbeConfig } from './src/ProbeConfig';
import { uniqueWorkName } from './src/utils/md5';

const program = new Command();
const logger = new Logger();

interface CommonOptions {
  verbose: boolean;
  logFile?: string;
  logMacro?: string;
  logTag?: string;
}

interface VerifyOptions extends CommonOptions {
  json: boolean;
}

interface BatchOptions extends CommonOptions {
  spec?: string;
  outDir: string;
}

interface ConvertOptions extends CommonOptions {
  target: string;
}

interface RunOptions extends CommonOptions {
  expected?: string;
  expectedText?: string;
  weight: string;
  timeout?: string;
  mode?: string;
  harnessDir?: string;
  script?: string;
}

function setupLogger(options: CommonOptions): void {
  logger.setVerbose(options.verbose);
  if (options.logFile) {
    const logFilePath = path.resolve(options.logFile);
    logger.setLogFile(logFilePath);
    logger.info(`Log file enabled: ${logFilePath}`);
  }
}

function createProbe(options: CommonOptions, overrides: Partial<ProbeConfig> = {}): SketchProbe {
  const config = loadConfig({
    logMacro: options.logMacro,
    logTag: options.logTag,
    ...overrides
  });
  logger.verbose(`Configuration: ${JSON.stringify(config)}`);
  return new SketchProbe(logger, config);
}

function printReport(probe: SketchProbe, results: VerificationResult[]): void {
  for (const line of probe.report(results)) {
    console.log(line);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

program
  .name('sketch-probe')
  .description('Instrument digitalWrite() calls in Arduino sketches and verify expected pin usage')
  .version('1.0.0');

program
  .command('instrument')
  .description('Replace every digitalWrite() call with a diagnostic log statement')
  .argument('<sketch>', 'Path to Arduino sketch (.ino file)')
  .argument('<output>', 'Path of the instrumented sketch')
  .option('--log-macro <macro>', 'Logging macro used in the replacement')
  .option('--log-tag <tag>', 'Tag passed to the logging macro')
  .option('--verbose', 'Enable verbose output', false)
  .option('--log-file <path>', 'Write logs to file')
  .action(async (sketch: string, output: string, options: CommonOptions) => {
    setupLogger(options);
    const probe = createProbe(options);

    const result = await probe.instrumentFile(path.resolve(sketch), path.resolve(output));
    if (!result.success) {
      logger.error(`Instrumentation failed: ${result.error}`);
      process.exit(1);
    }
    logger.info(`Replaced ${result.edits.length} call(s)`);
    logger.success(`Written instrumented file: ${result.outputPath}`);
  });

program
  .command('verify')
  .description('Check a sketch against a table of expected pins (CSV: function,pin)')
  .argument('<sketch>', 'Path to Arduino sketch (.ino file)')
  .argument('<spec>', 'Path to the expected-pin table')
  .option('--json', 'Print results as JSON', false)
  .option('--verbose', 'Enable verbose output', false)
  .option('--log-file <path>', 'Write logs to file')
  .action(async (sketch: string, spec: string, options: VerifyOptions) => {
    logger.setQuiet(options.json);
    setupLogger(options);
    const probe = createProbe(options);

    const result = await probe.verifyFile(path.resolve(sketch), path.resolve(spec));
    if (!result.success) {
      logger.error(`Verification failed: ${result.error}`);
      process.exit(1);
    }
    if (options.json) {
      console.log(JSON.stringify(result.results, null, 2));
    } else {
      printReport(probe, result.results);
    }
  });

program
  .command('check')
  .description('Instrument a sketch and verify it against a table of expected pins')
  .argument('<sketch>', 'Path to Arduino sketch (.ino file)')
  .argument('<output>', 'Path of the instrumented sketch')
  .argument('<spec>', 'Path to the expected-pin table')
  .option('--log-macro <macro>', 'Logging macro used in the replacement')
  .option('--log-tag <tag>', 'Tag passed to the logging macro')
  .option('--verbose', 'Enable verbose output', false)
  .option('--log-file <path>', 'Write logs to file')
  .action(async (sketch: string, output: string, spec: string, options: CommonOptions) => {
    setupLogger(options);
    const probe = createProbe(options);

    const instrumented = await probe.instrumentFile(path.resolve(sketch), path.resolve(output));
    if (!instrumented.success) {
      logger.error(`Instrumentation failed: ${instrumented.error}`);
      process.exit(1);
    }
    console.log(`[OK] Written instrumented file: ${instrumented.outputPath}`);

    const verified = await probe.verifyFile(path.resolve(sketch), path.resolve(spec));
    if (!verified.success) {
      logger.error(`Verification failed: ${verified.error}`);
      process.exit(1);
    }
    printReport(probe, verified.results);
  });

program
  .command('batch')
  .description('Instrument (and optionally verify) every sketch matching a glob pattern')
  .argument('<pattern>', 'Glob pattern of sketches, e.g. "submissions/**/*.ino"')
  .option('-s, --spec <spec>', 'Expected-pin table applied to every sketch')
  .option('-o, --out-dir <dir>', 'Directory for instrumented sketches', './instrumented')
  .option('--log-macro <macro>', 'Logging macro used in the replacement')
  .option('--log-tag <tag>', 'Tag passed to the logging macro')
  .option('--verbose', 'Enable verbose output', false)
  .option('--log-file <path>', 'Write logs to file')
  .action(async (pattern: string, options: BatchOptions) => {
    setupLogger(options);
    const probe = createProbe(options);

    const sketches = (await glob(pattern, { absolute: true, nodir: true })).sort();
    if (sketches.length === 0) {
      logger.warn(`No sketches match ${pattern}`);
      return;
    }
    logger.info(`Found ${sketches.length} sketch(es)`);

    let spec: SpecEntry[] | undefined;
    try {
      spec = options.spec ? await loadSpecTable(path.resolve(options.spec)) : undefined;
    } catch (error) {
      logger.error(errorMessage(error));
      process.exit(1);
    }

    const outDir = path.resolve(options.outDir);
    let failures = 0;
    for (const sketchPath of sketches) {
      const baseName = path.basename(sketchPath, path.extname(sketchPath));
      const outputPath = path.join(outDir, `${uniqueWorkName(path.dirname(sketchPath), baseName)}${path.extname(sketchPath)}`);

      // 每个文件独立解析，单个文件失败不影响其余文件
      try {
        const sketch = await probe.analyzeFile(sketchPath);
        const { source, edits } = probe.instrumentSketch(sketch);
        await fs.ensureDir(outDir);
        await fs.writeFile(outputPath, source, 'utf8');
        logger.info(`${sketchPath}: ${edits.length} call(s) -> ${outputPath}`);
        if (spec) {
          printReport(probe, probe.verifySketch(sketch, spec));
        }
      } catch (error) {
        failures++;
        logger.error(`${sketchPath}: ${errorMessage(error)}`);
      }
    }

    if (failures > 0) {
      logger.error(`${failures} of ${sketches.length} sketch(es) failed`);
      process.exit(1);
    }
    logger.success(`Processed ${sketches.length} sketch(es)`);
  });

program
  .command('convert')
  .description('Wrap a sketch for the ESP-IDF build (esp) or a host C++ harness (host)')
  .argument('<sketch>', 'Path to Arduino sketch (.ino file)')
  .argument('<output>', 'Path of the converted source')
  .option('-t, --target <target>', 'Conversion target: esp or host', 'esp')
  .option('--log-tag <tag>', 'Name of the log tag constant (esp target)')
  .option('--verbose', 'Enable verbose output', false)
  .option('--log-file <path>', 'Write logs to file')
  .action(async (sketch: string, output: string, options: ConvertOptions) => {
    setupLogger(options);
    if (options.target !== 'esp' && options.target !== 'host') {
      logger.error(`Unknown target: ${options.target}. Expected esp or host`);
      process.exit(1);
    }

    try {
      const config = loadConfig({ logTag: options.logTag });
      const source = await fs.readFile(path.resolve(sketch), 'utf8');
      const converted = options.target === 'esp' ? toEspMain(source, config.logTag) : toHostCpp(source);
      await fs.ensureDir(path.dirname(path.resolve(output)));
      await fs.writeFile(path.resolve(output), converted, 'utf8');
      logger.success(`Conversion complete: ${path.resolve(output)}`);
    } catch (error) {
      logger.error(`Conversion failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('run')
  .description('Instrument a sketch, build and emulate it through the harness script, and grade its output')
  .argument('<sketch>', 'Path to Arduino sketch (.ino file)')
  .option('-e, --expected <file>', 'File containing the expected output')
  .option('--expected-text <text>', 'Expected output given inline (lines separated by \\n)')
  .option('-w, --weight <number>', 'Score awarded when the output matches', '1')
  .option('--timeout <seconds>', 'Build and emulation time limit in seconds')
  .option('-m, --mode <mode>', 'Comparison mode: substring or sequence')
  .option('--harness-dir <dir>', 'Directory containing the build script')
  .option('--script <name>', 'Build script file name inside the harness directory')
  .option('--log-macro <macro>', 'Logging macro used in the replacement')
  .option('--log-tag <tag>', 'Tag passed to the logging macro')
  .option('--verbose', 'Enable verbose output', false)
  .option('--log-file <path>', 'Write logs to file')
  .action(async (sketch: string, options: RunOptions) => {
    setupLogger(options);

    let probe: SketchProbe;
    let expectedOutput = '';
    let weight: number;
    try {
      probe = createProbe(options, {
        timeoutMs: options.timeout ? parseTimeoutSeconds(options.timeout) : undefined,
        compareMode: options.mode ? parseCompareMode(options.mode) : undefined,
        harnessDir: options.harnessDir ? path.resolve(options.harnessDir) : undefined,
        buildScript: options.script
      });
      if (options.expected) {
        expectedOutput = await fs.readFile(path.resolve(options.expected), 'utf8');
      } else if (options.expectedText) {
        expectedOutput = options.expectedText.replace(/\\n/g, '\n');
      }
      weight = Number(options.weight);
      if (!Number.isFinite(weight)) {
        throw new Error(`Invalid weight: ${options.weight}`);
      }
    } catch (error) {
      logger.error(errorMessage(error));
      process.exit(1);
    }

    logger.info(`Starting run of ${sketch}`);
    const result = await probe.grade(path.resolve(sketch), { expectedOutput, weight });

    if (result.run) {
      logger.info(`Run time: ${result.run.runTime / 1000}s`);
    }
    if (!result.success) {
      logger.error(`Run failed: ${result.error}`);
      process.exit(1);
    }
    logger.success(`Output matched. Score: ${result.comparison?.score ?? 0}`);
    logger.info(`Total time: ${result.totalTime / 1000}s`);
  });

// 错误处理
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${reason}`);
  process.exit(1);
});

program.parse();
