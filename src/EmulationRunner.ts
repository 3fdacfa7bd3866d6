import fs from 'fs-extra';
import path from 'path';
import { spawn } from 'child_process';
import type { Logger } from './utils/Logger';
import { decodeToUtf8 } from './utils/TextEncoder';
import type { ProbeConfig } from './ProbeConfig';

export interface RunResult {
  success: boolean;
  exitCode: number | null;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  output: string;         // 模拟器原始输出
  logFilePath: string;    // 构建日志路径
  buildLog?: string;
  error?: string;
  runTime: number;
}

interface ProcessResult {
  exitCode: number | null;
  timedOut: boolean;
  stdout: string;
  stderr: string;
}

/**
 * 外部构建 / 模拟执行脚本的封装：
 * 把 sketch 写入 harness 目录，运行脚本，收集 stdout / stderr 和模拟器输出文件
 */
export class EmulationRunner {
  private logger: Logger;
  private config: ProbeConfig;

  constructor(logger: Logger, config: ProbeConfig) {
    this.logger = logger;
    this.config = config;
  }

  private resolveInHarness(fileName: string): string {
    return path.resolve(this.config.harnessDir, fileName);
  }

  async run(sketchSource: string): Promise<RunResult> {
    const startTime = Date.now();
    const scriptPath = this.resolveInHarness(this.config.buildScript);
    const sketchPath = this.resolveInHarness(this.config.sketchFileName);
    const rawOutputPath = this.resolveInHarness(this.config.rawOutputFile);
    const logFilePath = this.resolveInHarness(this.config.buildLogFile);

    const fail = (error: string, partial: Partial<RunResult> = {}): RunResult => {
      this.logger.error(error);
      return {
        success: false,
        exitCode: null,
        timedOut: false,
        stdout: '',
        stderr: '',
        output: '',
        logFilePath,
        ...partial,
        error,
        runTime: Date.now() - startTime
      };
    };

    if (!await fs.pathExists(scriptPath)) {
      return fail(`Build script not found: ${scriptPath}`);
    }

    try {
      await fs.ensureDir(this.config.harnessDir);
      await fs.writeFile(sketchPath, sketchSource, 'utf8');
      this.logger.verbose(`Sketch written to ${sketchPath}`);
    } catch (error) {
      return fail(`Failed to write sketch to file: ${error instanceof Error ? error.message : error}`);
    }

    // 清理上一次运行留下的输出
    for (const fileName of [this.config.rawOutputFile, this.config.buildLogFile]) {
      const outputPath = this.resolveInHarness(fileName);
      try {
        await fs.remove(outputPath);
      } catch (error) {
        this.logger.warn(`Failed to remove ${outputPath}: ${error instanceof Error ? error.message : error}`);
      }
    }

    this.logger.info(`Executing build script with timeout=${this.config.timeoutMs / 1000}s`);
    let processResult: ProcessResult;
    try {
      processResult = await this.runScript(scriptPath, sketchPath);
    } catch (error) {
      return fail(`Error running build script: ${error instanceof Error ? error.message : error}`);
    }

    const { exitCode, timedOut, stdout, stderr } = processResult;
    if (stdout) {
      this.logger.verbose(`Script STDOUT:\n${stdout}`);
    }
    if (stderr) {
      this.logger.verbose(`Script STDERR:\n${stderr}`);
    }

    if (timedOut) {
      return fail(
        `Timeout: build and emulation exceeded the ${this.config.timeoutMs / 1000}s time limit`,
        { timedOut, stdout, stderr }
      );
    }

    if (exitCode !== 0) {
      const buildLog = await this.readOptional(logFilePath);
      let message = `Script failed with exit code ${exitCode}.\nSTDERR:\n${stderr}\nSTDOUT:\n${stdout}`;
      if (buildLog) {
        message += `\n\nBuild Log:\n${buildLog}`;
      }
      return fail(message, { exitCode, stdout, stderr, buildLog });
    }

    const output = await this.readOptional(rawOutputPath);
    if (!output) {
      return fail(`No output generated by emulator: ${rawOutputPath}`, { exitCode, stdout, stderr });
    }

    this.logger.verbose(`Emulator output: ${output.length} characters`);
    return {
      success: true,
      exitCode,
      timedOut: false,
      stdout,
      stderr,
      output,
      logFilePath,
      runTime: Date.now() - startTime
    };
  }

  private async readOptional(filePath: string): Promise<string | undefined> {
    if (!await fs.pathExists(filePath)) {
      return undefined;
    }
    try {
      return decodeToUtf8(await fs.readFile(filePath));
    } catch (error) {
      this.logger.warn(`Could not read ${filePath}: ${error instanceof Error ? error.message : error}`);
      return undefined;
    }
  }

  private runScript(scriptPath: string, sketchPath: string): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      // 单独的进程组，超时时连同脚本启动的模拟器一起结束
      const detached = process.platform !== 'win32';
      const child = spawn('bash', [scriptPath, sketchPath], {
        cwd: this.config.harnessDir,
        stdio: 'pipe',
        detached
      });

      const stdoutBuffers: Buffer[] = [];
      const stderrBuffers: Buffer[] = [];
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        if (detached && child.pid !== undefined) {
          try {
            process.kill(-child.pid, 'SIGKILL');
            return;
          } catch (error) {
            this.logger.debug(`Failed to kill process group: ${error instanceof Error ? error.message : error}`);
          }
        }
        child.kill('SIGKILL');
      }, this.config.timeoutMs);

      child.stdout?.on('data', (data: Buffer) => {
        stdoutBuffers.push(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderrBuffers.push(data);
      });

      child.on('close', (code) => {
        clearTimeout(timer);
        resolve({
          exitCode: code,
          timedOut,
          stdout: decodeToUtf8(Buffer.concat(stdoutBuffers)),
          stderr: decodeToUtf8(Buffer.concat(stderrBuffers))
        });
      });

      child.on('error', (error) => {
        clearTimeout(timer);
        reject(new Error(`Failed to execute build script: ${error.message}`));
      });
    });
  }
}
