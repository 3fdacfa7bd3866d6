import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';

export class Logger {
  private isVerbose: boolean = false;
  private logFilePath: string | null = null;
  private logToFile: boolean = false;
  private quiet: boolean = false;

  setVerbose(verbose: boolean): void {
    this.isVerbose = verbose;
  }

  /**
   * 静默模式下只输出 warn / error，供 --json 等机器可读输出使用
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  setLogFile(logFilePath: string): void {
    this.logFilePath = logFilePath;
    this.logToFile = true;

    // 确保日志文件目录存在，并创建或清空日志文件
    try {
      fs.ensureDirSync(path.dirname(logFilePath));
      fs.writeFileSync(logFilePath, `sketch-probe log\nDate: ${new Date().toISOString()}\n----------------------------------------------------------------------------\n`);
    } catch (error) {
      console.error(`Failed to initialize log file: ${error}`);
      this.logToFile = false;
    }
  }

  private writeToFile(message: string): void {
    if (this.logToFile && this.logFilePath) {
      try {
        fs.appendFileSync(this.logFilePath, `${this.removeAnsiColors(message)}\n`);
      } catch (error) {
        // 如果写入失败，输出到控制台并禁用文件日志
        console.error(`Failed to write to log file: ${error}`);
        this.logToFile = false;
      }
    }
  }

  private removeAnsiColors(text: string): string {
    return text.replace(/\x1b\[[0-9;]*m/g, '');
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(`${chalk.blue('[INFO]')} ${message}`);
    }
    this.writeToFile(`[INFO] ${message}`);
  }

  success(message: string): void {
    if (!this.quiet) {
      console.log(`${chalk.green('[SUCCESS]')} ${message}`);
    }
    this.writeToFile(`[SUCCESS] ${message}`);
  }

  error(message: string): void {
    console.error(`${chalk.red('[ERROR]')} ${message}`);
    this.writeToFile(`[ERROR] ${message}`);
  }

  warn(message: string): void {
    console.warn(`${chalk.yellow('[WARN]')} ${message}`);
    this.writeToFile(`[WARN] ${message}`);
  }

  debug(message: string): void {
    if (this.isVerbose) {
      console.log(`${chalk.magenta('[DEBUG]')} ${message}`);
      this.writeToFile(`[DEBUG] ${message}`);
    }
  }

  verbose(message: string): void {
    if (this.isVerbose) {
      console.log(`${chalk.gray('[VERBOSE]')} ${message}`);
      this.writeToFile(`[VERBOSE] ${message}`);
    }
  }
}
