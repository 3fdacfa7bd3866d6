import fs from 'fs-extra';
import path from 'path';
import type { Tree } from 'tree-sitter';
import type { Logger } from './utils/Logger';
import { parseSource } from './utils/SyntaxTree';
import { findCalls } from './CallSiteFinder';
import { resolveBindings } from './BindingResolver';
import type { BindingMap } from './BindingResolver';
import { instrument } from './InstrumentationRewriter';
import type { Edit } from './InstrumentationRewriter';
import { verify, formatResult } from './PinVerifier';
import type { SpecEntry, VerificationResult } from './PinVerifier';
import { loadSpecTable } from './SpecTable';
import { toEspMain } from './SketchConverter';
import { EmulationRunner } from './EmulationRunner';
import type { RunResult } from './EmulationRunner';
import { compareOutput } from './OutputComparator';
import type { CompareResult } from './OutputComparator';
import type { ProbeConfig } from './ProbeConfig';

export interface AnalyzedSketch {
  sketchPath: string;
  source: string;
  tree: Tree;
  bindings: BindingMap;
}

export interface InstrumentFileResult {
  success: boolean;
  outputPath: string;
  source?: string;
  edits: Edit[];
  error?: string;
}

export interface VerifyFileResult {
  success: boolean;
  results: VerificationResult[];
  error?: string;
}

export interface GradeOptions {
  expectedOutput: string;
  weight?: number;
}

export interface GradeResult {
  success: boolean;
  run?: RunResult;
  comparison?: CompareResult;
  error?: string;
  totalTime: number;
}

/**
 * sketch 分析流水线：解析 -> 变量绑定 -> 插桩 / 引脚检查 -> 可选的构建运行与评分
 */
export class SketchProbe {
  private logger: Logger;
  private config: ProbeConfig;

  constructor(logger: Logger, config: ProbeConfig) {
    this.logger = logger;
    this.config = config;
  }

  /**
   * 分析内存中的源码
   */
  analyzeSource(source: string, sketchPath = '<memory>'): AnalyzedSketch {
    const tree = parseSource(source, sketchPath);
    const bindings = resolveBindings(tree.rootNode);
    this.logger.debug(`Resolved ${bindings.size} variable binding(s) in ${sketchPath}`);
    for (const [name, value] of bindings) {
      this.logger.debug(`|- ${name} = ${value}`);
    }
    return { sketchPath, source, tree, bindings };
  }

  /**
   * 读取并分析 sketch 文件，读取或解析失败时抛出错误
   */
  async analyzeFile(sketchPath: string): Promise<AnalyzedSketch> {
    let source: string;
    try {
      source = await fs.readFile(sketchPath, 'utf8');
    } catch (e) {
      throw new Error(`Cannot read sketch ${sketchPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return this.analyzeSource(source, sketchPath);
  }

  /**
   * 生成插桩后的源码（不写文件）
   */
  instrumentSketch(sketch: AnalyzedSketch): { source: string; edits: Edit[] } {
    const calls = findCalls(sketch.tree.rootNode, this.config.targetFunction);
    this.logger.verbose(`Found ${calls.length} ${this.config.targetFunction}() call(s)`);
    return instrument(sketch.source, calls, sketch.bindings, {
      logMacro: this.config.logMacro,
      logTag: this.config.logTag
    });
  }

  verifySketch(sketch: AnalyzedSketch, spec: SpecEntry[]): VerificationResult[] {
    const results = verify(sketch.tree.rootNode, sketch.bindings, spec);
    for (const result of results) {
      if (!result.validPin) {
        this.logger.verbose(
          `Spec line ${result.entry.line}: pin ${result.entry.expectedPin} is outside the usual range for ${result.entry.functionName}()`
        );
      }
    }
    return results;
  }

  async instrumentFile(sketchPath: string, outputPath: string): Promise<InstrumentFileResult> {
    try {
      const sketch = await this.analyzeFile(sketchPath);
      const { source, edits } = this.instrumentSketch(sketch);
      await fs.ensureDir(path.dirname(outputPath));
      await fs.writeFile(outputPath, source, 'utf8');
      return { success: true, outputPath, source, edits };
    } catch (error) {
      return {
        success: false,
        outputPath,
        edits: [],
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }

  async verifyFile(sketchPath: string, specPath: string): Promise<VerifyFileResult> {
    try {
      const [sketch, spec] = await Promise.all([
        this.analyzeFile(sketchPath),
        loadSpecTable(specPath)
      ]);
      this.logger.verbose(`Loaded ${spec.length} spec row(s) from ${specPath}`);
      return { success: true, results: this.verifySketch(sketch, spec) };
    } catch (error) {
      return {
        success: false,
        results: [],
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }

  /**
   * 插桩、交给构建脚本运行，再与期望输出比较
   */
  async grade(sketchPath: string, options: GradeOptions): Promise<GradeResult> {
    const startTime = Date.now();

    let instrumented: string;
    try {
      const sketch = await this.analyzeFile(sketchPath);
      instrumented = this.instrumentSketch(sketch).source;
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
        totalTime: Date.now() - startTime
      };
    }

    const runner = new EmulationRunner(this.logger, this.config);
    const run = await runner.run(toEspMain(instrumented, this.config.logTag));
    if (!run.success) {
      return { success: false, run, error: run.error, totalTime: Date.now() - startTime };
    }

    const comparison = compareOutput(run.output, options.expectedOutput, {
      mode: this.config.compareMode,
      weight: options.weight
    });
    for (const line of comparison.missingLines) {
      this.logger.warn(`Expected line NOT found in output: '${line}'`);
    }

    return {
      success: comparison.passed,
      run,
      comparison,
      error: comparison.error,
      totalTime: Date.now() - startTime
    };
  }

  /**
   * 输出检查报告，每行规格一行
   */
  report(results: VerificationResult[]): string[] {
    return results.map(formatResult);
  }
}
