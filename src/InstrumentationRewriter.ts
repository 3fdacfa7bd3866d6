import { extractArgs } from './CallSiteFinder';
import type { CallSite } from './CallSiteFinder';
import type { BindingMap } from './BindingResolver';

/**
 * 对原始源码的一次替换，[start, end) 基于原始文本的偏移
 */
export interface Edit {
  start: number;
  end: number;
  replacement: string;
}

export interface InstrumentOptions {
  logMacro?: string;   // 默认 ESP_LOGI
  logTag?: string;     // 默认 TAG
}

export interface InstrumentResult {
  source: string;
  edits: Edit[];
}

// 参数缺失时的占位符
export const UNKNOWN_ARG = 'None';

/**
 * 生成替换 digitalWrite 调用的日志语句
 */
export function formatLogStatement(pin: string, value: string, options: InstrumentOptions = {}): string {
  const macro = options.logMacro || 'ESP_LOGI';
  const tag = options.logTag || 'TAG';
  // 文本会进入 printf 风格的格式串，需要转义反斜杠、双引号和 %
  const escape = (text: string) =>
    text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/%/g, '%%');
  return `${macro}(${tag}, "PIN ${escape(pin)}, ${escape(value)}");`;
}

/**
 * 为每个调用点生成一次替换，引脚参数若是已绑定的变量则替换为其值
 */
export function buildEdits(calls: CallSite[], bindings: BindingMap, options: InstrumentOptions = {}): Edit[] {
  return calls.map((call) => {
    const args = extractArgs(call);
    const [pin, value] = args.length >= 2 ? [args[0], args[1]] : [UNKNOWN_ARG, UNKNOWN_ARG];
    const resolvedPin = bindings.get(pin) ?? pin;

    return {
      start: call.startIndex,
      end: call.endIndex,
      replacement: formatLogStatement(resolvedPin, value, options)
    };
  });
}

/**
 * 按起始偏移从大到小依次应用替换。
 * 从后往前改，前面尚未应用的替换所用的原始偏移仍然有效。
 */
export function applyEdits(source: string, edits: Edit[]): string {
  const ordered = [...edits].sort((a, b) => b.start - a.start || b.end - a.end);

  let result = source;
  let lastStart = source.length;
  for (const edit of ordered) {
    if (edit.start < 0 || edit.end > lastStart || edit.start > edit.end) {
      throw new Error(`Invalid or overlapping edit [${edit.start}, ${edit.end})`);
    }
    result = result.slice(0, edit.start) + edit.replacement + result.slice(edit.end);
    lastStart = edit.start;
  }
  return result;
}

/**
 * 同名调用嵌套时（如 digitalWrite(digitalWrite(1, HIGH), LOW)）只保留最外层，
 * 外层的替换文本已经包含了内层的原始参数
 */
export function dropNestedEdits(edits: Edit[]): Edit[] {
  const ordered = [...edits].sort((a, b) => a.start - b.start || b.end - a.end);
  const kept: Edit[] = [];
  for (const edit of ordered) {
    const outer = kept[kept.length - 1];
    if (outer && edit.start >= outer.start && edit.end <= outer.end) {
      continue;
    }
    kept.push(edit);
  }
  return kept;
}

/**
 * 将所有 digitalWrite 调用替换为日志语句，返回新的源码，原文本不变
 */
export function instrument(
  source: string,
  calls: CallSite[],
  bindings: BindingMap,
  options: InstrumentOptions = {}
): InstrumentResult {
  const edits = dropNestedEdits(buildEdits(calls, bindings, options));
  return {
    source: applyEdits(source, edits),
    edits
  };
}
